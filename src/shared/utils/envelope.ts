import { randomUUID } from 'crypto';
import { PROTOCOL_VERSION, type Envelope, type MessageType, type ProtocolMessage } from '../types/protocol';

export const LEAGUE_MANAGER_SENDER = 'league_manager';

export const refereeSender = (refereeId: string): string => `referee:${refereeId}`;
export const playerSender = (playerId: string): string => `player:${playerId}`;

/**
 * Split `referee:REF01` into its role and id. Returns null for anything else.
 */
export function parseSender(sender: string): { role: string; id: string } | null {
  const index = sender.indexOf(':');
  if (index <= 0 || index === sender.length - 1) {
    return null;
  }
  return { role: sender.slice(0, index), id: sender.slice(index + 1) };
}

export function createEnvelope<M extends MessageType>(
  messageType: M,
  sender: string,
  conversationId: string = randomUUID(),
  now: Date = new Date()
): Envelope & { message_type: M } {
  return {
    protocol: PROTOCOL_VERSION,
    message_type: messageType,
    sender,
    timestamp: now.toISOString(),
    conversation_id: conversationId,
  };
}

export function buildMessage<M extends MessageType, T extends object>(
  messageType: M,
  sender: string,
  payload: T,
  conversationId?: string
): ProtocolMessage<T> & { message_type: M } {
  return { ...createEnvelope(messageType, sender, conversationId), ...payload };
}
