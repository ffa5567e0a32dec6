import type { Envelope, MessageType } from '../../shared/types/protocol';

/**
 * RPC method that carries each outbound message type.
 */
export const RPC_METHOD_FOR_MESSAGE = {
  REFEREE_REGISTER_REQUEST: 'register_referee',
  LEAGUE_REGISTER_REQUEST: 'register_player',
  TOURNAMENT_START: 'notify_tournament_start',
  ROUND_ANNOUNCEMENT: 'notify_round_announcement',
  MATCH_ASSIGNMENT: 'start_match',
  GAME_INVITATION: 'handle_game_invitation',
  CHOOSE_PARITY_CALL: 'choose_parity',
  GAME_OVER: 'notify_match_result',
  MATCH_RESULT_REPORT: 'report_match_result',
  ROUND_COMPLETED: 'notify_round_completed',
  LEAGUE_STANDINGS_UPDATE: 'notify_standings_update',
  TOURNAMENT_END: 'notify_tournament_end',
} as const satisfies Partial<Record<MessageType, string>>;

export type OutboundMessageType = keyof typeof RPC_METHOD_FOR_MESSAGE;

export type OutboundMessage = Envelope & { message_type: OutboundMessageType };

export function rpcMethodFor(message: OutboundMessage): string {
  return RPC_METHOD_FOR_MESSAGE[message.message_type];
}
