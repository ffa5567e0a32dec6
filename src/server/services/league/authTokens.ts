import { randomInt, timingSafeEqual } from 'crypto';

export type AgentKind = 'player' | 'referee';

const TOKEN_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const TOKEN_SUFFIX_LENGTH = 16;

/**
 * Opaque bearer token: `tok_<kind initial><id lowercased>_<16 random chars>`,
 * e.g. `tok_pp01_k3j9...`.
 */
export function generateAuthToken(kind: AgentKind, agentId: string): string {
  let suffix = '';
  for (let i = 0; i < TOKEN_SUFFIX_LENGTH; i++) {
    suffix += TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)];
  }
  return `tok_${kind[0]}${agentId.toLowerCase()}_${suffix}`;
}

export function tokensMatch(expected: string, presented: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(presented);
  return a.length === b.length && timingSafeEqual(a, b);
}
