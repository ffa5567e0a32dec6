import { randomInt } from 'crypto';
import type { ParityChoice } from '../types/league';

export const DRAW_MIN = 1;
export const DRAW_MAX = 10;
export const WIN_POINTS = 3;
export const LOSS_POINTS = 0;

export interface ParityOutcome {
  drawnNumber: number;
  parity: ParityChoice;
  winnerId: string | null;
  scores: Record<string, number>;
  /** True when every player picked the same symbol. */
  collision: boolean;
}

/**
 * Uniform integer in [1, 10] from the OS CSPRNG. Never seeded.
 */
export function drawNumber(): number {
  return randomInt(DRAW_MIN, DRAW_MAX + 1);
}

export function parityOf(value: number): ParityChoice {
  return value % 2 === 0 ? 'even' : 'odd';
}

/**
 * Score one parity game. The first entry (in map insertion order) whose
 * choice matches the parity wins, so when both players picked the matching
 * symbol the first player is favored. Callers should surface `collision`.
 */
export function determineWinner(
  drawn: number,
  choices: ReadonlyMap<string, ParityChoice>
): ParityOutcome {
  const parity = parityOf(drawn);

  let winnerId: string | null = null;
  for (const [playerId, choice] of choices) {
    if (choice === parity) {
      winnerId = playerId;
      break;
    }
  }

  const scores: Record<string, number> = {};
  for (const playerId of choices.keys()) {
    scores[playerId] = playerId === winnerId ? WIN_POINTS : LOSS_POINTS;
  }

  const symbols = new Set(choices.values());

  return {
    drawnNumber: drawn,
    parity,
    winnerId,
    scores,
    collision: choices.size > 1 && symbols.size === 1,
  };
}
