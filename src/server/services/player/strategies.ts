import { randomInt } from 'crypto';
import { PARITY_CHOICES, type ParityChoice } from '../../../shared/types/league';
import type { StandingSummary } from '../../../shared/types/protocol';

export type MatchOutcomeForPlayer = 'WIN' | 'LOSS' | 'DRAW';

export interface OpponentRecord {
  matchId: string;
  drawnNumber: number;
  ownChoice: ParityChoice | null;
  opponentChoice: ParityChoice | null;
  outcome: MatchOutcomeForPlayer;
}

export interface ChoiceContext {
  matchId: string;
  opponentId: string;
  opponentHistory: readonly OpponentRecord[];
  standings: readonly StandingSummary[];
}

/**
 * Decision policy for a player. Implementations may be stateful but must
 * answer synchronously or with a promise well inside the choice deadline.
 */
export interface ParityStrategy {
  readonly name: string;
  choose(context: ChoiceContext): ParityChoice | Promise<ParityChoice>;
}

export class RandomParityStrategy implements ParityStrategy {
  readonly name = 'random';

  constructor(private readonly pick: (max: number) => number = randomInt) {}

  choose(): ParityChoice {
    return PARITY_CHOICES[this.pick(PARITY_CHOICES.length)];
  }
}

export class FixedParityStrategy implements ParityStrategy {
  readonly name: string;

  constructor(private readonly choice: ParityChoice) {
    this.name = `always_${choice}`;
  }

  choose(): ParityChoice {
    return this.choice;
  }
}

export type StrategyName = 'random' | 'always_even' | 'always_odd';

export function createStrategy(name: StrategyName): ParityStrategy {
  switch (name) {
    case 'always_even':
      return new FixedParityStrategy('even');
    case 'always_odd':
      return new FixedParityStrategy('odd');
    case 'random':
      return new RandomParityStrategy();
  }
}
