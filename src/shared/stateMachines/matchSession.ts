import { InvalidTransitionError } from '../errors';

/**
 * Referee-side lifecycle of a single match. One session per match
 * execution; never shared between orchestrations.
 */

export type MatchState =
  | 'WAITING_FOR_PLAYERS'
  | 'COLLECTING_CHOICES'
  | 'DRAWING_NUMBER'
  | 'EVALUATING'
  | 'FINISHED'
  | 'ABORTED';

export type TerminalMatchState = Extract<MatchState, 'FINISHED' | 'ABORTED'>;

export interface MatchTransition {
  state: MatchState;
  timestamp: number;
}

/**
 * Fixed transition table. ABORTED is only reachable before the draw.
 */
export const MATCH_TRANSITIONS: Readonly<Record<MatchState, readonly MatchState[]>> = {
  WAITING_FOR_PLAYERS: ['COLLECTING_CHOICES', 'ABORTED'],
  COLLECTING_CHOICES: ['DRAWING_NUMBER', 'ABORTED'],
  DRAWING_NUMBER: ['EVALUATING'],
  EVALUATING: ['FINISHED'],
  FINISHED: [],
  ABORTED: [],
};

export function canTransition(from: MatchState, to: MatchState): boolean {
  return MATCH_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: MatchState): state is TerminalMatchState {
  return state === 'FINISHED' || state === 'ABORTED';
}

export class GameSession {
  readonly matchId: string;
  private current: MatchState = 'WAITING_FOR_PLAYERS';
  private readonly transitions: MatchTransition[];
  private readonly now: () => number;

  constructor(matchId: string, now: () => number = Date.now) {
    this.matchId = matchId;
    this.now = now;
    this.transitions = [{ state: this.current, timestamp: now() }];
  }

  get state(): MatchState {
    return this.current;
  }

  /** Full audit trail, oldest first. */
  get history(): readonly MatchTransition[] {
    return this.transitions;
  }

  get canAbort(): boolean {
    return canTransition(this.current, 'ABORTED');
  }

  transition(to: MatchState): void {
    if (!canTransition(this.current, to)) {
      throw new InvalidTransitionError(this.current, to, { matchId: this.matchId });
    }
    this.current = to;
    this.transitions.push({ state: to, timestamp: this.now() });
  }
}
