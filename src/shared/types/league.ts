/**
 * Core league domain types shared by the league manager, referees and players.
 */

export type ParityChoice = 'even' | 'odd';

export const PARITY_CHOICES: readonly ParityChoice[] = ['even', 'odd'] as const;

export type MatchStatus = 'PENDING' | 'IN_PROGRESS' | 'COMPLETED' | 'ABORTED';

export type RoundStatus = 'PENDING' | 'ANNOUNCED' | 'COMPLETED';

export type TournamentStage = 'REGISTRATION' | 'RUNNING' | 'COMPLETED';

export interface Match {
  readonly matchId: string;
  readonly roundNumber: number;
  readonly playerAId: string;
  readonly playerBId: string;
  readonly refereeId: string;
  /** Written once, when the match completes or aborts. */
  status: MatchStatus;
}

export interface Round {
  readonly roundNumber: number;
  readonly matches: readonly Match[];
  readonly completedMatchIds: Set<string>;
  status: RoundStatus;
}

/** A scheduled pairing before referee assignment. */
export interface Pairing {
  readonly playerAId: string;
  readonly playerBId: string;
}

export interface RefereeDescriptor {
  readonly refereeId: string;
  readonly endpoint?: string;
}

export interface PlayerStanding {
  readonly playerId: string;
  readonly displayName: string;
  wins: number;
  losses: number;
  ties: number;
  points: number;
  matchesPlayed: number;
  /** Recomputed on every read. */
  rank: number;
}

/** The referee's view of one match to run. */
export interface MatchAssignment {
  matchId: string;
  roundId: number;
  leagueId: string;
  playerAId: string;
  playerBId: string;
  playerAEndpoint: string;
  playerBEndpoint: string;
}

export type MatchResultStatus = 'WIN' | 'DRAW';

export interface GameResult {
  status: MatchResultStatus;
  winnerPlayerId: string | null;
  drawnNumber: number;
  numberParity: ParityChoice;
  choices: Record<string, ParityChoice>;
  scores: Record<string, number>;
}
