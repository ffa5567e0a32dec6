import { LeagueError, LeagueErrorCode } from '../../../shared/errors';
import type { Match, Round, TournamentStage } from '../../../shared/types/league';
import type { SchedulePlan } from './MatchScheduler';
import type { StandingsEngine } from './StandingsEngine';

/**
 * The tournament aggregate: schedule, round progress and standings. One
 * instance per league, owned by the LeagueService and handed to the
 * components that read or mutate it.
 */
export class Tournament {
  readonly leagueId: string;
  readonly rounds: ReadonlyMap<number, Round>;
  readonly standings: StandingsEngine;
  currentRound = 0;
  stage: TournamentStage = 'REGISTRATION';

  private readonly matchIndex = new Map<string, Match>();

  constructor(plan: SchedulePlan, standings: StandingsEngine) {
    this.leagueId = plan.leagueId;
    this.standings = standings;

    const rounds = new Map<number, Round>();
    plan.rounds.forEach((matches, index) => {
      const roundNumber = index + 1;
      rounds.set(roundNumber, {
        roundNumber,
        matches,
        completedMatchIds: new Set<string>(),
        status: 'PENDING',
      });
      for (const match of matches) {
        this.matchIndex.set(match.matchId, match);
      }
    });
    this.rounds = rounds;
  }

  get totalRounds(): number {
    return this.rounds.size;
  }

  get totalMatches(): number {
    return this.matchIndex.size;
  }

  getRound(roundNumber: number): Round {
    const round = this.rounds.get(roundNumber);
    if (!round) {
      throw new LeagueError(LeagueErrorCode.ROUND_NOT_FOUND, `Round not found: ${roundNumber}`, {
        roundNumber,
        totalRounds: this.totalRounds,
      });
    }
    return round;
  }

  findMatch(matchId: string): Match | undefined {
    return this.matchIndex.get(matchId);
  }

  allMatches(): Match[] {
    return [...this.matchIndex.values()];
  }

  matchesForReferee(refereeId: string): Match[] {
    return this.allMatches().filter((match) => match.refereeId === refereeId);
  }

  /** Position of a match within its round, for the persisted schedule. */
  matchPosition(match: Match): number {
    return this.getRound(match.roundNumber).matches.indexOf(match);
  }

  isComplete(): boolean {
    if (this.currentRound !== this.totalRounds) {
      return false;
    }
    for (const round of this.rounds.values()) {
      if (round.status !== 'COMPLETED') {
        return false;
      }
    }
    return true;
  }
}
