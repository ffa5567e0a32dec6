import { assignReferees, buildRoundRobin } from '../../../shared/engine/roundRobin';
import type { Match, RefereeDescriptor } from '../../../shared/types/league';
import { createComponentLogger } from '../../utils/logger';

export interface SchedulePlan {
  leagueId: string;
  rounds: Match[][];
  totalMatches: number;
}

const log = createComponentLogger('MatchScheduler');

/**
 * Builds the whole tournament plan once: round-robin pairings, then
 * least-loaded referee assignment. No I/O.
 */
export class MatchScheduler {
  constructor(private readonly leagueId: string) {}

  buildPlan(playerIds: readonly string[], referees: readonly RefereeDescriptor[]): SchedulePlan {
    const pairings = buildRoundRobin(playerIds);
    const rounds = assignReferees(this.leagueId, pairings, referees);
    const totalMatches = rounds.reduce((sum, round) => sum + round.length, 0);

    log.info('Schedule built', {
      leagueId: this.leagueId,
      players: playerIds.length,
      referees: referees.length,
      rounds: rounds.length,
      totalMatches,
    });

    return { leagueId: this.leagueId, rounds, totalMatches };
  }
}

