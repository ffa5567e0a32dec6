import { RoundStateError, UnknownMatchError } from '../../../shared/errors';
import type { Round } from '../../../shared/types/league';
import type { Broadcaster, Recipient } from '../delivery/Broadcaster';
import type { DeliveryReport } from '../delivery/DeliveryReport';
import { createComponentLogger } from '../../utils/logger';
import type { EndpointLookup, MessageBuilder } from './MessageBuilder';
import type { Tournament } from './Tournament';

export interface RoundManagerDeps {
  tournament: Tournament;
  broadcaster: Pick<Broadcaster, 'broadcast'>;
  messages: MessageBuilder;
  /** Current player recipients, in registration order. */
  players: () => Recipient[];
  refereeEndpoint: EndpointLookup;
}

const log = createComponentLogger('RoundManager');

/**
 * Round and tournament lifecycle. Rounds start strictly in order; a round
 * is closed only when every one of its matches has been marked.
 */
export class RoundManager {
  private readonly tournament: Tournament;

  constructor(private readonly deps: RoundManagerDeps) {
    this.tournament = deps.tournament;
  }

  /**
   * Announce round `n` to every player. Legal only for a PENDING round whose
   * predecessor is COMPLETED.
   */
  async startRound(roundNumber: number): Promise<DeliveryReport> {
    const round = this.tournament.getRound(roundNumber);
    if (round.status !== 'PENDING') {
      throw new RoundStateError(`Round ${roundNumber} has already been started`, {
        roundNumber,
        status: round.status,
      });
    }
    if (roundNumber > 1 && this.tournament.getRound(roundNumber - 1).status !== 'COMPLETED') {
      throw new RoundStateError(
        `Round ${roundNumber} cannot start before round ${roundNumber - 1} is completed`,
        { roundNumber }
      );
    }

    round.status = 'ANNOUNCED';
    for (const match of round.matches) {
      match.status = 'IN_PROGRESS';
    }
    this.tournament.currentRound = roundNumber;
    this.tournament.stage = 'RUNNING';

    log.info('Round started', {
      roundNumber,
      matches: round.matches.length,
      totalRounds: this.tournament.totalRounds,
    });

    const message = this.deps.messages.roundAnnouncement(
      roundNumber,
      round.matches,
      this.deps.refereeEndpoint
    );
    return this.deps.broadcaster.broadcast(this.deps.players(), message);
  }

  /**
   * Throw unless `matchId` belongs to round `n`, the round is running and the
   * match has not been marked yet. Callers check before they change state.
   */
  assertMarkable(matchId: string, roundNumber: number): void {
    const round = this.tournament.getRound(roundNumber);
    if (!round.matches.some((match) => match.matchId === matchId)) {
      throw new UnknownMatchError(matchId, { roundNumber });
    }
    if (round.status !== 'ANNOUNCED') {
      throw new RoundStateError(
        round.status === 'PENDING'
          ? `Round ${roundNumber} has not been started`
          : `Round ${roundNumber} is already completed`,
        { roundNumber, matchId, status: round.status }
      );
    }
    if (round.completedMatchIds.has(matchId)) {
      throw new RoundStateError(`Match ${matchId} is already marked complete`, {
        roundNumber,
        matchId,
      });
    }
  }

  /**
   * Record that a match finished. Returns true only on the call that
   * completes the round's last outstanding match.
   */
  markMatchComplete(matchId: string, roundNumber: number): boolean {
    const round = this.tournament.getRound(roundNumber);
    if (!round.matches.some((match) => match.matchId === matchId)) {
      throw new UnknownMatchError(matchId, { roundNumber });
    }
    if (round.status === 'PENDING') {
      throw new RoundStateError(`Round ${roundNumber} has not been started`, {
        roundNumber,
        matchId,
      });
    }
    if (round.completedMatchIds.has(matchId)) {
      return false;
    }

    round.completedMatchIds.add(matchId);
    return this.isRoundComplete(round) && round.status === 'ANNOUNCED';
  }

  /**
   * Close round `n` and tell every player what comes next.
   */
  async completeRound(roundNumber: number): Promise<DeliveryReport> {
    const round = this.tournament.getRound(roundNumber);
    if (round.status !== 'ANNOUNCED') {
      throw new RoundStateError(`Round ${roundNumber} is not in progress`, {
        roundNumber,
        status: round.status,
      });
    }
    if (!this.isRoundComplete(round)) {
      throw new RoundStateError(`Round ${roundNumber} still has unfinished matches`, {
        roundNumber,
        completed: round.completedMatchIds.size,
        total: round.matches.length,
      });
    }

    round.status = 'COMPLETED';
    const nextRoundId = roundNumber < this.tournament.totalRounds ? roundNumber + 1 : null;

    log.info('Round completed', { roundNumber, nextRoundId });

    const message = this.deps.messages.roundCompleted(
      roundNumber,
      round.completedMatchIds.size,
      nextRoundId
    );
    return this.deps.broadcaster.broadcast(this.deps.players(), message);
  }

  isTournamentComplete(): boolean {
    return this.tournament.isComplete();
  }

  /**
   * Final standings to every player; rank 1 is the champion.
   */
  async broadcastTournamentEnd(): Promise<DeliveryReport> {
    if (!this.isTournamentComplete()) {
      throw new RoundStateError('Tournament is not complete', {
        currentRound: this.tournament.currentRound,
        totalRounds: this.tournament.totalRounds,
      });
    }

    this.tournament.stage = 'COMPLETED';
    const finalStandings = this.tournament.standings.getStandings();
    const champion = finalStandings[0];

    log.info('Tournament complete', {
      leagueId: this.tournament.leagueId,
      champion: champion?.playerId ?? null,
      points: champion?.points ?? 0,
    });

    const message = this.deps.messages.tournamentEnd(
      this.tournament.totalRounds,
      this.tournament.totalMatches,
      finalStandings
    );
    return this.deps.broadcaster.broadcast(this.deps.players(), message);
  }

  private isRoundComplete(round: Round): boolean {
    return round.completedMatchIds.size === round.matches.length;
  }
}
