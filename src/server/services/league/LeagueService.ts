import {
  LeagueError,
  LeagueErrorCode,
  PlayerNotFoundError,
  RegistrationRejectedError,
  UnauthorizedAgentError,
  UnknownMatchError,
  describeError,
} from '../../../shared/errors';
import type { Match } from '../../../shared/types/league';
import type {
  MatchResultAckPayload,
  StandingSummary,
} from '../../../shared/types/protocol';
import { parseSender } from '../../../shared/utils/envelope';
import { SerialQueue } from '../../../shared/utils/serialQueue';
import type {
  MatchResultReportInput,
  RegisterPlayerInput,
  RegisterRefereeInput,
} from '../../../shared/validation/protocolSchemas';
import { createComponentLogger } from '../../utils/logger';
import type { Broadcaster, Recipient } from '../delivery/Broadcaster';
import { AgentRegistry } from './AgentRegistry';
import { MatchScheduler } from './MatchScheduler';
import { MessageBuilder } from './MessageBuilder';
import { LeagueStore } from './LeagueStore';
import { RoundManager } from './RoundManager';
import { StandingsEngine, toStandingSummary } from './StandingsEngine';
import { Tournament } from './Tournament';

export interface LeagueServiceDeps {
  leagueId: string;
  registry: AgentRegistry;
  store: LeagueStore;
  broadcaster: Pick<Broadcaster, 'broadcast' | 'deliver'>;
}

export type LeagueQueryType = 'GET_REGISTRATIONS' | 'GET_STANDINGS' | 'GET_ROUND_STATUS' | 'GET_MATCHES';

export interface WireMatch {
  match_id: string;
  round_id: number;
  player_A_id: string;
  player_B_id: string;
  referee_id: string;
  status: Match['status'];
}

export interface LeagueStartSummary {
  league_id: string;
  total_rounds: number;
  total_matches: number;
  player_count: number;
  referee_count: number;
}

const log = createComponentLogger('LeagueService');

function toWireMatch(match: Match): WireMatch {
  return {
    match_id: match.matchId,
    round_id: match.roundNumber,
    player_A_id: match.playerAId,
    player_B_id: match.playerBId,
    referee_id: match.refereeId,
    status: match.status,
  };
}

/**
 * League manager facade. Owns the Tournament aggregate; every mutation
 * (registration, start, result application, round advance) runs through a
 * single SerialQueue so concurrent reports cannot lose updates or close a
 * round twice.
 */
export class LeagueService {
  readonly leagueId: string;
  private readonly registry: AgentRegistry;
  private readonly store: LeagueStore;
  private readonly broadcaster: LeagueServiceDeps['broadcaster'];
  private readonly messages: MessageBuilder;
  private readonly standings = new StandingsEngine();
  private readonly queue = new SerialQueue();
  private tournament: Tournament | null = null;
  private rounds: RoundManager | null = null;

  constructor(deps: LeagueServiceDeps) {
    this.leagueId = deps.leagueId;
    this.registry = deps.registry;
    this.store = deps.store;
    this.broadcaster = deps.broadcaster;
    this.messages = new MessageBuilder(deps.leagueId);
  }

  /**
   * Reload registrations persisted by an earlier run.
   */
  async initialize(): Promise<void> {
    const snapshot = await this.store.loadAgents();
    if (!snapshot) {
      return;
    }
    this.registry.restore(snapshot);
    for (const player of snapshot.players) {
      this.standings.addPlayer(player.agentId, player.displayName);
    }
    log.info('Registrations restored', {
      players: snapshot.players.length,
      referees: snapshot.referees.length,
    });
  }

  get isStarted(): boolean {
    return this.tournament !== null;
  }

  /** Resolves once every queued mutation, including round advances, has run. */
  whenIdle(): Promise<void> {
    return this.queue.run(() => undefined);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Registration
  // ═══════════════════════════════════════════════════════════════════════

  registerPlayer(input: RegisterPlayerInput) {
    return this.queue.run(async () => {
      const meta = input.player_meta;
      try {
        const { record, created } = this.registry.registerPlayer({
          displayName: meta.display_name,
          endpoint: meta.contact_endpoint,
          version: meta.version,
          gameTypes: meta.game_types,
        });
        this.standings.addPlayer(record.agentId, record.displayName);
        if (created) {
          await this.persistAgents();
        }
        return this.messages.registerResponse(
          'player',
          { status: 'ACCEPTED', agent_id: record.agentId, auth_token: record.authToken },
          input.conversation_id
        );
      } catch (error) {
        return this.rejectRegistration('player', error, input.conversation_id);
      }
    });
  }

  registerReferee(input: RegisterRefereeInput) {
    return this.queue.run(async () => {
      const meta = input.referee_meta;
      try {
        const { record, created } = this.registry.registerReferee({
          displayName: meta.display_name,
          endpoint: meta.contact_endpoint,
          version: meta.version,
          gameTypes: meta.game_types,
          maxConcurrentMatches: meta.max_concurrent_matches,
        });
        if (created) {
          await this.persistAgents();
        }
        return this.messages.registerResponse(
          'referee',
          { status: 'ACCEPTED', agent_id: record.agentId, auth_token: record.authToken },
          input.conversation_id
        );
      } catch (error) {
        return this.rejectRegistration('referee', error, input.conversation_id);
      }
    });
  }

  private rejectRegistration(kind: 'player' | 'referee', error: unknown, conversationId?: string) {
    if (!(error instanceof RegistrationRejectedError)) {
      throw error;
    }
    log.warn('Registration rejected', { kind, reason: error.message });
    return this.messages.registerResponse(
      kind,
      { status: 'REJECTED', agent_id: null, auth_token: null, reason: error.message },
      conversationId
    );
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Tournament start and round flow
  // ═══════════════════════════════════════════════════════════════════════

  startLeague(): Promise<LeagueStartSummary> {
    return this.queue.run(async () => {
      if (this.tournament) {
        throw new LeagueError(LeagueErrorCode.LEAGUE_ALREADY_STARTED, 'League has already started', {
          leagueId: this.leagueId,
        });
      }

      const players = this.registry.listPlayers();
      const referees = this.registry.listReferees();
      const plan = new MatchScheduler(this.leagueId).buildPlan(
        players.map((p) => p.agentId),
        referees.map((r) => ({ refereeId: r.agentId, endpoint: r.endpoint }))
      );

      this.registry.close();
      const tournament = new Tournament(plan, this.standings);
      this.tournament = tournament;
      this.rounds = new RoundManager({
        tournament,
        broadcaster: this.broadcaster,
        messages: this.messages,
        players: () => this.playerRecipients(),
        refereeEndpoint: (refereeId) => this.registry.getReferee(refereeId)?.endpoint ?? null,
      });

      await this.store.saveSchedule(this.leagueId, plan.rounds);
      await this.store.saveStandings(this.standings.snapshot());

      await this.broadcaster.broadcast(
        this.playerRecipients(),
        this.messages.tournamentStart(tournament.totalRounds, tournament.totalMatches, players.length)
      );

      await this.beginRound(1);

      return {
        league_id: this.leagueId,
        total_rounds: tournament.totalRounds,
        total_matches: tournament.totalMatches,
        player_count: players.length,
        referee_count: referees.length,
      };
    });
  }

  /**
   * Announce the round, then hand each match to its referee. A match whose
   * referee cannot be reached is aborted so the round can still close.
   */
  private async beginRound(roundNumber: number): Promise<void> {
    const { tournament, rounds } = this.requireStarted();
    await rounds.startRound(roundNumber);

    const round = tournament.getRound(roundNumber);
    const dispatches = await Promise.all(
      round.matches.map(async (match) => ({ match, result: await this.dispatchMatch(match) }))
    );

    let roundDone = false;
    for (const { match, result } of dispatches) {
      if (result.ok) continue;
      log.error('Match assignment could not be delivered; aborting match', {
        matchId: match.matchId,
        refereeId: match.refereeId,
        error: result.error,
      });
      roundDone = (await this.applyAbort(match, `assignment failed: ${result.error}`)) || roundDone;
    }

    if (roundDone) {
      await this.advanceAfterRound(roundNumber);
    }
  }

  private async dispatchMatch(match: Match) {
    const referee = this.registry.getReferee(match.refereeId);
    const playerA = this.registry.getPlayer(match.playerAId);
    const playerB = this.registry.getPlayer(match.playerBId);
    if (!referee || !playerA || !playerB) {
      return { ok: false as const, attempts: 0, error: 'assignment references an unknown agent' };
    }
    const message = this.messages.matchAssignment(match, playerA.endpoint, playerB.endpoint);
    return this.broadcaster.deliver({ id: referee.agentId, endpoint: referee.endpoint }, message);
  }

  /**
   * Close a finished round, publish standings, then either start the next
   * round or end the tournament.
   */
  private async advanceAfterRound(roundNumber: number): Promise<void> {
    const { tournament, rounds } = this.requireStarted();

    await rounds.completeRound(roundNumber);
    await this.broadcaster.broadcast(
      this.playerRecipients(),
      this.messages.standingsUpdate(roundNumber, this.standings.getStandings())
    );

    if (rounds.isTournamentComplete()) {
      await rounds.broadcastTournamentEnd();
      return;
    }
    if (roundNumber < tournament.totalRounds) {
      await this.beginRound(roundNumber + 1);
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Results
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Apply one referee report. The ack is returned before any round advance
   * runs; the advance is queued behind it.
   */
  async reportMatchResult(input: MatchResultReportInput) {
    const ack = await this.queue.run(() => this.applyReport(input));

    if (ack.round_complete) {
      const match = this.tournament?.findMatch(input.match_id);
      if (match) {
        this.queue
          .run(() => this.advanceAfterRound(match.roundNumber))
          .catch((error: unknown) => {
            log.error('Round advance failed', {
              roundNumber: match.roundNumber,
              error: describeError(error),
            });
          });
      }
    }

    return this.messages.matchResultAck(ack, input.conversation_id);
  }

  private async applyReport(input: MatchResultReportInput): Promise<MatchResultAckPayload> {
    const { tournament } = this.requireStarted();
    const match = tournament.findMatch(input.match_id);
    if (!match) {
      throw new UnknownMatchError(input.match_id);
    }

    this.authorizeReport(match, input);

    if (input.round_id !== match.roundNumber) {
      log.warn('Report round does not match schedule; using scheduled round', {
        matchId: match.matchId,
        reportedRound: input.round_id,
        scheduledRound: match.roundNumber,
      });
    }

    if (match.status === 'COMPLETED' || match.status === 'ABORTED') {
      log.info('Duplicate match report ignored', { matchId: match.matchId, status: match.status });
      return { acknowledged: true, match_id: match.matchId, round_complete: false, duplicate: true };
    }

    const result = input.result;
    let roundComplete: boolean;
    if (result.status === 'COMPLETED') {
      const winner = result.winner;
      if (winner !== null && winner !== match.playerAId && winner !== match.playerBId) {
        throw new PlayerNotFoundError(winner, {
          matchId: match.matchId,
          reason: 'reported winner is not in this match',
        });
      }
      roundComplete = await this.finishMatch(match, 'COMPLETED', winner);
      log.info('Match result recorded', {
        matchId: match.matchId,
        winner,
        drawnNumber: result.details.drawn_number,
      });
    } else {
      roundComplete = await this.applyAbort(match, result.reason);
    }

    return { acknowledged: true, match_id: match.matchId, round_complete: roundComplete };
  }

  private async applyAbort(match: Match, reason: string): Promise<boolean> {
    const roundComplete = await this.finishMatch(match, 'ABORTED');
    log.warn('Match aborted', { matchId: match.matchId, reason });
    return roundComplete;
  }

  /**
   * Every check runs before any state changes, so a rejected report leaves
   * standings and match status untouched.
   */
  private async finishMatch(
    match: Match,
    status: 'COMPLETED' | 'ABORTED',
    winner: string | null = null
  ): Promise<boolean> {
    const { tournament, rounds } = this.requireStarted();
    rounds.assertMarkable(match.matchId, match.roundNumber);

    if (status === 'COMPLETED') {
      this.standings.recordMatchResult(match.matchId, match.playerAId, match.playerBId, winner);
    }
    match.status = status;
    const roundComplete = rounds.markMatchComplete(match.matchId, match.roundNumber);

    try {
      await this.store.updateMatchStatus(
        match.roundNumber - 1,
        tournament.matchPosition(match),
        status
      );
      await this.store.saveStandings(this.standings.snapshot());
    } catch (error) {
      log.error('Failed to persist match result', {
        matchId: match.matchId,
        error: describeError(error),
      });
    }
    return roundComplete;
  }

  private authorizeReport(match: Match, input: MatchResultReportInput): void {
    const sender = input.sender ? parseSender(input.sender) : null;
    const refereeId = sender?.role === 'referee' ? sender.id : undefined;

    if (!refereeId || !this.registry.verifyRefereeToken(refereeId, input.auth_token)) {
      throw new UnauthorizedAgentError(refereeId ?? input.sender ?? 'unknown', {
        matchId: match.matchId,
        reason: 'missing or invalid referee credentials',
      });
    }
    if (refereeId !== match.refereeId) {
      throw new UnauthorizedAgentError(refereeId, {
        matchId: match.matchId,
        reason: `match is assigned to ${match.refereeId}`,
      });
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Queries
  // ═══════════════════════════════════════════════════════════════════════

  getStandings(): { standings: StandingSummary[] } {
    return { standings: this.standings.getStandings().map(toStandingSummary) };
  }

  query(queryType: LeagueQueryType): Record<string, unknown> {
    switch (queryType) {
      case 'GET_REGISTRATIONS':
        return {
          players: this.registry.listPlayers().map((p) => ({
            player_id: p.agentId,
            display_name: p.displayName,
            contact_endpoint: p.endpoint,
            healthy: p.healthy,
          })),
          referees: this.registry.listReferees().map((r) => ({
            referee_id: r.agentId,
            display_name: r.displayName,
            contact_endpoint: r.endpoint,
            max_concurrent_matches: r.maxConcurrentMatches,
            healthy: r.healthy,
          })),
        };
      case 'GET_STANDINGS':
        return this.getStandings();
      case 'GET_ROUND_STATUS':
        return this.roundStatus();
      case 'GET_MATCHES':
        return { matches: this.tournament?.allMatches().map(toWireMatch) ?? [] };
    }
  }

  getAssignedMatches(refereeId: string): { referee_id: string; matches: WireMatch[] } {
    if (!this.registry.getReferee(refereeId)) {
      throw new LeagueError(LeagueErrorCode.REFEREE_NOT_FOUND, `Referee not found: ${refereeId}`, {
        refereeId,
      });
    }
    return {
      referee_id: refereeId,
      matches: this.tournament?.matchesForReferee(refereeId).map(toWireMatch) ?? [],
    };
  }

  private roundStatus(): Record<string, unknown> {
    const tournament = this.tournament;
    if (!tournament) {
      return { current_round: 0, total_rounds: 0, stage: 'REGISTRATION', rounds: [] };
    }
    return {
      current_round: tournament.currentRound,
      total_rounds: tournament.totalRounds,
      stage: tournament.stage,
      rounds: [...tournament.rounds.values()].map((round) => ({
        round_id: round.roundNumber,
        status: round.status,
        matches: round.matches.length,
        completed: round.completedMatchIds.size,
      })),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Health
  // ═══════════════════════════════════════════════════════════════════════

  /** Health-check targets: every registered agent with its endpoint. */
  monitoredAgents(): Recipient[] {
    return [...this.registry.listPlayers(), ...this.registry.listReferees()].map((agent) => ({
      id: agent.agentId,
      endpoint: agent.endpoint,
    }));
  }

  setAgentHealth(agentId: string, healthy: boolean): boolean {
    return this.registry.setHealth(agentId, healthy);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════

  private playerRecipients(): Recipient[] {
    return this.registry.listPlayers().map((p) => ({ id: p.agentId, endpoint: p.endpoint }));
  }

  private requireStarted(): { tournament: Tournament; rounds: RoundManager } {
    if (!this.tournament || !this.rounds) {
      throw new LeagueError(LeagueErrorCode.LEAGUE_NOT_STARTED, 'League has not started', {
        leagueId: this.leagueId,
      });
    }
    return { tournament: this.tournament, rounds: this.rounds };
  }

  private async persistAgents(): Promise<void> {
    try {
      await this.store.saveAgents(this.registry.snapshot());
    } catch (error) {
      log.error('Failed to persist registrations', { error: describeError(error) });
    }
  }
}
