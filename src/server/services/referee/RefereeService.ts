import { LeagueError, LeagueErrorCode, describeError } from '../../../shared/errors';
import type { MatchAssignment } from '../../../shared/types/league';
import type { StandingSummary } from '../../../shared/types/protocol';
import { buildMessage, refereeSender } from '../../../shared/utils/envelope';
import { TaskPool } from '../../../shared/utils/taskPool';
import {
  RegisterResponseSchema,
  StandingsResponseSchema,
  type MatchAssignmentInput,
} from '../../../shared/validation/protocolSchemas';
import type { OutboundMessage } from '../../rpc/methods';
import type { RpcTransport } from '../../rpc/RpcClient';
import { createComponentLogger } from '../../utils/logger';
import type { Broadcaster, DeliveryResult, Recipient } from '../delivery/Broadcaster';
import { MatchOrchestrator, type MatchOutcome, type OrchestratorTimeouts } from './MatchOrchestrator';

export interface RefereeSettings {
  displayName: string;
  endpoint: string;
  leagueEndpoint: string;
  maxConcurrentMatches: number;
  timeouts: OrchestratorTimeouts;
  version: string;
}

export interface RefereeServiceDeps {
  settings: RefereeSettings;
  transport: RpcTransport;
  broadcaster: Pick<Broadcaster, 'deliver'>;
  /** Overrides the orchestrator's CSPRNG draw. */
  drawNumber?: () => number;
}

const LEAGUE_RECIPIENT_ID = 'league_manager';

const log = createComponentLogger('RefereeService');

/**
 * Referee peer: registers with the league manager, accepts match
 * assignments and runs them with bounded concurrency. Extra assignments
 * queue; none are rejected.
 */
export class RefereeService {
  private refereeId: string | null = null;
  private authToken: string | undefined;
  private readonly pool: TaskPool;
  private readonly matches = new Map<string, Promise<MatchOutcome>>();
  private readonly running = new Set<string>();

  constructor(private readonly deps: RefereeServiceDeps) {
    this.pool = new TaskPool(deps.settings.maxConcurrentMatches);
  }

  get id(): string | null {
    return this.refereeId;
  }

  private get league(): Recipient {
    return { id: LEAGUE_RECIPIENT_ID, endpoint: this.deps.settings.leagueEndpoint };
  }

  /**
   * Register with the league manager. Returns false when the league refused
   * or could not be reached.
   */
  async register(): Promise<boolean> {
    const { settings } = this.deps;
    const message = buildMessage('REFEREE_REGISTER_REQUEST', 'referee:unregistered', {
      referee_meta: {
        display_name: settings.displayName,
        contact_endpoint: settings.endpoint,
        version: settings.version,
        game_types: ['even_odd'],
        max_concurrent_matches: settings.maxConcurrentMatches,
      },
    });

    const delivery = await this.deps.broadcaster.deliver(this.league, message);
    if (!delivery.ok) {
      log.error('Registration with league manager failed', { error: delivery.error });
      return false;
    }

    const response = RegisterResponseSchema.safeParse(delivery.response);
    if (!response.success || response.data.status !== 'ACCEPTED' || !response.data.agent_id) {
      log.error('Registration rejected by league manager', {
        reason: response.success ? response.data.reason : 'malformed response',
      });
      return false;
    }

    this.refereeId = response.data.agent_id;
    this.authToken = response.data.auth_token ?? undefined;
    log.info('Registered with league manager', {
      refereeId: this.refereeId,
      auth_token: this.authToken,
    });
    return true;
  }

  /**
   * Accept an assignment and queue it. Repeated assignments for a match
   * already known are acknowledged without running it again.
   */
  startMatch(input: MatchAssignmentInput): { accepted: boolean; match_id: string; duplicate: boolean } {
    const refereeId = this.requireRegistered();
    const assignment: MatchAssignment = {
      matchId: input.match_id,
      roundId: input.round_id,
      leagueId: input.league_id,
      playerAId: input.player_A_id,
      playerBId: input.player_B_id,
      playerAEndpoint: input.player_A_endpoint,
      playerBEndpoint: input.player_B_endpoint,
    };

    if (this.matches.has(assignment.matchId)) {
      return { accepted: true, match_id: assignment.matchId, duplicate: true };
    }

    const orchestrator = new MatchOrchestrator({
      refereeId,
      authToken: this.authToken,
      transport: this.deps.transport,
      reporter: { report: (message) => this.reportToLeague(message) },
      timeouts: this.deps.settings.timeouts,
      standings: () => this.fetchStandings(),
      drawNumber: this.deps.drawNumber,
    });

    const execution = this.pool.run(async () => {
      this.running.add(assignment.matchId);
      try {
        return await orchestrator.run(assignment);
      } finally {
        this.running.delete(assignment.matchId);
      }
    });
    this.matches.set(assignment.matchId, execution);
    execution.catch((error: unknown) => {
      log.error('Match execution failed', {
        matchId: assignment.matchId,
        error: describeError(error),
      });
    });

    log.info('Match assignment accepted', {
      matchId: assignment.matchId,
      running: this.pool.running,
      queued: this.pool.queued,
    });
    return { accepted: true, match_id: assignment.matchId, duplicate: false };
  }

  /** Outcome of a match accepted earlier, once it has run. */
  outcomeOf(matchId: string): Promise<MatchOutcome> | undefined {
    return this.matches.get(matchId);
  }

  activeMatches(): { referee_id: string | null; running: string[]; queued: number } {
    return {
      referee_id: this.refereeId,
      running: [...this.running],
      queued: this.pool.queued,
    };
  }

  private reportToLeague(message: OutboundMessage): Promise<DeliveryResult> {
    return this.deps.broadcaster.deliver(this.league, message);
  }

  private async fetchStandings(): Promise<StandingSummary[]> {
    const raw = await this.deps.transport.call(
      this.deps.settings.leagueEndpoint,
      'get_standings',
      { sender: refereeSender(this.refereeId ?? 'unregistered') },
      { timeoutMs: this.deps.settings.timeouts.notifyTimeoutMs }
    );
    return StandingsResponseSchema.parse(raw).standings;
  }

  private requireRegistered(): string {
    if (!this.refereeId) {
      throw new LeagueError(
        LeagueErrorCode.AGENT_UNAUTHORIZED,
        'Referee is not registered with a league'
      );
    }
    return this.refereeId;
  }
}
