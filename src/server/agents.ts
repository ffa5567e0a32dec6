import { describeError } from '../shared/errors';
import type { AppConfig } from './config';
import { leagueRpcMethods } from './routes/leagueRoutes';
import { playerRpcMethods } from './routes/playerRoutes';
import { refereeRpcMethods } from './routes/refereeRoutes';
import { RpcClient } from './rpc/RpcClient';
import type { RpcMethodTable } from './rpc/rpcRouter';
import { Broadcaster } from './services/delivery/Broadcaster';
import { HealthMonitor, runRecoveryHandler } from './services/HealthMonitor';
import { AgentRegistry } from './services/league/AgentRegistry';
import { LeagueService } from './services/league/LeagueService';
import { LeagueStore } from './services/league/LeagueStore';
import { PlayerService } from './services/player/PlayerService';
import { createStrategy } from './services/player/strategies';
import { RefereeService } from './services/referee/RefereeService';
import { createComponentLogger } from './utils/logger';

/**
 * Everything index.ts needs to serve one role.
 */
export interface AgentRuntime {
  role: AppConfig['agent']['role'];
  methods: RpcMethodTable;
  agentId: () => string | null;
  /** Runs once the HTTP server accepts connections. */
  onListening: () => Promise<void>;
  onShutdown: () => Promise<void>;
}

const log = createComponentLogger('AgentRuntime');

async function createLeagueManagerRuntime(cfg: AppConfig): Promise<AgentRuntime> {
  const registry = new AgentRegistry({
    maxPlayers: cfg.league.maxPlayers,
    maxReferees: cfg.league.maxReferees,
  });
  const store = new LeagueStore(cfg.league.dataDir, cfg.league.id);
  const broadcaster = new Broadcaster(new RpcClient(cfg.delivery.timeoutMs), cfg.delivery);
  const league = new LeagueService({ leagueId: cfg.league.id, registry, store, broadcaster });
  await league.initialize();

  const monitor = new HealthMonitor({
    targets: () => league.monitoredAgents(),
    intervalMs: cfg.health.intervalMs,
    failureThreshold: cfg.health.failureThreshold,
  });
  const recovery = runRecoveryHandler(monitor.channel, (agentId, healthy) =>
    league.setAgentHealth(agentId, healthy)
  ).catch((error: unknown) => {
    log.error('Recovery handler stopped', { error: describeError(error) });
  });

  return {
    role: 'league_manager',
    methods: leagueRpcMethods(league),
    agentId: () => 'league_manager',
    onListening: async () => {
      monitor.start();
    },
    onShutdown: async () => {
      monitor.stop();
      monitor.channel.close();
      await recovery;
      await league.whenIdle();
    },
  };
}

function createRefereeRuntime(cfg: AppConfig): AgentRuntime {
  const transport = new RpcClient(cfg.delivery.timeoutMs);
  const referee = new RefereeService({
    settings: {
      displayName: cfg.agent.displayName,
      endpoint: cfg.agent.endpoint,
      leagueEndpoint: cfg.league.managerUrl,
      maxConcurrentMatches: cfg.match.maxConcurrentMatches,
      timeouts: {
        invitationTimeoutMs: cfg.match.invitationTimeoutMs,
        choiceTimeoutMs: cfg.match.choiceTimeoutMs,
        notifyTimeoutMs: cfg.match.notifyTimeoutMs,
      },
      version: cfg.app.version,
    },
    transport,
    broadcaster: new Broadcaster(transport, cfg.delivery),
  });

  return {
    role: 'referee',
    methods: refereeRpcMethods(referee),
    agentId: () => referee.id,
    onListening: async () => {
      if (!(await referee.register())) {
        log.warn('Referee is running unregistered; start_match will be refused');
      }
    },
    onShutdown: async () => {
      const active = referee.activeMatches();
      if (active.running.length > 0 || active.queued > 0) {
        log.warn('Shutting down with matches in flight', active);
      }
    },
  };
}

function createPlayerRuntime(cfg: AppConfig): AgentRuntime {
  const player = new PlayerService({
    settings: {
      displayName: cfg.agent.displayName,
      endpoint: cfg.agent.endpoint,
      leagueEndpoint: cfg.league.managerUrl,
      version: cfg.app.version,
    },
    broadcaster: new Broadcaster(new RpcClient(cfg.delivery.timeoutMs), cfg.delivery),
    strategy: createStrategy(cfg.player.strategy),
  });

  return {
    role: 'player',
    methods: playerRpcMethods(player),
    agentId: () => player.id,
    onListening: async () => {
      if (!(await player.register())) {
        log.warn('Player is running unregistered');
      }
    },
    onShutdown: async () => {
      log.info('Player record at shutdown', { ...player.summary() });
    },
  };
}

export async function createAgentRuntime(cfg: AppConfig): Promise<AgentRuntime> {
  switch (cfg.agent.role) {
    case 'league_manager':
      return createLeagueManagerRuntime(cfg);
    case 'referee':
      return createRefereeRuntime(cfg);
    case 'player':
      return createPlayerRuntime(cfg);
  }
}
