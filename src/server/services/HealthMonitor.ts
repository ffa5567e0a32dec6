/**
 * Polls the /health endpoint of every registered agent and reports
 * transitions between healthy and unhealthy.
 */

import axios from 'axios';
import { EventEmitter } from 'events';
import { describeError } from '../../shared/errors';
import { createComponentLogger } from '../utils/logger';
import type { Recipient } from './delivery/Broadcaster';
import { getMetricsService } from './MetricsService';

export interface AgentUnhealthyEvent {
  agent_id: string;
  error: string;
}

export interface AgentRecoveredEvent {
  agent_id: string;
}

export interface HealthMonitorEvents {
  agentUnhealthy: (event: AgentUnhealthyEvent) => void;
  agentRecovered: (event: AgentRecoveredEvent) => void;
}

/** Transition carried from the monitor to the recovery coordinator. */
export type AgentHealthEvent =
  | { type: 'AgentUnhealthy'; agent_id: string; error: string }
  | { type: 'AgentRecovered'; agent_id: string };

/**
 * Single-consumer queue of health transitions. `receive` resolves with null
 * once the channel is closed and drained.
 */
export class HealthEventChannel {
  private readonly buffered: AgentHealthEvent[] = [];
  private waiting: ((event: AgentHealthEvent | null) => void) | null = null;
  private closed = false;

  send(event: AgentHealthEvent): void {
    if (this.closed) {
      return;
    }
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(event);
      return;
    }
    this.buffered.push(event);
  }

  receive(): Promise<AgentHealthEvent | null> {
    const next = this.buffered.shift();
    if (next) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.closed = true;
    if (this.waiting) {
      const resolve = this.waiting;
      this.waiting = null;
      resolve(null);
    }
  }
}

export type HealthProbe = (endpoint: string) => Promise<void>;

export interface HealthMonitorOptions {
  /** Targets to poll; read again on every check. */
  targets: () => Recipient[];
  intervalMs: number;
  failureThreshold: number;
  probeTimeoutMs?: number;
  probe?: HealthProbe;
}

interface AgentHealthState {
  consecutiveFailures: number;
  unhealthy: boolean;
}

const log = createComponentLogger('HealthMonitor');

export function healthUrl(endpoint: string): string {
  return new URL('/health', endpoint).toString();
}

export const httpHealthProbe =
  (timeoutMs: number): HealthProbe =>
  async (endpoint) => {
    await axios.get(healthUrl(endpoint), { timeout: timeoutMs });
  };

export class HealthMonitor extends EventEmitter {
  readonly channel = new HealthEventChannel();
  private readonly states = new Map<string, AgentHealthState>();
  private readonly probe: HealthProbe;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: HealthMonitorOptions) {
    super();
    this.probe = options.probe ?? httpHealthProbe(options.probeTimeoutMs ?? 2000);
  }

  override on<E extends keyof HealthMonitorEvents>(event: E, listener: HealthMonitorEvents[E]): this {
    return super.on(event, listener);
  }

  override emit<E extends keyof HealthMonitorEvents>(
    event: E,
    ...args: Parameters<HealthMonitorEvents[E]>
  ): boolean {
    return super.emit(event, ...args);
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer || this.options.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.checkOnce().catch((error: unknown) => {
        log.error('Health check pass failed', { error: describeError(error) });
      });
    }, this.options.intervalMs);
    this.timer.unref();
    log.info('Health monitoring started', {
      intervalMs: this.options.intervalMs,
      failureThreshold: this.options.failureThreshold,
    });
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Health monitoring stopped');
    }
  }

  /** Probe every target once. */
  async checkOnce(): Promise<void> {
    const targets = this.options.targets();
    await Promise.all(targets.map((target) => this.checkAgent(target)));
  }

  isUnhealthy(agentId: string): boolean {
    return this.states.get(agentId)?.unhealthy ?? false;
  }

  private async checkAgent(target: Recipient): Promise<void> {
    const state = this.states.get(target.id) ?? { consecutiveFailures: 0, unhealthy: false };
    this.states.set(target.id, state);

    let failure: string | null = null;
    if (!target.endpoint) {
      failure = 'No endpoint registered';
    } else {
      try {
        await this.probe(target.endpoint);
      } catch (error) {
        failure = describeError(error);
      }
    }

    if (failure === null) {
      state.consecutiveFailures = 0;
      if (state.unhealthy) {
        state.unhealthy = false;
        log.info('Agent recovered', { agentId: target.id });
        getMetricsService().recordHealthTransition('recovered');
        this.emit('agentRecovered', { agent_id: target.id });
        this.channel.send({ type: 'AgentRecovered', agent_id: target.id });
      }
      return;
    }

    state.consecutiveFailures++;
    log.debug('Health probe failed', {
      agentId: target.id,
      consecutiveFailures: state.consecutiveFailures,
      error: failure,
    });
    if (!state.unhealthy && state.consecutiveFailures >= this.options.failureThreshold) {
      state.unhealthy = true;
      log.warn('Agent marked unhealthy', { agentId: target.id, error: failure });
      getMetricsService().recordHealthTransition('unhealthy');
      this.emit('agentUnhealthy', { agent_id: target.id, error: failure });
      this.channel.send({ type: 'AgentUnhealthy', agent_id: target.id, error: failure });
    }
  }
}

/**
 * Recovery coordinator: drains the monitor's channel and flags agents in the
 * registry. Resolves once the channel is closed.
 */
export async function runRecoveryHandler(
  channel: HealthEventChannel,
  setHealth: (agentId: string, healthy: boolean) => boolean
): Promise<void> {
  for (let event = await channel.receive(); event !== null; event = await channel.receive()) {
    const healthy = event.type === 'AgentRecovered';
    if (!setHealth(event.agent_id, healthy)) {
      log.debug('Health transition for unknown agent', {
        agentId: event.agent_id,
        type: event.type,
      });
    }
  }
}
