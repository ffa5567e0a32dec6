/**
 * MetricsService - Prometheus metrics for league peers.
 *
 * - RPC request counts per method and outcome
 * - Match outcomes and durations (referee)
 * - Broadcast delivery outcomes (all roles)
 * - Peer health transitions (league manager)
 *
 * All metrics are registered with the default prom-client registry and
 * exposed via the /metrics endpoint.
 */

import client, { Registry, Counter, Histogram } from 'prom-client';

export type RpcOutcome = 'ok' | 'error';
export type MatchOutcome = 'completed' | 'aborted';
export type DeliveryOutcome = 'success' | 'failure';
export type HealthTransition = 'unhealthy' | 'recovered';

/**
 * Singleton MetricsService class that manages all Prometheus metrics.
 */
export class MetricsService {
  private static instance: MetricsService | null = null;
  private readonly registry: Registry;

  /** Counter: JSON-RPC requests served */
  public readonly rpcRequestsTotal: Counter<'method' | 'outcome'>;

  /** Counter: Matches finished by this referee */
  public readonly matchesTotal: Counter<'outcome'>;

  /** Histogram: Wall-clock match duration in seconds */
  public readonly matchDuration: Histogram<'outcome'>;

  /** Counter: Per-recipient delivery results */
  public readonly deliveriesTotal: Counter<'method' | 'outcome'>;

  /** Counter: Health state changes observed by the monitor */
  public readonly healthTransitionsTotal: Counter<'transition'>;

  private constructor() {
    this.registry = client.register;

    this.rpcRequestsTotal = new Counter({
      name: 'league_rpc_requests_total',
      help: 'Total number of JSON-RPC requests served',
      labelNames: ['method', 'outcome'] as const,
    });

    this.matchesTotal = new Counter({
      name: 'league_matches_total',
      help: 'Total number of matches run to completion or abort',
      labelNames: ['outcome'] as const,
    });

    this.matchDuration = new Histogram({
      name: 'league_match_duration_seconds',
      help: 'Duration of a match from invitation to report',
      labelNames: ['outcome'] as const,
      buckets: [0.05, 0.1, 0.5, 1, 2.5, 5, 10, 30, 60],
    });

    this.deliveriesTotal = new Counter({
      name: 'league_broadcast_deliveries_total',
      help: 'Per-recipient delivery results after retries',
      labelNames: ['method', 'outcome'] as const,
    });

    this.healthTransitionsTotal = new Counter({
      name: 'league_agent_health_transitions_total',
      help: 'Agent health state changes',
      labelNames: ['transition'] as const,
    });
  }

  public static getInstance(): MetricsService {
    if (!MetricsService.instance) {
      MetricsService.instance = new MetricsService();
    }
    return MetricsService.instance;
  }

  /**
   * Reset the singleton instance (for testing only).
   */
  public static resetInstance(): void {
    if (MetricsService.instance) {
      client.register.clear();
      MetricsService.instance = null;
    }
  }

  public recordRpcRequest(method: string, outcome: RpcOutcome): void {
    this.rpcRequestsTotal.inc({ method, outcome });
  }

  public recordMatch(outcome: MatchOutcome, durationSeconds: number): void {
    this.matchesTotal.inc({ outcome });
    this.matchDuration.observe({ outcome }, durationSeconds);
  }

  public recordDelivery(method: string, outcome: DeliveryOutcome): void {
    this.deliveriesTotal.inc({ method, outcome });
  }

  public recordHealthTransition(transition: HealthTransition): void {
    this.healthTransitionsTotal.inc({ transition });
  }

  /**
   * Get metrics in Prometheus text format.
   */
  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}

export const getMetricsService = (): MetricsService => MetricsService.getInstance();
