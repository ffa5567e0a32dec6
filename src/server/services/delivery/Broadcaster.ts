import { describeError, PeerRpcError } from '../../../shared/errors';
import { delay, runWithTimeout } from '../../../shared/utils/timeout';
import { OutboundMessage, rpcMethodFor } from '../../rpc/methods';
import type { RpcTransport } from '../../rpc/RpcClient';
import { createComponentLogger } from '../../utils/logger';
import { getMetricsService } from '../MetricsService';
import { DeliveryReport } from './DeliveryReport';

export interface Recipient {
  id: string;
  endpoint?: string | null;
}

export interface DeliveryPolicy {
  /** Per-attempt deadline. */
  timeoutMs: number;
  /** Attempts = maxRetries + 1. */
  maxRetries: number;
  /** Wait backoffMs * (attempt + 1) after a failed attempt. */
  backoffMs: number;
}

export const DEFAULT_DELIVERY_POLICY: DeliveryPolicy = {
  timeoutMs: 5000,
  maxRetries: 2,
  backoffMs: 500,
};

export type DeliveryResult =
  | { ok: true; attempts: number; response: unknown }
  | { ok: false; attempts: number; error: string };

export interface BroadcasterDeps {
  sleep?: (ms: number) => Promise<void>;
}

const log = createComponentLogger('Broadcaster');

/**
 * Retrying fan-out of protocol messages. Failures never throw; they are
 * returned as a DeliveryResult or collected in a DeliveryReport.
 */
export class Broadcaster {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly transport: RpcTransport,
    private readonly policy: DeliveryPolicy = DEFAULT_DELIVERY_POLICY,
    deps: BroadcasterDeps = {}
  ) {
    this.sleep = deps.sleep ?? delay;
  }

  /**
   * Deliver to every recipient concurrently.
   */
  async broadcast(recipients: readonly Recipient[], message: OutboundMessage): Promise<DeliveryReport> {
    const report = new DeliveryReport(recipients.length);

    const results = await Promise.all(
      recipients.map(async (recipient) => ({
        recipient,
        result: await this.deliver(recipient, message),
      }))
    );

    for (const { recipient, result } of results) {
      if (result.ok) {
        report.recordSuccess();
      } else {
        report.recordFailure(recipient.id, result.error);
      }
    }

    const summary = {
      messageType: message.message_type,
      successful: report.successful,
      total: report.total,
      failedIds: report.failedIds,
    };
    if (report.failed > 0) {
      log.warn(`Broadcast delivered ${report.successful}/${report.total}`, summary);
    } else {
      log.info(`Broadcast delivered ${report.successful}/${report.total}`, summary);
    }

    return report;
  }

  /**
   * Deliver to one recipient with bounded retries. A JSON-RPC error reply
   * is a definitive answer and is not retried.
   */
  async deliver(recipient: Recipient, message: OutboundMessage): Promise<DeliveryResult> {
    const method = rpcMethodFor(message);
    const metrics = getMetricsService();

    if (!recipient.endpoint) {
      metrics.recordDelivery(method, 'failure');
      return { ok: false, attempts: 0, error: 'No endpoint registered' };
    }
    const endpoint = recipient.endpoint;

    const maxAttempts = this.policy.maxRetries + 1;
    let lastError = 'unknown error';

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        const outcome = await runWithTimeout(
          () => this.transport.call(endpoint, method, message, { timeoutMs: this.policy.timeoutMs }),
          { timeoutMs: this.policy.timeoutMs }
        );
        if (outcome.kind === 'ok') {
          metrics.recordDelivery(method, 'success');
          return { ok: true, attempts: attempt + 1, response: outcome.value };
        }
        lastError = `Timed out after ${this.policy.timeoutMs}ms`;
      } catch (error) {
        lastError = describeError(error);
        if (error instanceof PeerRpcError) {
          log.warn('Recipient rejected message', {
            recipientId: recipient.id,
            method,
            error: lastError,
          });
          metrics.recordDelivery(method, 'failure');
          return { ok: false, attempts: attempt + 1, error: lastError };
        }
      }

      log.debug('Delivery attempt failed', {
        recipientId: recipient.id,
        method,
        attempt: attempt + 1,
        maxAttempts,
        error: lastError,
      });

      if (attempt < maxAttempts - 1) {
        await this.sleep(this.policy.backoffMs * (attempt + 1));
      }
    }

    metrics.recordDelivery(method, 'failure');
    return { ok: false, attempts: maxAttempts, error: lastError };
  }
}
