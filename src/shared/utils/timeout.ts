// Timeout helpers for peer calls.
//
// Every suspending network call carries an explicit deadline. On expiry the
// call is abandoned (not cancelled remotely) and the caller decides policy:
// abort for invitations and choices, log for notifications, retry for
// broadcasts.

export type TimedOperationOutcome = 'ok' | 'timeout';

export type TimedOperationResult<T> =
  | { kind: 'ok'; durationMs: number; value: T }
  | { kind: 'timeout'; durationMs: number };

export interface TimedOperationOptions {
  /** Maximum allowed duration in milliseconds. */
  timeoutMs: number;
  /** Clock dependency (overridable for tests). Defaults to Date.now. */
  now?: () => number;
}

class TimedOperationExpired extends Error {
  constructor(timeoutMs: number) {
    super(`Timed operation exceeded ${timeoutMs}ms`);
    this.name = 'TimedOperationExpired';
  }
}

/**
 * Run an async operation with an upper time bound, returning a structured
 * result instead of throwing on timeout. Errors raised by the operation
 * itself are rethrown.
 */
export async function runWithTimeout<T>(
  operation: () => Promise<T>,
  options: TimedOperationOptions
): Promise<TimedOperationResult<T>> {
  const { timeoutMs, now = Date.now } = options;
  const start = now();

  let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => reject(new TimedOperationExpired(timeoutMs)), timeoutMs);
  });

  try {
    const value = await Promise.race([operation(), timeoutPromise]);
    return { kind: 'ok', durationMs: now() - start, value };
  } catch (error) {
    if (error instanceof TimedOperationExpired) {
      return { kind: 'timeout', durationMs: now() - start };
    }
    throw error;
  } finally {
    if (timeoutHandle !== undefined) {
      clearTimeout(timeoutHandle);
    }
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
