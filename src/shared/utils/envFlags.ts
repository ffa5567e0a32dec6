// Helpers for reading environment flags outside the validated config layer
// (which needs them before it has parsed anything).

export function readEnv(name: string): string | undefined {
  const value = process.env[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * is configured differently.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}
