/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for all environment variables,
 * validates them at startup, and exports a typed env object.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Which peer this process runs as.
 */
export const AgentRoleSchema = z.enum(['league_manager', 'referee', 'player']);
export type AgentRole = z.infer<typeof AgentRoleSchema>;

/**
 * Log level schema (winston npm levels in use by this service).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val === 'true' || val === '1'));

const millis = (defaultValue: number) => z.coerce.number().int().min(1).default(defaultValue);

/**
 * Complete environment variable schema with validation rules and defaults.
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  NODE_ENV: NodeEnvSchema.default('development'),

  PORT: z.coerce.number().int().min(1).max(65535).default(8000),

  HOST: z.string().default('0.0.0.0'),

  AGENT_ROLE: AgentRoleSchema.default('league_manager'),

  /** Human-readable name sent at registration */
  AGENT_DISPLAY_NAME: z.string().min(1).max(64).optional(),

  /** Endpoint other peers use to reach this process; defaults to localhost:PORT/mcp */
  PUBLIC_ENDPOINT: z.string().url().optional(),

  npm_package_version: z.string().optional(),

  // ===================================================================
  // LEAGUE
  // ===================================================================

  LEAGUE_ID: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'LEAGUE_ID may only contain letters, digits, _ and -')
    .default('league_2025_even_odd'),

  LEAGUE_MANAGER_URL: z.string().url().default('http://localhost:8000/mcp'),

  DATA_DIR: z.string().min(1).default('data'),

  MAX_PLAYERS: z.coerce.number().int().min(2).max(500).default(50),

  MAX_REFEREES: z.coerce.number().int().min(1).max(100).default(10),

  // ===================================================================
  // TIMEOUTS & DELIVERY
  // ===================================================================

  INVITATION_TIMEOUT_MS: millis(5000),

  CHOICE_TIMEOUT_MS: millis(30000),

  NOTIFY_TIMEOUT_MS: millis(5000),

  BROADCAST_TIMEOUT_MS: millis(5000),

  BROADCAST_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),

  /** Base for the linear backoff: wait base*(attempt+1) between attempts */
  BROADCAST_BACKOFF_MS: z.coerce.number().int().min(0).default(500),

  PLAYER_STRATEGY: z.enum(['random', 'always_even', 'always_odd']).default('random'),

  REFEREE_MAX_CONCURRENT_MATCHES: z.coerce.number().int().min(1).max(32).default(2),

  /** 0 disables peer health polling */
  HEALTH_CHECK_INTERVAL_MS: z.coerce.number().int().min(0).default(0),

  HEALTH_FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(3),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.optional(),

  LOG_FORMAT: LogFormatSchema.optional(),

  LOG_FILE: z.string().optional(),

  LOG_TO_FILE: booleanFlag(true),
});

export type RawEnv = z.infer<typeof EnvSchema>;

export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

export function parseEnv(
  env: Record<string, string | undefined> = process.env
): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Under Jest the effective environment is always "test", even if a .env file
 * says otherwise.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}
