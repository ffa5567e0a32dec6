/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import {
  AgentRoleSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  parseEnv,
} from './env';

// Skip in test mode so .env cannot override test-specific env vars.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env = envResult.data;

const nodeEnv = getEffectiveNodeEnv(env);
const isProduction = nodeEnv === 'production';
const isTest = nodeEnv === 'test';
const isDevelopment = nodeEnv === 'development';

const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
  }),
  agent: z.object({
    role: AgentRoleSchema,
    displayName: z.string().min(1),
    endpoint: z.string().url(),
  }),
  league: z.object({
    id: z.string().min(1),
    managerUrl: z.string().url(),
    dataDir: z.string().min(1),
    maxPlayers: z.number().int().positive(),
    maxReferees: z.number().int().positive(),
  }),
  match: z.object({
    invitationTimeoutMs: z.number().int().positive(),
    choiceTimeoutMs: z.number().int().positive(),
    notifyTimeoutMs: z.number().int().positive(),
    maxConcurrentMatches: z.number().int().positive(),
  }),
  player: z.object({
    strategy: z.enum(['random', 'always_even', 'always_odd']),
  }),
  delivery: z.object({
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    backoffMs: z.number().int().nonnegative(),
  }),
  health: z.object({
    intervalMs: z.number().int().nonnegative(),
    failureThreshold: z.number().int().positive(),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
    toFile: z.boolean(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

const defaultDisplayNames = {
  league_manager: 'League Manager',
  referee: 'Referee',
  player: 'Player',
} as const;

const preliminaryConfig: AppConfig = {
  nodeEnv,
  isProduction,
  isDevelopment,
  isTest,
  app: {
    version: env.npm_package_version ?? '1.0.0',
  },
  server: {
    port: env.PORT,
    host: env.HOST,
  },
  agent: {
    role: env.AGENT_ROLE,
    displayName: env.AGENT_DISPLAY_NAME ?? defaultDisplayNames[env.AGENT_ROLE],
    endpoint: env.PUBLIC_ENDPOINT ?? `http://localhost:${env.PORT}/mcp`,
  },
  league: {
    id: env.LEAGUE_ID,
    managerUrl: env.LEAGUE_MANAGER_URL,
    dataDir: env.DATA_DIR,
    maxPlayers: env.MAX_PLAYERS,
    maxReferees: env.MAX_REFEREES,
  },
  match: {
    invitationTimeoutMs: env.INVITATION_TIMEOUT_MS,
    choiceTimeoutMs: env.CHOICE_TIMEOUT_MS,
    notifyTimeoutMs: env.NOTIFY_TIMEOUT_MS,
    maxConcurrentMatches: env.REFEREE_MAX_CONCURRENT_MATCHES,
  },
  player: {
    strategy: env.PLAYER_STRATEGY,
  },
  delivery: {
    timeoutMs: env.BROADCAST_TIMEOUT_MS,
    maxRetries: env.BROADCAST_MAX_RETRIES,
    backoffMs: env.BROADCAST_BACKOFF_MS,
  },
  health: {
    intervalMs: env.HEALTH_CHECK_INTERVAL_MS,
    failureThreshold: env.HEALTH_FAILURE_THRESHOLD,
  },
  logging: {
    level: env.LOG_LEVEL ?? (isDevelopment ? 'debug' : 'info'),
    format: env.LOG_FORMAT ?? (isProduction ? 'json' : 'pretty'),
    file: env.LOG_FILE?.trim() || undefined,
    toFile: env.LOG_TO_FILE && !isTest,
  },
};

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
