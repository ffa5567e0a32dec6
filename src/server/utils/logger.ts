import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Request context stored in AsyncLocalStorage so that every log line written
 * while serving an RPC call carries the same correlation id.
 */
export interface RequestContext {
  requestId: string;
  rpcMethod?: string;
  sender?: string;
  startTime?: number;
}

// ============================================================================
// Request Context (AsyncLocalStorage)
// ============================================================================

export const requestContextStorage = new AsyncLocalStorage<RequestContext>();

/**
 * Returns undefined if called outside of a request context.
 */
export const getRequestContext = (): RequestContext | undefined => {
  return requestContextStorage.getStore();
};

export const runWithContext = <T>(context: RequestContext, fn: () => T): T => {
  return requestContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects, matched case-insensitively.
 */
const SENSITIVE_KEY_PATTERNS = [/secret/i, /token/i, /auth/i, /bearer/i, /credential/i];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Shows the first 8 characters of a value (`tok_pp01` for player P01's
 * token) and hides the rest.
 */
export const redactToken = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 8)}...`;
};

/**
 * Recursively mask sensitive values in an object.
 *
 * @param maxDepth - Maximum recursion depth (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (isSensitiveKey(key)) {
      if (value === null || value === undefined) {
        result[key] = value;
      } else if (typeof value === 'string') {
        result[key] = redactToken(value);
      } else if (typeof value === 'object') {
        result[key] = maskSensitiveData(value, maxDepth - 1);
      } else {
        result[key] = '[REDACTED]';
      }
    } else {
      result[key] = maskSensitiveData(value, maxDepth - 1);
    }
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const serviceName = `parity-league-${config.agent.role}`;

/**
 * Adds the AsyncLocalStorage request context to log entries.
 */
const addRequestContext = winston.format((info) => {
  const context = getRequestContext();
  if (context) {
    info.requestId = context.requestId;
    if (context.rpcMethod) {
      info.rpcMethod = context.rpcMethod;
    }
    if (context.sender) {
      info.sender = context.sender;
    }
  }
  return info;
});

const structuredFormat = winston.format((info) => {
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  // Mask in place so winston's symbol-keyed fields survive.
  const { level, message, timestamp, ...rest } = info;
  const masked = maskSensitiveData(rest);
  if (typeof masked === 'object' && masked !== null) {
    Object.assign(info, masked);
  }
  return info;
});

/**
 * Structured JSON (production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Human-readable console output (development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addRequestContext(),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, requestId, service, environment, ...meta }) => {
    const reqIdStr = typeof requestId === 'string' ? ` [${requestId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${reqIdStr}: ${String(message)}${metaStr}`;
  })
);

function buildFileTransports(): winston.transport[] {
  const logsDir = path.join(process.cwd(), 'logs', config.agent.role);
  const combinedLogPath = config.logging.file
    ? path.resolve(config.logging.file)
    : path.join(logsDir, 'combined.log');

  fs.mkdirSync(logsDir, { recursive: true });
  fs.mkdirSync(path.dirname(combinedLogPath), { recursive: true });

  return [
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: combinedLogPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    }),
  ];
}

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: serviceName,
    environment: config.nodeEnv,
  },
  transports: config.logging.toFile ? buildFileTransports() : [],
});

logger.add(
  new winston.transports.Console({
    format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
  })
);

/**
 * Child logger carrying fixed metadata, e.g. `{ component: 'Broadcaster' }`.
 */
export const createComponentLogger = (component: string, meta: LogMeta = {}): winston.Logger =>
  logger.child({ component, ...meta });

export { logger };
