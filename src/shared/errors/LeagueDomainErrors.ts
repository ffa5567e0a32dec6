/**
 * League Domain Errors - Structured error types for the league domain
 *
 * Error Categories:
 * - **Configuration Errors**: bad scheduler input, bad start-up settings
 * - **Match Errors**: illegal state transitions, invalid choices, unknown matches
 * - **Round Errors**: lifecycle calls made in the wrong round state
 * - **Peer Errors**: timeouts, unreachable peers, JSON-RPC error replies
 * - **Registration Errors**: capacity, missing endpoints, bad tokens
 *
 * Usage:
 * ```typescript
 * import { InvalidTransitionError } from './LeagueDomainErrors';
 *
 * throw new InvalidTransitionError('FINISHED', 'ABORTED', { matchId });
 * ```
 *
 * @module LeagueDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Enumeration of all league domain error codes.
 *
 * Error codes are prefixed by category:
 * - CONFIG_*: Configuration and plan-build errors
 * - MATCH_*: Per-match protocol violations
 * - ROUND_*: Lifecycle errors
 * - PEER_*: Remote peer failures
 * - REGISTRATION_* / AGENT_*: Registry errors
 */
export enum LeagueErrorCode {
  // Configuration Errors
  CONFIG_SCHEDULE_INPUT = 'CONFIG_SCHEDULE_INPUT',

  // Match Errors
  MATCH_INVALID_TRANSITION = 'MATCH_INVALID_TRANSITION',
  MATCH_INVALID_CHOICE = 'MATCH_INVALID_CHOICE',
  MATCH_NOT_FOUND = 'MATCH_NOT_FOUND',

  // Round Errors
  ROUND_INVALID_STATE = 'ROUND_INVALID_STATE',
  ROUND_NOT_FOUND = 'ROUND_NOT_FOUND',
  LEAGUE_ALREADY_STARTED = 'LEAGUE_ALREADY_STARTED',
  LEAGUE_NOT_STARTED = 'LEAGUE_NOT_STARTED',

  // Peer Errors
  PEER_TIMEOUT = 'PEER_TIMEOUT',
  PEER_UNAVAILABLE = 'PEER_UNAVAILABLE',
  PEER_RPC_ERROR = 'PEER_RPC_ERROR',
  PEER_INVALID_RESPONSE = 'PEER_INVALID_RESPONSE',

  // Registration Errors
  REGISTRATION_REJECTED = 'REGISTRATION_REJECTED',
  PLAYER_NOT_FOUND = 'PLAYER_NOT_FOUND',
  REFEREE_NOT_FOUND = 'REFEREE_NOT_FOUND',
  AGENT_UNAUTHORIZED = 'AGENT_UNAUTHORIZED',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * HTTP-style status for each code, used when an error crosses the RPC boundary.
 */
export const ERROR_HTTP_STATUS: Record<LeagueErrorCode, number> = {
  [LeagueErrorCode.CONFIG_SCHEDULE_INPUT]: 400,

  [LeagueErrorCode.MATCH_INVALID_TRANSITION]: 409,
  [LeagueErrorCode.MATCH_INVALID_CHOICE]: 400,
  [LeagueErrorCode.MATCH_NOT_FOUND]: 404,

  [LeagueErrorCode.ROUND_INVALID_STATE]: 409,
  [LeagueErrorCode.ROUND_NOT_FOUND]: 404,
  [LeagueErrorCode.LEAGUE_ALREADY_STARTED]: 409,
  [LeagueErrorCode.LEAGUE_NOT_STARTED]: 409,

  [LeagueErrorCode.PEER_TIMEOUT]: 504,
  [LeagueErrorCode.PEER_UNAVAILABLE]: 503,
  [LeagueErrorCode.PEER_RPC_ERROR]: 502,
  [LeagueErrorCode.PEER_INVALID_RESPONSE]: 502,

  [LeagueErrorCode.REGISTRATION_REJECTED]: 409,
  [LeagueErrorCode.PLAYER_NOT_FOUND]: 404,
  [LeagueErrorCode.REFEREE_NOT_FOUND]: 404,
  [LeagueErrorCode.AGENT_UNAUTHORIZED]: 403,

  [LeagueErrorCode.INTERNAL_ERROR]: 500,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all league domain errors.
 */
export class LeagueError extends Error {
  /** Error code for programmatic handling */
  readonly code: LeagueErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether the error ends the operation it was raised in (match, plan build) */
  readonly isFatal: boolean;

  readonly timestamp: Date;

  constructor(
    code: LeagueErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'LeagueError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, LeagueError.prototype);
  }

  get httpStatus(): number {
    return ERROR_HTTP_STATUS[this.code] ?? 500;
  }

  toJSON(): LeagueErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface LeagueErrorJSON {
  error: true;
  code: LeagueErrorCode;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Bad input to plan construction or start-up. Never retried.
 */
export class ConfigurationError extends LeagueError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(LeagueErrorCode.CONFIG_SCHEDULE_INPUT, message, context, true);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export class InvalidTransitionError extends LeagueError {
  constructor(from: string, to: string, context: Record<string, unknown> = {}) {
    super(
      LeagueErrorCode.MATCH_INVALID_TRANSITION,
      `Invalid match transition: ${from} -> ${to}`,
      { from, to, ...context },
      true
    );
    this.name = 'InvalidTransitionError';
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * A player answered a choice request with something other than a legal symbol.
 */
export class InvalidChoiceError extends LeagueError {
  constructor(playerId: string, received: unknown, context: Record<string, unknown> = {}) {
    super(
      LeagueErrorCode.MATCH_INVALID_CHOICE,
      `Invalid parity choice from ${playerId}: ${JSON.stringify(received) ?? 'undefined'}`,
      { playerId, received, ...context },
      true
    );
    this.name = 'InvalidChoiceError';
    Object.setPrototypeOf(this, InvalidChoiceError.prototype);
  }
}

export class UnknownMatchError extends LeagueError {
  constructor(matchId: string, context: Record<string, unknown> = {}) {
    super(LeagueErrorCode.MATCH_NOT_FOUND, `Match not found: ${matchId}`, {
      matchId,
      ...context,
    });
    this.name = 'UnknownMatchError';
    Object.setPrototypeOf(this, UnknownMatchError.prototype);
  }
}

/**
 * A lifecycle call made while the round is in the wrong state
 * (starting a started round, completing an unfinished one).
 */
export class RoundStateError extends LeagueError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(LeagueErrorCode.ROUND_INVALID_STATE, message, context, true);
    this.name = 'RoundStateError';
    Object.setPrototypeOf(this, RoundStateError.prototype);
  }
}

export class PlayerNotFoundError extends LeagueError {
  constructor(playerId: string, context: Record<string, unknown> = {}) {
    super(LeagueErrorCode.PLAYER_NOT_FOUND, `Player not found: ${playerId}`, {
      playerId,
      ...context,
    });
    this.name = 'PlayerNotFoundError';
    Object.setPrototypeOf(this, PlayerNotFoundError.prototype);
  }
}

export class RegistrationRejectedError extends LeagueError {
  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(LeagueErrorCode.REGISTRATION_REJECTED, reason, { reason, ...context });
    this.name = 'RegistrationRejectedError';
    Object.setPrototypeOf(this, RegistrationRejectedError.prototype);
  }
}

export class UnauthorizedAgentError extends LeagueError {
  constructor(agentId: string, context: Record<string, unknown> = {}) {
    super(
      LeagueErrorCode.AGENT_UNAUTHORIZED,
      `Agent ${agentId} is not authorized for this operation`,
      { agentId, ...context }
    );
    this.name = 'UnauthorizedAgentError';
    Object.setPrototypeOf(this, UnauthorizedAgentError.prototype);
  }
}

export class PeerTimeoutError extends LeagueError {
  constructor(endpoint: string, timeoutMs: number, context: Record<string, unknown> = {}) {
    super(
      LeagueErrorCode.PEER_TIMEOUT,
      `Peer ${endpoint} timed out after ${timeoutMs}ms`,
      { endpoint, timeoutMs, ...context }
    );
    this.name = 'PeerTimeoutError';
    Object.setPrototypeOf(this, PeerTimeoutError.prototype);
  }
}

export class PeerUnavailableError extends LeagueError {
  constructor(endpoint: string, reason: string, context: Record<string, unknown> = {}) {
    super(LeagueErrorCode.PEER_UNAVAILABLE, `Peer ${endpoint} unavailable: ${reason}`, {
      endpoint,
      reason,
      ...context,
    });
    this.name = 'PeerUnavailableError';
    Object.setPrototypeOf(this, PeerUnavailableError.prototype);
  }
}

/**
 * The peer answered, but with a JSON-RPC error member or a malformed body.
 */
export class PeerRpcError extends LeagueError {
  readonly rpcCode: number | undefined;

  constructor(
    endpoint: string,
    message: string,
    rpcCode?: number,
    context: Record<string, unknown> = {}
  ) {
    super(
      rpcCode === undefined ? LeagueErrorCode.PEER_INVALID_RESPONSE : LeagueErrorCode.PEER_RPC_ERROR,
      `Peer ${endpoint} returned an error: ${message}`,
      { endpoint, rpcCode, ...context }
    );
    this.name = 'PeerRpcError';
    this.rpcCode = rpcCode;
    Object.setPrototypeOf(this, PeerRpcError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isLeagueError(error: unknown): error is LeagueError {
  return error instanceof LeagueError;
}

export function getHttpStatus(error: unknown): number {
  if (isLeagueError(error)) {
    return error.httpStatus;
  }
  return 500;
}

/**
 * Short human-readable description of any thrown value, for logs and reports.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
