import axios, { AxiosInstance } from 'axios';
import {
  LeagueError,
  PeerRpcError,
  PeerTimeoutError,
  PeerUnavailableError,
} from '../../shared/errors';
import { JsonRpcResponseSchema } from '../../shared/validation/protocolSchemas';
import { logger } from '../utils/logger';

export type PeerErrorType =
  | 'timeout'
  | 'connection_refused'
  | 'http_status'
  | 'rpc_error'
  | 'invalid_response'
  | 'unknown';

export interface RpcCallOptions {
  timeoutMs?: number;
}

/**
 * Outbound JSON-RPC calls to another peer. Resolves with the `result`
 * member; every failure rejects with a LeagueError.
 */
export interface RpcTransport {
  call(
    endpoint: string,
    method: string,
    params: object,
    options?: RpcCallOptions
  ): Promise<unknown>;
}

interface HttpFailureShape {
  code?: string;
  message?: string;
  response?: { status?: number };
}

function asHttpFailure(error: unknown): HttpFailureShape {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }
  const shape: HttpFailureShape = {};
  if ('code' in error && typeof error.code === 'string') shape.code = error.code;
  if ('message' in error && typeof error.message === 'string') shape.message = error.message;
  if ('response' in error && typeof error.response === 'object' && error.response !== null) {
    const response = error.response;
    shape.response = {
      status: 'status' in response && typeof response.status === 'number' ? response.status : undefined,
    };
  }
  return shape;
}

export function categorizePeerError(error: unknown): PeerErrorType {
  if (error instanceof PeerRpcError) {
    return error.rpcCode === undefined ? 'invalid_response' : 'rpc_error';
  }
  const err = asHttpFailure(error);
  if (err.code === 'ECONNREFUSED') return 'connection_refused';
  if (err.code === 'ETIMEDOUT' || err.code === 'ECONNABORTED') return 'timeout';
  if (err.response?.status !== undefined) return 'http_status';
  return 'unknown';
}

/**
 * axios-backed JSON-RPC client. One instance per process; the per-call
 * timeout overrides the instance default.
 */
export class RpcClient implements RpcTransport {
  private readonly client: AxiosInstance;
  private readonly defaultTimeoutMs: number;
  private nextId = 1;

  constructor(defaultTimeoutMs: number = 5000) {
    this.defaultTimeoutMs = defaultTimeoutMs;
    this.client = axios.create({
      timeout: defaultTimeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });
  }

  async call(
    endpoint: string,
    method: string,
    params: object,
    options: RpcCallOptions = {}
  ): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const id = this.nextId++;

    let data: unknown;
    try {
      const response = await this.client.post(
        endpoint,
        { jsonrpc: '2.0', method, params, id },
        { timeout: timeoutMs }
      );
      data = response.data;
    } catch (error) {
      throw this.toPeerError(error, endpoint, method, timeoutMs);
    }

    const parsed = JsonRpcResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new PeerRpcError(endpoint, 'malformed JSON-RPC response', undefined, { method });
    }

    const body = parsed.data;
    if ('error' in body) {
      throw new PeerRpcError(endpoint, body.error.message, body.error.code, {
        method,
        data: body.error.data,
      });
    }
    return body.result;
  }

  private toPeerError(
    error: unknown,
    endpoint: string,
    method: string,
    timeoutMs: number
  ): LeagueError {
    const type = categorizePeerError(error);
    const err = asHttpFailure(error);

    logger.debug('Peer call failed', {
      endpoint,
      method,
      type,
      code: err.code,
      status: err.response?.status,
      error: err.message,
    });

    switch (type) {
      case 'timeout':
        return new PeerTimeoutError(endpoint, timeoutMs, { method });
      case 'connection_refused':
        return new PeerUnavailableError(endpoint, 'connection refused', { method });
      case 'http_status':
        return new PeerUnavailableError(endpoint, `HTTP ${err.response?.status}`, {
          method,
          status: err.response?.status,
        });
      default:
        return new PeerUnavailableError(endpoint, err.message ?? 'unknown error', { method });
    }
  }
}
