import { BrokenCircuitError, TaskCancelledError } from 'cockatiel';
import { ExternalFetchError } from '../util/fetch.js';

export interface StandardError {
  code: string;
  message: string;
  details?: unknown;
  causeId?: string;
}

/**
 * Maps collaborator failures (HTTP, timeouts, breakers, aborts) to the
 * standard error shape used in logs and degradation notes.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error instanceof ExternalFetchError) {
    if (error.kind === 'timeout') {
      return { code: 'timeout', message: 'Request timeout', causeId: ctx };
    }
    if (error.kind === 'cancelled') {
      return { code: 'cancelled', message: 'Request cancelled', causeId: ctx };
    }
    if (error.kind === 'http') {
      const status = error.status ?? 500;
      if (status === 401 || status === 403) {
        return { code: 'auth_error', message: 'Authentication failed', details: { status }, causeId: ctx };
      }
      if (status === 429) {
        return { code: 'rate_limit', message: 'Rate limit exceeded', details: { status }, causeId: ctx };
      }
      return { code: 'http_error', message: error.message, details: { status }, causeId: ctx };
    }
    if (error.message === 'circuit_open') {
      return { code: 'circuit_open', message: 'Circuit breaker is open', causeId: ctx };
    }
    return { code: 'network_error', message: error.message, causeId: ctx };
  }

  if (error instanceof TaskCancelledError) {
    return { code: 'timeout', message: 'Operation timed out', causeId: ctx };
  }

  if (error instanceof BrokenCircuitError) {
    return { code: 'circuit_open', message: 'Circuit breaker is open', causeId: ctx };
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError') {
      return { code: 'cancelled', message: 'Request cancelled', causeId: ctx };
    }
    return { code: 'unknown_error', message: error.message, causeId: ctx };
  }

  return {
    code: 'unknown_error',
    message: 'Unknown error occurred',
    details: error,
    causeId: ctx,
  };
}
