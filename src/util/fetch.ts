import { setTimeout as delay } from 'node:timers/promises';
import { fetch as undiciFetch } from 'undici';
import { createLogger } from './logging.js';
import { scheduleWithLimit } from './limiter.js';
import { withBreaker, CircuitOpenError } from './circuit.js';

const log = createLogger();

type HttpRequest = {
  method: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
};

type HttpResponse = {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
};

// Use standard fetch in test environment for nock compatibility
async function send(url: string, init: HttpRequest): Promise<HttpResponse> {
  if (process.env.NODE_ENV === 'test') {
    return globalThis.fetch(url, init);
  }
  return undiciFetch(url, init);
}

const ALLOWLIST = new Set<string>([
  'api.rainforestapi.com',
]);

/** Adds a collaborator host (e.g. the configured catalog service) to the outbound allowlist. */
export function allowHost(host: string): void {
  ALLOWLIST.add(host.toLowerCase());
}

export type FetchErrorKind = 'timeout' | 'http' | 'network' | 'cancelled';

export class ExternalFetchError extends Error {
  kind: FetchErrorKind;
  status?: number;
  constructor(kind: FetchErrorKind, message: string, status?: number) {
    super(message);
    this.name = 'ExternalFetchError';
    this.kind = kind;
    this.status = status;
  }
}

const BASE_DELAY = 200;
const MAX_DELAY = 5000;
const JITTER_FACTOR = 0.25;

function backoffMs(attempt: number, retryAfterSec?: number): number {
  if (retryAfterSec && Number.isFinite(retryAfterSec)) {
    return Math.min(Math.max(100, retryAfterSec * 1000), MAX_DELAY);
  }
  const expDelay = BASE_DELAY * Math.pow(1.5, attempt);
  const jitter = expDelay * JITTER_FACTOR * (Math.random() * 2 - 1);
  return Math.min(expDelay + jitter, MAX_DELAY);
}

function isRetryable(err: ExternalFetchError): boolean {
  if (err.kind === 'cancelled') return false;
  if (err.kind === 'http') return err.status === 429 || (err.status ?? 0) >= 500;
  return true;
}

export type FetchJSONOptions = {
  method?: 'GET' | 'POST';
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
  retries?: number;
  target?: string;
  signal?: AbortSignal;
};

/**
 * Fetches JSON with a per-attempt timeout and exponential backoff retry with
 * jitter. Each attempt runs through the host's rate limiter and breaker.
 * The response body is returned unvalidated; callers parse it with zod.
 */
export async function fetchJSON(url: string, opts: FetchJSONOptions = {}): Promise<unknown> {
  const timeoutMs = opts.timeoutMs ?? 4000;
  const retries = opts.retries ?? 2;
  const target = opts.target ?? 'unknown';

  let host: string;
  try {
    host = new URL(url).hostname.toLowerCase();
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  if (!ALLOWLIST.has(host)) {
    throw new ExternalFetchError('network', 'host_not_allowed');
  }

  const headers: Record<string, string> = { Accept: 'application/json', ...opts.headers };
  let body: string | undefined;
  if (opts.body !== undefined) {
    headers['Content-Type'] = 'application/json';
    body = JSON.stringify(opts.body);
  }

  let lastErr: ExternalFetchError = new ExternalFetchError('network', 'network_error');

  for (let i = 0; i <= retries; i++) {
    if (opts.signal?.aborted) throw new ExternalFetchError('cancelled', 'cancelled');
    const start = Date.now();
    let retryAfterSec: number | undefined;

    const exec = async (): Promise<unknown> => {
      const ac = new AbortController();
      const timer = setTimeout(() => ac.abort(), timeoutMs);
      const signal = opts.signal ? AbortSignal.any([ac.signal, opts.signal]) : ac.signal;
      try {
        log.debug({ target, attempt: i + 1, url }, 'API request attempt');
        const res = await send(url, { method: opts.method ?? 'GET', headers, body, signal });
        if (!res.ok) {
          const retryAfter = res.headers.get('retry-after');
          retryAfterSec = retryAfter ? parseInt(retryAfter, 10) : undefined;
          throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
        }
        const text = await res.text();
        try {
          return JSON.parse(text);
        } catch {
          throw new ExternalFetchError('network', 'json_parse_error');
        }
      } catch (err: unknown) {
        if (err instanceof ExternalFetchError) throw err;
        if (opts.signal?.aborted) throw new ExternalFetchError('cancelled', 'cancelled');
        if (ac.signal.aborted) throw new ExternalFetchError('timeout', 'timeout');
        throw new ExternalFetchError('network', err instanceof Error ? err.message : 'network_error');
      } finally {
        clearTimeout(timer);
      }
    };

    try {
      const result = await scheduleWithLimit(host, () => withBreaker(host, exec));
      log.debug({ target, duration: Date.now() - start }, 'API request successful');
      return result;
    } catch (err: unknown) {
      if (err instanceof CircuitOpenError) {
        throw new ExternalFetchError('network', 'circuit_open');
      }
      lastErr = err instanceof ExternalFetchError ? err : new ExternalFetchError('network', 'network_error');
      log.debug({ target, kind: lastErr.kind, status: lastErr.status, duration: Date.now() - start }, 'API request failed');
      if (!isRetryable(lastErr)) throw lastErr;
      if (i < retries) {
        try {
          await delay(backoffMs(i, retryAfterSec), undefined, { signal: opts.signal });
        } catch {
          throw new ExternalFetchError('cancelled', 'cancelled');
        }
      }
    }
  }

  log.warn({ target, totalAttempts: retries + 1, kind: lastErr.kind }, 'All attempts failed');
  throw lastErr;
}
