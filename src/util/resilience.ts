import {
  retry,
  handleWhen,
  timeout,
  ExponentialBackoff,
  TimeoutStrategy,
  wrap,
  circuitBreaker,
  ConsecutiveBreaker,
  TaskCancelledError,
} from 'cockatiel';
import Bottleneck from 'bottleneck';
import { createLogger } from './logging.js';
import { ExternalFetchError } from './fetch.js';

const log = createLogger();

const DEFAULT_CONFIG = {
  retries: 1,
  initialDelay: 200,
  maxDelay: 2000,
  maxConcurrent: 3,
  minTime: 100,
  circuitBreakerThreshold: 5,
  circuitBreakerDuration: 30000,
};

type ServiceConfig = typeof DEFAULT_CONFIG;

// Per-service configurations
const SERVICE_CONFIGS: Record<string, Partial<ServiceConfig>> = {
  tavily: { retries: 1, maxConcurrent: 2, minTime: 250 },
  rainforest: { retries: 1, maxConcurrent: 3, minTime: 200 },
  catalog: { retries: 1, maxConcurrent: 8, minTime: 0 },
  llm: { retries: 0, maxConcurrent: 4, minTime: 0 },
};

export function isAbortError(error: unknown): boolean {
  return error instanceof TaskCancelledError || (error instanceof Error && error.name === 'AbortError');
}

/** Failures worth another attempt: not aborts, not client errors other than 429. */
export function isTransientError(error: unknown): boolean {
  if (isAbortError(error)) return false;
  if (error instanceof ExternalFetchError) {
    if (error.kind === 'cancelled') return false;
    if (error.kind === 'http') return error.status === 429 || (error.status ?? 500) >= 500;
  }
  return true;
}

function getServiceConfig(service: string): ServiceConfig {
  return { ...DEFAULT_CONFIG, ...SERVICE_CONFIGS[service] };
}

function buildPolicy(service: string) {
  const config = getServiceConfig(service);
  const retryPolicy = retry(handleWhen(isTransientError), {
    maxAttempts: config.retries,
    backoff: new ExponentialBackoff({ initialDelay: config.initialDelay, maxDelay: config.maxDelay }),
  });
  const breakerPolicy = circuitBreaker(handleWhen(isTransientError), {
    halfOpenAfter: config.circuitBreakerDuration,
    breaker: new ConsecutiveBreaker(config.circuitBreakerThreshold),
  });
  return wrap(breakerPolicy, retryPolicy);
}

const limiters = new Map<string, Bottleneck>();
const policies = new Map<string, ReturnType<typeof buildPolicy>>();

function getLimiter(service: string): Bottleneck {
  const existing = limiters.get(service);
  if (existing) return existing;
  const config = getServiceConfig(service);
  const limiter = new Bottleneck({ minTime: config.minTime, maxConcurrent: config.maxConcurrent });
  limiters.set(service, limiter);
  return limiter;
}

function getPolicy(service: string): ReturnType<typeof buildPolicy> {
  const existing = policies.get(service);
  if (existing) return existing;
  const policy = buildPolicy(service);
  policies.set(service, policy);
  return policy;
}

/**
 * Runs `fn` with an aggressive timeout. The signal handed to `fn` fires when
 * either the timeout elapses or the caller's signal aborts; a timeout rejects
 * with cockatiel's TaskCancelledError.
 */
export async function withTimeout<T>(
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  const policy = timeout(timeoutMs, TimeoutStrategy.Aggressive);
  return policy.execute(({ signal: inner }) => fn(inner), signal);
}

/**
 * Execute function with retry, circuit breaker and rate limiting for a named
 * collaborator service.
 */
export async function withResilience<T>(
  service: string,
  fn: (signal: AbortSignal) => Promise<T>,
  signal?: AbortSignal,
): Promise<T> {
  if (signal?.aborted) {
    throw new DOMException('Aborted', 'AbortError');
  }

  const limiter = getLimiter(service);
  const policy = getPolicy(service);

  const execute = async (inner: AbortSignal) => {
    try {
      return await fn(inner);
    } catch (error) {
      log.debug({ service, error: error instanceof Error ? error.message : String(error) }, 'External call failed');
      throw error;
    }
  };

  return limiter.schedule(() => policy.execute(({ signal: inner }) => execute(inner), signal));
}
