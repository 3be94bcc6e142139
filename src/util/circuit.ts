import CircuitBreaker from 'opossum';

type BreakerStats = {
  state: 'closed' | 'open' | 'halfOpen';
  opens: number;
  failures: number;
  rejects: number;
  successes: number;
};

type Task = () => Promise<unknown>;

const breakers = new Map<string, CircuitBreaker<[Task], unknown>>();
const stats = new Map<string, BreakerStats>();

function getConfig(host: string): CircuitBreaker.Options {
  const defaultReset = Number(process.env.EXT_BREAKER_RESET_MS || 15000);
  const defaultErrorPct = Number(process.env.EXT_BREAKER_ERROR_PCT || 50);
  const defaultVolume = Number(process.env.EXT_BREAKER_VOLUME || 10);

  // Per-host overrides
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  const resetTimeout = Number(process.env[`BREAK_RESET_MS_${hostKey}`] || defaultReset);
  const errorThresholdPercentage = Number(process.env[`BREAK_ERROR_PCT_${hostKey}`] || defaultErrorPct);
  const volumeThreshold = Number(process.env[`BREAK_VOLUME_${hostKey}`] || defaultVolume);

  return {
    // Request timeouts are owned by the caller's AbortSignal.
    timeout: false,
    resetTimeout,
    errorThresholdPercentage,
    volumeThreshold,
    rollingCountTimeout: 10000,
  };
}

function getBreaker(host: string): CircuitBreaker<[Task], unknown> {
  const existing = breakers.get(host);
  if (existing) return existing;

  const breaker = new CircuitBreaker<[Task], unknown>((fn: Task) => fn(), getConfig(host));
  const hostStats: BreakerStats = { state: 'closed', opens: 0, failures: 0, rejects: 0, successes: 0 };
  stats.set(host, hostStats);

  breaker.on('open', () => {
    hostStats.state = 'open';
    hostStats.opens++;
  });
  breaker.on('halfOpen', () => {
    hostStats.state = 'halfOpen';
  });
  breaker.on('close', () => {
    hostStats.state = 'closed';
  });
  breaker.on('reject', () => {
    hostStats.rejects++;
  });
  breaker.on('failure', () => {
    hostStats.failures++;
  });
  breaker.on('success', () => {
    hostStats.successes++;
  });

  breakers.set(host, breaker);
  return breaker;
}

export class CircuitOpenError extends Error {
  constructor(host: string) {
    super(`Circuit breaker is open for ${host}`);
    this.name = 'CircuitBreakerOpenError';
  }
}

export async function withBreaker<T>(host: string, fn: () => Promise<T>): Promise<T> {
  const breaker = getBreaker(host);
  const box: { result?: { value: T } } = {};
  try {
    await breaker.fire(async () => {
      box.result = { value: await fn() };
    });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EOPENBREAKER') {
      throw new CircuitOpenError(host);
    }
    throw err;
  }
  if (!box.result) throw new CircuitOpenError(host);
  return box.result.value;
}

export function getBreakerStats(host: string): BreakerStats | null {
  const s = stats.get(host);
  return s ? { ...s } : null;
}
