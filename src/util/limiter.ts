import Bottleneck from 'bottleneck';

const pools = new Map<string, Bottleneck>();

function getConfig(host: string) {
  const defaultMinTime = Number(process.env.EXT_RATE_MIN_TIME_MS || 100);
  const defaultMaxConcurrency = Number(process.env.EXT_RATE_MAX_CONCURRENCY || 4);

  // Per-host overrides
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  const minTime = Number(process.env[`RATE_MIN_MS_${hostKey}`] || defaultMinTime);
  const maxConcurrent = Number(process.env[`RATE_MAX_CONC_${hostKey}`] || defaultMaxConcurrency);

  return { minTime, maxConcurrent };
}

export function getLimiter(host: string): Bottleneck {
  const existing = pools.get(host);
  if (existing) return existing;
  const config = getConfig(host);
  const limiter = new Bottleneck({
    minTime: config.minTime,
    maxConcurrent: config.maxConcurrent,
  });
  pools.set(host, limiter);
  return limiter;
}

export async function scheduleWithLimit<T>(host: string, fn: () => Promise<T>): Promise<T> {
  return getLimiter(host).schedule(() => fn());
}

/**
 * Bounded-concurrency pool owned by one component (not shared by host).
 */
export function createPool(maxConcurrent: number, minTime = 0): Bottleneck {
  return new Bottleneck({ maxConcurrent: Math.max(1, maxConcurrent), minTime });
}

export function getLimiterStats(host: string) {
  const limiter = pools.get(host);
  if (!limiter) return null;

  return {
    queued: limiter.queued(),
    running: limiter.running(),
  };
}
