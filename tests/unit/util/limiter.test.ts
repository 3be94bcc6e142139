import { createPool, getLimiter, getLimiterStats, scheduleWithLimit } from '../../../src/util/limiter.js';

describe('limiter', () => {
  test('reuses one limiter per host', () => {
    expect(getLimiter('pool.test')).toBe(getLimiter('pool.test'));
    expect(getLimiterStats('unknown.test')).toBeNull();
  });

  test('schedules work through the host limiter', async () => {
    await expect(scheduleWithLimit('pool.test', async () => 42)).resolves.toBe(42);
    expect(getLimiterStats('pool.test')).toEqual({ queued: 0, running: 0 });
  });

  test('createPool bounds concurrency', async () => {
    const pool = createPool(2);
    let running = 0;
    let peak = 0;
    const task = async () => {
      running += 1;
      peak = Math.max(peak, running);
      await new Promise((r) => setTimeout(r, 10));
      running -= 1;
    };
    await Promise.all(Array.from({ length: 6 }, () => pool.schedule(task)));
    expect(peak).toBe(2);
  });
});
