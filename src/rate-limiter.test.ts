import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from './rate-limiter.js';
import type { Logger } from './logger.js';
import type { Clock } from './types.js';
import { systemClock } from './utils.js';

const createLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

function createFakeClock(start: number = 1_000_000) {
  let current = start;
  const sleep = vi.fn(async (ms: number) => {
    current += ms;
  });
  const clock: Clock = { now: () => current, sleep };
  return {
    clock,
    sleep,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('RateLimiter', () => {
  it('should not wait before the first request', async () => {
    const { clock, sleep } = createFakeClock();
    const limiter = new RateLimiter(1000, clock, createLogger());

    await limiter.waitForSlot();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('should wait the full delay between back-to-back requests', async () => {
    const { clock, sleep } = createFakeClock();
    const logger = createLogger();
    const limiter = new RateLimiter(1000, clock, logger);

    await limiter.waitForSlot();
    await limiter.waitForSlot();

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(logger.debug).toHaveBeenCalledWith('Rate limiting: waiting 1.00 seconds');
  });

  it('should only wait for the remainder of the delay', async () => {
    const { clock, sleep, advance } = createFakeClock();
    const limiter = new RateLimiter(1000, clock, createLogger());

    await limiter.waitForSlot();
    advance(400);
    await limiter.waitForSlot();

    expect(sleep).toHaveBeenCalledWith(600);
  });

  it('should not wait once the delay has passed', async () => {
    const { clock, sleep, advance } = createFakeClock();
    const limiter = new RateLimiter(1000, clock, createLogger());

    await limiter.waitForSlot();
    advance(1500);
    await limiter.waitForSlot();

    expect(sleep).not.toHaveBeenCalled();
  });

  it('should stamp the time after waiting', async () => {
    const { clock, sleep, advance } = createFakeClock();
    const limiter = new RateLimiter(1000, clock, createLogger());

    await limiter.waitForSlot();
    await limiter.waitForSlot();
    advance(250);
    await limiter.waitForSlot();

    expect(sleep.mock.calls).toEqual([[1000], [750]]);
  });

  it('should block in real time with the system clock', async () => {
    const limiter = new RateLimiter(50, systemClock, createLogger());

    await limiter.waitForSlot();
    const started = Date.now();
    await limiter.waitForSlot();

    expect(Date.now() - started).toBeGreaterThanOrEqual(45);
  });
});
