import type { Clock } from './types.js';
import type { Logger } from './logger.js';

/**
 * Serial request spacing: each call waits until `delayMs` has passed since the previous one.
 * Not safe for concurrent callers on the same instance.
 */
export class RateLimiter {
  private lastRequestTime: number | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  async waitForSlot(): Promise<void> {
    if (this.lastRequestTime !== null) {
      const elapsed = this.clock.now() - this.lastRequestTime;
      if (elapsed < this.delayMs) {
        const waitMs = this.delayMs - elapsed;
        this.logger.debug(`Rate limiting: waiting ${(waitMs / 1000).toFixed(2)} seconds`);
        await this.clock.sleep(waitMs);
      }
    }

    this.lastRequestTime = this.clock.now();
  }
}
