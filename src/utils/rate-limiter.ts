/**
 * Politeness delay between successive requests
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  private lastCompletedAt: number | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  /**
   * Wait until `delayMs` has passed since the previous call finished.
   * The first call never waits.
   */
  async waitForSlot(): Promise<void> {
    if (this.lastCompletedAt === null || this.delayMs <= 0) {
      return;
    }

    const elapsed = Date.now() - this.lastCompletedAt;
    const waitTime = Math.max(0, this.delayMs - elapsed);

    if (waitTime > 0) {
      await this.wait(waitTime);
    }
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    try {
      return await fn();
    } finally {
      this.lastCompletedAt = Date.now();
    }
  }
}
