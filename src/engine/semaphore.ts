/**
 * Counting semaphore for concurrency control.
 * Gates invocations globally and per agent.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<{ resolve: () => void; reject: (err: unknown) => void }> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error("Semaphore permits must be >= 1");
    }
    this.permits = permits;
    this.maxPermits = permits;
  }

  /**
   * Acquire a permit. Blocks if none available.
   * Rejects with the signal's reason if aborted while waiting.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const waiter = {
        resolve: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
        reject,
      };
      const onAbort = () => {
        this.waiting = this.waiting.filter((w) => w !== waiter);
        reject(signal?.reason);
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiting.push(waiter);
    });
  }

  /**
   * Release a permit. Hands it to the next waiter if any.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next.resolve();
      return;
    }
    if (this.permits >= this.maxPermits) {
      throw new Error(
        `Semaphore over-release: already at max permits (${this.maxPermits})`,
      );
    }
    this.permits++;
  }

  /** Run `fn` holding one permit */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  /**
   * Number of permits currently available.
   */
  get available(): number {
    return this.permits;
  }

  /** Number of blocked acquirers */
  get pending(): number {
    return this.waiting.length;
  }
}
