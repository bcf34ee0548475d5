import type { BatchSpec } from "./types.js";

/**
 * Buffer of units (artifacts or join groups) for one batch subscription.
 *
 * One timer per buffer lifetime: armed by the first unit, cleared by any flush.
 * The buffer is empty after every flush.
 */
export class BatchAccumulator<U> {
  private buffer: U[] = [];
  private timer: ReturnType<typeof setTimeout> | undefined;

  constructor(
    private readonly spec: BatchSpec,
    private readonly onTimeout: (units: U[]) => void,
  ) {}

  /**
   * Add one unit. Returns the flushed units when this unit fills the batch.
   */
  add(unit: U): U[] | undefined {
    this.buffer.push(unit);

    if (this.spec.size !== undefined && this.buffer.length >= this.spec.size) {
      return this.flush();
    }

    if (this.spec.timeout_ms !== undefined && this.timer === undefined) {
      this.timer = setTimeout(() => {
        this.timer = undefined;
        const units = this.flush();
        if (units.length > 0) this.onTimeout(units);
      }, this.spec.timeout_ms);
    }
    return undefined;
  }

  /** Empty the buffer and disarm the timer */
  flush(): U[] {
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    const units = this.buffer;
    this.buffer = [];
    return units;
  }

  get size(): number {
    return this.buffer.length;
  }

  /** True while a timeout flush is pending */
  get armed(): boolean {
    return this.timer !== undefined;
  }
}
