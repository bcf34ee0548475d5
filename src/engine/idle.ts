/**
 * Counters that must all be zero for the blackboard to be idle.
 */
export interface IdleSnapshot {
  in_flight: number; // invocations submitted and not settled
  pending_dispatch: number; // artifacts published and not yet matched
  open_batches: number; // batch buffers with a timeout flush pending
  pending_timers: number; // bounded agent timers with fires left
}

export function isQuiet(snapshot: IdleSnapshot): boolean {
  return (
    snapshot.in_flight === 0 &&
    snapshot.pending_dispatch === 0 &&
    snapshot.open_batches === 0 &&
    snapshot.pending_timers === 0
  );
}

/**
 * Resolves waiters once the probe reports nothing pending.
 *
 * Producers call notify() after any counter may have dropped. The check is
 * repeated on a microtask so a decrement immediately followed by an
 * increment in the same tick never reads as idle.
 */
export class IdleTracker {
  private readonly waiters = new Set<() => void>();
  private checkQueued = false;

  constructor(private readonly probe: () => IdleSnapshot) {}

  snapshot(): IdleSnapshot {
    return this.probe();
  }

  isIdle(): boolean {
    return isQuiet(this.probe());
  }

  notify(): void {
    if (this.waiters.size === 0 || this.checkQueued) return;
    this.checkQueued = true;
    queueMicrotask(() => {
      this.checkQueued = false;
      if (!this.isIdle()) return;
      const ready = [...this.waiters];
      this.waiters.clear();
      for (const resolve of ready) resolve();
    });
  }

  /**
   * True once idle, false if `timeoutMs` elapses first.
   */
  wait(timeoutMs: number): Promise<boolean> {
    if (this.isIdle()) return Promise.resolve(true);
    return new Promise((resolve) => {
      const waiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        resolve(false);
      }, timeoutMs);
      this.waiters.add(waiter);
    });
  }

  /** Waiters currently blocked */
  get waiting(): number {
    return this.waiters.size;
  }
}
