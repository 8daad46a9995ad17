/** Returns a permit. Calling it more than once is a no-op. */
export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  timer: NodeJS.Timeout;
}

/**
 * FIFO counting semaphore with bounded waits.
 *
 * `acquire` resolves with a release function, or with `null` when no permit
 * frees up within the timeout. Permits are handed directly to the oldest
 * waiter on release, so a burst of new callers cannot starve queued ones.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];
  private idleWatchers: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(timeoutMs: number): Promise<Release | null> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          const idx = this.waiters.indexOf(waiter);
          if (idx !== -1) this.waiters.splice(idx, 1);
          resolve(null);
          this.notifyIfIdle();
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /** Resolves once every permit is back and nobody is queued. */
  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWatchers.push(resolve);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (next !== undefined) {
      clearTimeout(next.timer);
      next.grant(this.createRelease());
      return;
    }
    this.available++;
    this.notifyIfIdle();
  }

  private isIdle(): boolean {
    return this.available === this.capacity && this.waiters.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const watchers = this.idleWatchers;
    this.idleWatchers = [];
    for (const watch of watchers) watch();
  }
}
