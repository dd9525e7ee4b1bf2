/**
 * Counting semaphore with a FIFO wait queue and a bounded wait.
 */

export class SemaphoreTimeoutError extends Error {
  readonly waitedMs: number;

  constructor(waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for a permit`);
    this.name = 'SemaphoreTimeoutError';
    this.waitedMs = waitedMs;
  }
}

export interface SemaphoreStats {
  capacity: number;
  inFlight: number;
  queued: number;
  acquired: number;
  released: number;
  timedOut: number;
}

interface Waiter {
  grant: () => void;
  timer: ReturnType<typeof setTimeout> | null;
}

export class Semaphore {
  private permits: number;
  private readonly capacity: number;
  private queue: Waiter[] = [];
  private acquired = 0;
  private released = 0;
  private timedOut = 0;

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
    this.capacity = permits;
  }

  /**
   * Wait for a permit. Waiters are served in arrival order. With a
   * `timeoutMs`, a waiter still queued after that long is removed and the
   * promise rejects with SemaphoreTimeoutError.
   */
  acquire(timeoutMs?: number): Promise<void> {
    if (this.permits > 0 && this.queue.length === 0) {
      this.permits--;
      this.acquired++;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          if (waiter.timer) clearTimeout(waiter.timer);
          this.acquired++;
          resolve();
        },
        timer: null,
      };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const index = this.queue.indexOf(waiter);
          if (index !== -1) {
            this.queue.splice(index, 1);
            this.timedOut++;
            reject(new SemaphoreTimeoutError(timeoutMs));
          }
        }, timeoutMs);
      }
      this.queue.push(waiter);
    });
  }

  /** Return a permit. The permit passes straight to the oldest waiter, if any. */
  release(): void {
    if (this.inFlight === 0) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.released++;
    const next = this.queue.shift();
    if (next) {
      next.grant();
    } else {
      this.permits++;
    }
  }

  async withPermit<T>(fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get inFlight(): number {
    return this.acquired - this.released;
  }

  stats(): SemaphoreStats {
    return {
      capacity: this.capacity,
      inFlight: this.inFlight,
      queued: this.queue.length,
      acquired: this.acquired,
      released: this.released,
      timedOut: this.timedOut,
    };
  }
}
