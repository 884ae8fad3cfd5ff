// packages/ledger/src/stream-lock.ts
import { LedgerError } from "./errors.js";

type Waiter = {
  grant: (release: () => void) => void;
  timer: NodeJS.Timeout;
};

/**
 * FIFO exclusive lock for one stream's tail.
 * Waiters that are not granted within the timeout leave the queue with LOCK_TIMEOUT.
 */
export class StreamLock {
  private held = false;
  private queue: Waiter[] = [];

  constructor(private readonly streamId: string) {}

  get locked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.queue.length;
  }

  acquire(timeoutMs: number): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          this.queue = this.queue.filter((w) => w !== waiter);
          reject(
            new LedgerError("LOCK_TIMEOUT", `stream ${this.streamId} busy for ${timeoutMs}ms`, {
              stream: this.streamId,
            })
          );
        }, timeoutMs),
      };
      this.queue.push(waiter);
    });
  }

  /** Runs fn while holding the lock. */
  async run<T>(timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (!next) {
        this.held = false;
        return;
      }
      clearTimeout(next.timer);
      next.grant(this.releaser());
    };
  }
}
