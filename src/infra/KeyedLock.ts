import { TimeoutError } from '../domain/errors.js';

type Waiter = {
  grant: () => void;
  timer: NodeJS.Timeout;
};

/**
 * KeyedLock - FIFO mutual exclusion per key
 * Holders of different keys never wait on each other.
 */
export class KeyedLock {
  private held = new Set<string>();
  private queues = new Map<string, Waiter[]>();

  async runExclusive<T>(key: string, timeoutMs: number, fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  private acquire(key: string, timeoutMs: number): Promise<void> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(waiter.timer);
          resolve();
        },
        timer: setTimeout(() => {
          this.removeWaiter(key, waiter);
          reject(new TimeoutError(`Lock on ${key}`, timeoutMs));
        }, timeoutMs),
      };
      const queue = this.queues.get(key) ?? [];
      queue.push(waiter);
      this.queues.set(key, queue);
    });
  }

  private release(key: string): void {
    const queue = this.queues.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.queues.delete(key);
    }
    if (next) {
      // Ownership passes straight to the next waiter; the key stays held
      next.grant();
      return;
    }
    this.held.delete(key);
  }

  private removeWaiter(key: string, waiter: Waiter): void {
    const queue = this.queues.get(key);
    if (!queue) return;
    const index = queue.indexOf(waiter);
    if (index >= 0) queue.splice(index, 1);
    if (queue.length === 0) this.queues.delete(key);
  }
}
