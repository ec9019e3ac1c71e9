/**
 * Exclusive async lock for engine state. Waiters are served in arrival
 * order; the lock passes straight from one holder to the next waiter.
 */

import { elapsedSince } from '../utils/timer.js';

export interface LockStats {
  acquisitions: number;
  /** Acquisitions that had to wait for another holder. */
  contended: number;
  waiting: number;
  maxWaiting: number;
  totalWaitMs: number;
}

export class AsyncMutex {
  private held = false;
  private waiters: Array<() => void> = [];
  private acquisitions = 0;
  private contended = 0;
  private maxWaiting = 0;
  private totalWaitMs = 0;

  /** Resolves with a release function once the lock is held. */
  acquire(): Promise<() => void> {
    if (!this.held) {
      this.held = true;
      this.acquisitions++;
      return Promise.resolve(this.releaser());
    }

    const queuedAt = performance.now();
    this.contended++;
    return new Promise<() => void>((resolve) => {
      this.waiters.push(() => {
        this.acquisitions++;
        this.totalWaitMs += elapsedSince(queuedAt);
        resolve(this.releaser());
      });
      this.maxWaiting = Math.max(this.maxWaiting, this.waiters.length);
    });
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.held;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  getStats(): LockStats {
    return {
      acquisitions: this.acquisitions,
      contended: this.contended,
      waiting: this.waiters.length,
      maxWaiting: this.maxWaiting,
      totalWaitMs: this.totalWaitMs,
    };
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.held = false;
      }
    };
  }
}
