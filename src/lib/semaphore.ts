/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export class SemaphoreAbortedError extends Error {
  constructor() {
    super('Semaphore acquire aborted');
    this.name = 'SemaphoreAbortedError';
  }
}

interface Waiter {
  resolve: () => void;
  reject: (err: Error) => void;
  cleanup: () => void;
}

/**
 * An async semaphore. The block scheduler holds one permit per dispatched
 * height until its result has been consumed, which bounds the reorder buffer.
 *
 * Usage:
 *   const sem = new Semaphore(4);
 *
 *   await sem.acquire({ signal });
 *   try {
 *     // ... do work ...
 *   } finally {
 *     sem.release();
 *   }
 */
export class Semaphore {
  private permits: number;
  private waiting: Waiter[] = [];

  /**
   * @param permits Maximum number of concurrent acquisitions allowed
   */
  constructor(permits: number) {
    if (permits < 1) {
      throw new Error('Semaphore permits must be at least 1');
    }
    this.permits = permits;
  }

  /**
   * Acquire a permit. Resolves immediately if permits are available,
   * otherwise waits until a permit is released. Rejects if the signal aborts
   * first.
   */
  acquire({ signal }: { signal?: AbortSignal } = {}): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new SemaphoreAbortedError());
    }

    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const remove = () => {
        const index = this.waiting.indexOf(waiter);
        if (index !== -1) {
          this.waiting.splice(index, 1);
        }
      };
      const onAbort = () => {
        remove();
        waiter.cleanup();
        reject(new SemaphoreAbortedError());
      };

      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => {
          signal?.removeEventListener('abort', onAbort);
        },
      };
      this.waiting.push(waiter);

      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Release a permit, handing it to the oldest waiter if there is one.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next.cleanup();
      next.resolve();
    } else {
      this.permits++;
    }
  }

  availablePermits(): number {
    return this.permits;
  }

  queueLength(): number {
    return this.waiting.length;
  }
}
