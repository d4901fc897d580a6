/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Collects values completed out of order and releases them in strictly
 * increasing height order. Iteration ends once every height up to the one
 * passed to `close()` has been released.
 */
export class ReorderBuffer<T> {
  private pending = new Map<number, { value: T }>();
  private nextHeight: number;
  private lastHeight: number | undefined;
  private notify: (() => void) | undefined;

  constructor(startHeight: number) {
    this.nextHeight = startHeight;
  }

  put(height: number, value: T): void {
    if (height < this.nextHeight || this.pending.has(height)) {
      throw new Error(`Duplicate result for height ${height}`);
    }
    if (this.lastHeight !== undefined && height > this.lastHeight) {
      throw new Error(
        `Height ${height} is beyond the closed range ending at ${this.lastHeight}`,
      );
    }
    this.pending.set(height, { value });
    this.wake();
  }

  /**
   * Declare the last height that will ever be put. Pass `start - 1` when
   * nothing was dispatched.
   */
  close(lastHeight: number): void {
    this.lastHeight = lastHeight;
    this.wake();
  }

  size(): number {
    return this.pending.size;
  }

  next(): number {
    return this.nextHeight;
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = undefined;
    notify?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (this.lastHeight === undefined || this.nextHeight <= this.lastHeight) {
      const entry = this.pending.get(this.nextHeight);
      if (entry !== undefined) {
        this.pending.delete(this.nextHeight);
        this.nextHeight++;
        yield entry.value;
        continue;
      }

      await new Promise<void>((resolve) => {
        this.notify = resolve;
      });
    }
  }
}
