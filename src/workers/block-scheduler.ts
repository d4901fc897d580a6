/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as fastq } from 'fastq';
import type { queueAsPromised } from 'fastq';
import winston from 'winston';

import { errorSummary } from '../lib/error.js';
import { ReorderBuffer } from '../lib/reorder-buffer.js';
import { Semaphore, SemaphoreAbortedError } from '../lib/semaphore.js';
import * as metrics from '../metrics.js';
import { BlockResult, HeightRange } from '../types.js';
import { TaskOutcome, TaskSignals } from './receipt-fetcher.js';

export const DEFAULT_THREAD_COUNT = 100;
export const DEFAULT_GRACE_PERIOD_MS = 5000;

export type BlockTask = (
  height: number,
  signals: TaskSignals,
) => Promise<TaskOutcome>;

const stopsOnFatal = (result: BlockResult) => result.status === 'FATAL';

/**
 * Runs one task per height on a bounded worker pool and yields the results in
 * strictly increasing height order.
 *
 * At most `bufferCapacity` heights are dispatched but not yet consumed, so a
 * slow consumer or a stalled low height pauses dispatch instead of growing the
 * reorder buffer.
 */
export class BlockScheduler {
  private log: winston.Logger;
  private task: BlockTask;
  private threadCount: number;
  private bufferCapacity: number;
  private gracePeriodMs: number;
  private stopDispatchOn: (result: BlockResult) => boolean;

  constructor({
    log,
    task,
    threadCount = DEFAULT_THREAD_COUNT,
    bufferCapacity,
    gracePeriodMs = DEFAULT_GRACE_PERIOD_MS,
    stopDispatchOn = stopsOnFatal,
  }: {
    log: winston.Logger;
    task: BlockTask;
    threadCount?: number;
    bufferCapacity?: number;
    gracePeriodMs?: number;
    stopDispatchOn?: (result: BlockResult) => boolean;
  }) {
    if (!Number.isInteger(threadCount) || threadCount < 1) {
      throw new Error(`threadCount must be a positive integer: ${threadCount}`);
    }
    this.log = log.child({ class: this.constructor.name });
    this.task = task;
    this.threadCount = threadCount;
    this.bufferCapacity = Math.max(
      bufferCapacity ?? threadCount * 2,
      threadCount,
    );
    this.gracePeriodMs = gracePeriodMs;
    this.stopDispatchOn = stopDispatchOn;
  }

  /**
   * Yields a result for every height in `range` until the range is exhausted,
   * a result stops dispatch, or `signal` aborts. Returning early (breaking out
   * of the loop) stops dispatch and waits for in-flight tasks.
   */
  async *run({
    start,
    end,
    signal,
  }: HeightRange & { signal?: AbortSignal }): AsyncGenerator<BlockResult> {
    const log = this.log.child({ method: 'run', start, end });

    const buffer = new ReorderBuffer<TaskOutcome>(start);
    const window = new Semaphore(this.bufferCapacity);
    const dispatchController = new AbortController();
    const stopController = new AbortController();
    const abortController = new AbortController();
    const taskSignals: TaskSignals = {
      stop: stopController.signal,
      abort: abortController.signal,
    };
    let graceTimer: NodeJS.Timeout | undefined;
    let inFlight = 0;

    const stop = (reason: string) => {
      if (stopController.signal.aborted) return;
      log.info('Stopping block dispatch', { reason, inFlight });
      dispatchController.abort();
      stopController.abort();
      graceTimer = setTimeout(() => {
        if (inFlight > 0) {
          log.warn('Grace period expired, aborting in-flight requests', {
            inFlight,
          });
        }
        abortController.abort();
      }, this.gracePeriodMs);
    };
    const onCancel = () => stop('cancelled');

    const worker = async (height: number): Promise<void> => {
      inFlight++;
      metrics.inFlightBlocksGauge.set(inFlight);
      let outcome: TaskOutcome;
      try {
        outcome = await this.task(height, taskSignals);
      } catch (error) {
        log.error('Block task failed unexpectedly', {
          height,
          ...errorSummary(error),
        });
        outcome = {
          kind: 'result',
          result: {
            height,
            status: 'FATAL',
            divergences: [],
            error: errorSummary(error),
          },
        };
      } finally {
        inFlight--;
        metrics.inFlightBlocksGauge.set(inFlight);
      }

      if (outcome.kind === 'result' && this.stopDispatchOn(outcome.result)) {
        log.debug('Result stops dispatch', {
          height,
          status: outcome.result.status,
        });
        dispatchController.abort();
      }
      buffer.put(height, outcome);
      metrics.reorderBufferSizeGauge.set(buffer.size());
    };

    const queue: queueAsPromised<number, void> = fastq.promise(
      worker,
      this.threadCount,
    );

    const dispatch = async (): Promise<void> => {
      let lastDispatched = start - 1;
      try {
        for (let height = start; height <= end; height++) {
          try {
            await window.acquire({ signal: dispatchController.signal });
          } catch (error) {
            if (error instanceof SemaphoreAbortedError) break;
            throw error;
          }
          if (dispatchController.signal.aborted) {
            window.release();
            break;
          }
          queue.push(height).catch((error: unknown) => {
            log.error('Block queue rejected task', {
              height,
              ...errorSummary(error),
            });
          });
          lastDispatched = height;
        }
      } finally {
        buffer.close(lastDispatched);
      }
    };

    if (signal?.aborted) {
      stop('cancelled');
    } else {
      signal?.addEventListener('abort', onCancel, { once: true });
    }
    const dispatching = dispatch();

    let exhausted = false;
    try {
      for await (const outcome of buffer) {
        metrics.reorderBufferSizeGauge.set(buffer.size());
        if (outcome.kind === 'cancelled') {
          log.debug('Stream ends at cancelled height', {
            height: outcome.height,
          });
          break;
        }
        yield outcome.result;
        window.release();
      }
      exhausted = buffer.next() > end;
    } finally {
      signal?.removeEventListener('abort', onCancel);
      if (!exhausted) {
        stop('stream closed before range end');
      }
      await dispatching;
      await queue.drained();
      clearTimeout(graceTimer);
      metrics.inFlightBlocksGauge.set(0);
      metrics.reorderBufferSizeGauge.set(0);
    }
  }
}
