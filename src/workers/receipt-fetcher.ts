/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { TokenBucket } from 'limiter';
import winston from 'winston';

import {
  SchemaError,
  errorSummary,
  isTransientFetchError,
} from '../lib/error.js';
import wait from '../lib/wait.js';
import * as metrics from '../metrics.js';
import { compareReceipts } from '../protocols/index.js';
import {
  BlockResult,
  ChainId,
  ProtocolId,
  ReceiptSource,
  Receipts,
} from '../types.js';

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
export const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;

export interface TaskSignals {
  // No new attempts once aborted
  stop: AbortSignal;
  // Aborts calls already in flight
  abort: AbortSignal;
}

export type TaskOutcome =
  | { kind: 'result'; result: BlockResult }
  | { kind: 'cancelled'; height: number };

export type AttemptOutcome<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'failed'; error: unknown; transient: boolean }
  | { status: 'cancelled' };

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Fetches a block's receipts from both endpoints concurrently, retrying
 * transient failures with exponential backoff, and compares them.
 */
export class ReceiptFetcher {
  private log: winston.Logger;
  private primary: ReceiptSource;
  private secondary: ReceiptSource;
  private chain: ChainId;
  private protocol: ProtocolId;
  private maxAttempts: number;
  private retryBaseDelayMs: number;
  private retryMaxDelayMs: number;
  private limiters = new Map<string, TokenBucket>();

  constructor({
    log,
    primary,
    secondary,
    chain,
    protocol,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    retryBaseDelayMs = DEFAULT_RETRY_BASE_DELAY_MS,
    retryMaxDelayMs = DEFAULT_RETRY_MAX_DELAY_MS,
    maxRequestsPerSecond = 0,
  }: {
    log: winston.Logger;
    primary: ReceiptSource;
    secondary: ReceiptSource;
    chain: ChainId;
    protocol: ProtocolId;
    maxAttempts?: number;
    retryBaseDelayMs?: number;
    retryMaxDelayMs?: number;
    maxRequestsPerSecond?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.primary = primary;
    this.secondary = secondary;
    this.chain = chain;
    this.protocol = protocol;
    this.maxAttempts = Math.max(1, maxAttempts);
    this.retryBaseDelayMs = retryBaseDelayMs;
    this.retryMaxDelayMs = retryMaxDelayMs;

    if (maxRequestsPerSecond > 0) {
      for (const endpoint of [primary.endpoint, secondary.endpoint]) {
        if (!this.limiters.has(endpoint)) {
          this.limiters.set(
            endpoint,
            new TokenBucket({
              bucketSize: maxRequestsPerSecond,
              tokensPerInterval: maxRequestsPerSecond,
              interval: 'second',
            }),
          );
        }
      }
    }
  }

  /**
   * Runs `operation` against `source` until it succeeds, fails permanently,
   * exhausts its attempts or is cancelled.
   */
  async withRetry<T>(
    source: ReceiptSource,
    description: string,
    operation: (signal: AbortSignal) => Promise<T>,
    { stop, abort }: TaskSignals,
  ): Promise<AttemptOutcome<T>> {
    const log = this.log.child({ endpoint: source.endpoint, description });

    for (let attempt = 1; ; attempt++) {
      if (stop.aborted) {
        return { status: 'cancelled' };
      }

      const limiter = this.limiters.get(source.endpoint);
      if (limiter !== undefined) {
        await limiter.removeTokens(1);
        if (stop.aborted) {
          return { status: 'cancelled' };
        }
      }

      try {
        return { status: 'fulfilled', value: await operation(abort) };
      } catch (error) {
        if (abort.aborted) {
          return { status: 'cancelled' };
        }
        if (!isTransientFetchError(error)) {
          return { status: 'failed', error, transient: false };
        }
        if (attempt >= this.maxAttempts) {
          log.warn('Giving up after transient failures', {
            attempts: attempt,
            ...errorSummary(error),
          });
          return { status: 'failed', error, transient: true };
        }

        const delayMs = backoffDelay(
          attempt,
          this.retryBaseDelayMs,
          this.retryMaxDelayMs,
        );
        log.debug('Retrying after transient failure', {
          attempt,
          delayMs,
          reason: error.reason,
          message: error.message,
        });
        metrics.fetchRetriesCounter.inc({
          endpoint: source.endpoint,
          reason: error.reason,
        });
        await wait(delayMs, stop);
      }
    }
  }

  private fetchReceipts(
    source: ReceiptSource,
    height: number,
    signals: TaskSignals,
  ): Promise<AttemptOutcome<Receipts>> {
    return this.withRetry(
      source,
      `receipts@${height}`,
      (signal) =>
        source.getBlockReceipts({
          chain: this.chain,
          protocol: this.protocol,
          height,
          signal,
        }),
      signals,
    );
  }

  /**
   * Produces the block's result, or `cancelled` when the run stopped before
   * both sides were fetched.
   */
  async reconcileBlock(
    height: number,
    signals: TaskSignals,
  ): Promise<TaskOutcome> {
    const [primary, secondary] = await Promise.all([
      this.fetchReceipts(this.primary, height, signals),
      this.fetchReceipts(this.secondary, height, signals),
    ]);

    // A permanent failure on either side decides the block
    for (const [source, outcome] of [
      [this.primary, primary],
      [this.secondary, secondary],
    ] as const) {
      if (outcome.status === 'failed' && !outcome.transient) {
        return this.failedResult(height, 'FATAL', source, outcome.error);
      }
    }

    if (primary.status === 'cancelled' || secondary.status === 'cancelled') {
      return { kind: 'cancelled', height };
    }

    for (const [source, outcome] of [
      [this.primary, primary],
      [this.secondary, secondary],
    ] as const) {
      if (outcome.status === 'failed') {
        return this.failedResult(height, 'FETCH_FAILED', source, outcome.error);
      }
    }

    if (primary.status !== 'fulfilled' || secondary.status !== 'fulfilled') {
      return { kind: 'cancelled', height };
    }

    // Both sides must describe the same block
    if (primary.value.blockHash !== secondary.value.blockHash) {
      return this.failedResult(
        height,
        'FATAL',
        this.secondary,
        new SchemaError(
          `Block hash differs at height ${height}: primary=${primary.value.blockHash} secondary=${secondary.value.blockHash}`,
          { height },
        ),
      );
    }

    try {
      const divergences = compareReceipts(
        height,
        primary.value,
        secondary.value,
      );
      return {
        kind: 'result',
        result: { height, status: 'OK', divergences },
      };
    } catch (error) {
      return {
        kind: 'result',
        result: {
          height,
          status: 'FATAL',
          divergences: [],
          error: errorSummary(error),
        },
      };
    }
  }

  private failedResult(
    height: number,
    status: 'FETCH_FAILED' | 'FATAL',
    source: ReceiptSource,
    error: unknown,
  ): TaskOutcome {
    this.log.warn('Block could not be fetched', {
      height,
      status,
      endpoint: source.endpoint,
      ...errorSummary(error),
    });
    return {
      kind: 'result',
      result: {
        height,
        status,
        divergences: [],
        error: { ...errorSummary(error), endpoint: source.endpoint },
      },
    };
  }
}
