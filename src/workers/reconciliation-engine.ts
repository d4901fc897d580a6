/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { EventEmitter } from 'node:events';
import winston from 'winston';

import { chainNetwork, firstProtocolHeight } from '../chains.js';
import * as events from '../events.js';
import {
  ConfigError,
  RangeResolutionError,
  errorSummary,
} from '../lib/error.js';
import * as metrics from '../metrics.js';
import {
  BlockResult,
  ChainTip,
  Checkpoint,
  CheckpointKey,
  CheckpointStore,
  DIVERGENCE_KINDS,
  DivergenceKind,
  EngineState,
  HeightRange,
  ReceiptSource,
  ReportSink,
  RunConfig,
  RunStatus,
  RunSummary,
} from '../types.js';
import { BlockScheduler, DEFAULT_GRACE_PERIOD_MS } from './block-scheduler.js';
import { ReceiptFetcher } from './receipt-fetcher.js';

export const DEFAULT_REPORT_BUCKET_SIZE = 1000;

export interface EngineProgress {
  state: EngineState;
  range?: HeightRange;
  blocksProcessed: number;
  blocksTotal: number;
  lastReconciledHeight?: number;
  divergenceCount: number;
}

export function bucketLabel(height: number, bucketSize: number): string {
  const low = Math.floor(height / bucketSize) * bucketSize;
  return `${low}-${low + bucketSize - 1}`;
}

/**
 * 0 when every block matched, 1 when the run failed, 2 when it completed with
 * divergences or unverified heights, 130 when interrupted.
 */
export function exitCodeFor(summary: RunSummary): number {
  switch (summary.status) {
    case 'FAILED':
      return 1;
    case 'CANCELLED':
      return 130;
    case 'COMPLETED':
      return summary.divergenceFound || !summary.verificationComplete ? 2 : 0;
  }
}

function emptyKindCounts(): Record<DivergenceKind, number> {
  return {
    MISSING_IN_SECONDARY: 0,
    MISSING_IN_PRIMARY: 0,
    FIELD_MISMATCH: 0,
    COUNT_MISMATCH: 0,
  };
}

class RunCancelled extends Error {}

/**
 * Walks a block range, compares each block's receipts from two indexers and
 * advances a durable checkpoint over the contiguous prefix of finalized
 * heights. A run is single use.
 */
export class ReconciliationEngine {
  // Dependencies
  private log: winston.Logger;
  private eventEmitter: EventEmitter;
  private primary: ReceiptSource;
  private secondary: ReceiptSource;
  private checkpointStore: CheckpointStore;
  private reportSink: ReportSink;
  private fetcher: ReceiptFetcher;

  // Parameters
  private config: RunConfig;
  private gracePeriodMs: number;
  private bufferCapacity?: number;
  private reportBucketSize: number;

  // Run state
  private state: EngineState = 'IDLE';
  private cancelController = new AbortController();
  private range: HeightRange | undefined;
  private checkpoint: Checkpoint | undefined;
  private blocksProcessed = 0;
  private blocksMatched = 0;
  private blocksDiverged = 0;
  private divergencesByKind = emptyKindCounts();
  private divergencesByBucket: Record<string, number> = {};
  private runUnverifiedHeights: number[] = [];

  constructor({
    log,
    eventEmitter,
    primary,
    secondary,
    checkpointStore,
    reportSink,
    config,
    maxAttempts,
    retryBaseDelayMs,
    retryMaxDelayMs,
    maxRequestsPerSecond,
    gracePeriodMs = DEFAULT_GRACE_PERIOD_MS,
    bufferCapacity,
    reportBucketSize = DEFAULT_REPORT_BUCKET_SIZE,
  }: {
    log: winston.Logger;
    eventEmitter: EventEmitter;
    primary: ReceiptSource;
    secondary: ReceiptSource;
    checkpointStore: CheckpointStore;
    reportSink: ReportSink;
    config: RunConfig;
    maxAttempts?: number;
    retryBaseDelayMs?: number;
    retryMaxDelayMs?: number;
    maxRequestsPerSecond?: number;
    gracePeriodMs?: number;
    bufferCapacity?: number;
    reportBucketSize?: number;
  }) {
    this.log = log.child({
      class: this.constructor.name,
      chain: config.chain,
      protocol: config.protocol,
    });
    this.eventEmitter = eventEmitter;
    this.primary = primary;
    this.secondary = secondary;
    this.checkpointStore = checkpointStore;
    this.reportSink = reportSink;
    this.config = config;
    this.gracePeriodMs = gracePeriodMs;
    this.bufferCapacity = bufferCapacity;
    this.reportBucketSize = reportBucketSize;

    this.fetcher = new ReceiptFetcher({
      log,
      primary,
      secondary,
      chain: config.chain,
      protocol: config.protocol,
      maxAttempts,
      retryBaseDelayMs,
      retryMaxDelayMs,
      maxRequestsPerSecond,
    });
  }

  getState(): EngineState {
    return this.state;
  }

  getProgress(): EngineProgress {
    return {
      state: this.state,
      range: this.range,
      blocksProcessed: this.blocksProcessed,
      blocksTotal:
        this.range !== undefined
          ? Math.max(0, this.range.end - this.range.start + 1)
          : 0,
      lastReconciledHeight: this.checkpoint?.lastReconciledHeight,
      divergenceCount: this.divergenceCount(),
    };
  }

  /**
   * Operator interrupt. Dispatch stops, in-flight requests get the grace
   * period and the run resolves as CANCELLED with its checkpoint intact.
   */
  cancel(): void {
    if (this.cancelController.signal.aborted) return;
    this.log.info('Cancellation requested', { state: this.state });
    this.cancelController.abort();
  }

  private get checkpointKey(): CheckpointKey {
    const { chain, protocol, primaryEndpoint, secondaryEndpoint } =
      this.config;
    return { chain, protocol, primaryEndpoint, secondaryEndpoint };
  }

  private setState(state: EngineState): void {
    const previous = this.state;
    this.state = state;
    this.log.info('Engine state changed', { from: previous, to: state });
    this.eventEmitter.emit(events.STATE_CHANGED, { from: previous, to: state });
  }

  private divergenceCount(): number {
    return DIVERGENCE_KINDS.reduce(
      (sum, kind) => sum + this.divergencesByKind[kind],
      0,
    );
  }

  private validateConfig(): void {
    const {
      primaryEndpoint,
      secondaryEndpoint,
      startHeight,
      endHeight,
      threadCount,
    } = this.config;

    for (const [name, endpoint] of [
      ['primaryEndpoint', primaryEndpoint],
      ['secondaryEndpoint', secondaryEndpoint],
    ] as const) {
      if (!URL.canParse(endpoint)) {
        throw new ConfigError(`${name} is not a valid URL: ${endpoint}`);
      }
    }
    if (!Number.isInteger(threadCount) || threadCount < 1) {
      throw new ConfigError(
        `threadCount must be a positive integer, got: ${threadCount}`,
      );
    }
    for (const [name, height] of [
      ['startHeight', startHeight],
      ['endHeight', endHeight],
    ] as const) {
      if (height !== undefined && (!Number.isInteger(height) || height < 0)) {
        throw new ConfigError(
          `${name} must be a non-negative integer, got: ${height}`,
        );
      }
    }
    if (
      startHeight !== undefined &&
      endHeight !== undefined &&
      startHeight > endHeight
    ) {
      throw new ConfigError(
        `startHeight ${startHeight} is above endHeight ${endHeight}`,
      );
    }
    if (primaryEndpoint === secondaryEndpoint) {
      this.log.warn('Primary and secondary endpoints are the same', {
        endpoint: primaryEndpoint,
      });
    }
  }

  private async fetchTip(source: ReceiptSource): Promise<ChainTip> {
    const signal = this.cancelController.signal;
    const outcome = await this.fetcher.withRetry(
      source,
      'tip',
      (requestSignal) =>
        source.getTip({ chain: this.config.chain, signal: requestSignal }),
      { stop: signal, abort: signal },
    );

    switch (outcome.status) {
      case 'fulfilled':
        return outcome.value;
      case 'cancelled':
        throw new RunCancelled();
      case 'failed':
        throw new RangeResolutionError(
          `Failed to fetch chain tip from ${source.endpoint}`,
          { endpoint: source.endpoint, cause: outcome.error },
        );
    }
  }

  private async resolveRange(): Promise<HeightRange> {
    const { chain, protocol, startHeight, endHeight } = this.config;
    const configuredStart = startHeight ?? firstProtocolHeight(chain, protocol);
    const resumeStart =
      this.checkpoint !== undefined
        ? this.checkpoint.lastReconciledHeight + 1
        : configuredStart;
    const start = Math.max(configuredStart, resumeStart);

    const tips = await Promise.allSettled([
      this.fetchTip(this.primary),
      this.fetchTip(this.secondary),
    ]);
    for (const tip of tips) {
      if (tip.status === 'rejected') {
        throw tip.reason;
      }
    }
    const [primaryTip, secondaryTip] = tips.map((tip) =>
      tip.status === 'fulfilled' ? tip.value : undefined,
    );
    if (primaryTip === undefined || secondaryTip === undefined) {
      throw new RangeResolutionError('Chain tips unavailable');
    }

    const expectedNetwork = chainNetwork(chain);
    for (const [source, tip] of [
      [this.primary, primaryTip],
      [this.secondary, secondaryTip],
    ] as const) {
      if (tip.network !== expectedNetwork) {
        throw new RangeResolutionError(
          `${source.endpoint} indexes ${tip.network}, expected ${expectedNetwork}`,
          { endpoint: source.endpoint, network: tip.network },
        );
      }
    }

    const commonTip = Math.min(primaryTip.height, secondaryTip.height);
    let end = commonTip;
    if (endHeight !== undefined) {
      if (endHeight > commonTip) {
        this.log.warn('Configured end height is beyond the common tip', {
          endHeight,
          commonTip,
        });
      } else {
        end = endHeight;
      }
    }

    if (configuredStart > end) {
      throw new RangeResolutionError(
        `Start height ${configuredStart} is beyond the resolved end height ${end}`,
        { start: configuredStart, end, commonTip },
      );
    }

    this.log.info('Resolved block range', {
      start,
      end,
      primaryTip: primaryTip.height,
      secondaryTip: secondaryTip.height,
      resumed: this.checkpoint !== undefined,
    });
    return { start, end };
  }

  private recordResult(result: BlockResult): void {
    const { chain, protocol } = this.config;
    this.blocksProcessed++;
    metrics.blocksReconciledCounter.inc({
      chain,
      protocol,
      status: result.status,
    });

    if (result.status !== 'OK') {
      this.eventEmitter.emit(events.BLOCK_UNVERIFIED, result);
      return;
    }

    if (result.divergences.length === 0) {
      this.blocksMatched++;
    } else {
      this.blocksDiverged++;
      for (const entry of result.divergences) {
        this.divergencesByKind[entry.kind]++;
        const bucket = bucketLabel(entry.height, this.reportBucketSize);
        this.divergencesByBucket[bucket] =
          (this.divergencesByBucket[bucket] ?? 0) + 1;
        metrics.divergencesCounter.inc({ chain, protocol, kind: entry.kind });
      }
      this.eventEmitter.emit(events.DIVERGENCE_FOUND, {
        height: result.height,
        divergences: result.divergences,
      });
    }
    this.eventEmitter.emit(events.BLOCK_RECONCILED, result);
  }

  private async advanceCheckpoint(
    height: number,
    unverified: boolean,
  ): Promise<void> {
    const unverifiedHeights = [...(this.checkpoint?.unverifiedHeights ?? [])];
    if (unverified) {
      unverifiedHeights.push(height);
    }
    const checkpoint: Checkpoint = {
      ...this.checkpointKey,
      lastReconciledHeight: height,
      unverifiedHeights,
      updatedAt: new Date().toISOString(),
    };
    await this.checkpointStore.save(checkpoint);
    this.checkpoint = checkpoint;
    metrics.lastReconciledHeightGauge.set(
      { chain: this.config.chain, protocol: this.config.protocol },
      height,
    );
  }

  /**
   * Consumes results in height order. Returns the failure that stopped the
   * run, if any.
   */
  private async consume(
    range: HeightRange,
  ): Promise<RunSummary['failure'] | undefined> {
    const tolerateGaps = this.config.tolerateGaps;
    const scheduler = new BlockScheduler({
      log: this.log,
      task: (height, signals) => this.fetcher.reconcileBlock(height, signals),
      threadCount: this.config.threadCount,
      bufferCapacity: this.bufferCapacity,
      gracePeriodMs: this.gracePeriodMs,
      stopDispatchOn: (result) =>
        result.status === 'FATAL' ||
        (result.status === 'FETCH_FAILED' && !tolerateGaps),
    });

    for await (const result of scheduler.run({
      ...range,
      signal: this.cancelController.signal,
    })) {
      await this.reportSink.writeBlock(result);
      this.recordResult(result);

      if (result.status === 'FATAL') {
        return { ...this.failureOf(result), height: result.height };
      }
      if (result.status === 'FETCH_FAILED') {
        this.runUnverifiedHeights.push(result.height);
        if (!tolerateGaps) {
          return { ...this.failureOf(result), height: result.height };
        }
        this.log.warn('Accepting unverified height', { height: result.height });
      }

      await this.advanceCheckpoint(
        result.height,
        result.status === 'FETCH_FAILED',
      );
    }
    return undefined;
  }

  private failureOf(result: BlockResult): { name: string; message: string } {
    return {
      name: result.error?.name ?? result.status,
      message:
        result.error?.message ?? `Block ${result.height} is ${result.status}`,
    };
  }

  /**
   * Runs to a terminal state. Never rejects: startup and runtime failures
   * resolve as a FAILED summary.
   */
  async run(): Promise<RunSummary> {
    if (this.state !== 'IDLE') {
      throw new Error('ReconciliationEngine instances run only once');
    }
    const startTime = Date.now();

    this.setState('INITIALIZING');
    try {
      this.validateConfig();
      this.checkpoint = await this.checkpointStore.load(this.checkpointKey);
      if (this.checkpoint !== undefined) {
        this.log.info('Resuming from checkpoint', {
          lastReconciledHeight: this.checkpoint.lastReconciledHeight,
          unverifiedHeights: this.checkpoint.unverifiedHeights.length,
        });
      }
      if (this.cancelController.signal.aborted) {
        throw new RunCancelled();
      }

      this.setState('RESOLVING_RANGE');
      this.range = await this.resolveRange();
    } catch (error) {
      if (error instanceof RunCancelled) {
        return this.finish('CANCELLED', startTime);
      }
      this.log.error('Run could not start', errorSummary(error));
      return this.finish('FAILED', startTime, errorSummary(error));
    }

    const range = this.range;
    if (range.start > range.end) {
      this.log.info('Checkpoint already covers the range', range);
      return this.finish('COMPLETED', startTime);
    }

    this.setState('RUNNING');
    let failure: RunSummary['failure'] | undefined;
    try {
      failure = await this.consume(range);
    } catch (error) {
      this.log.error('Run stopped by error', errorSummary(error));
      failure = errorSummary(error);
    }

    if (failure !== undefined) {
      return this.finish('FAILED', startTime, failure);
    }
    const reachedEnd =
      this.checkpoint !== undefined &&
      this.checkpoint.lastReconciledHeight >= range.end;
    if (reachedEnd) {
      return this.finish('COMPLETED', startTime);
    }
    if (this.cancelController.signal.aborted) {
      return this.finish('CANCELLED', startTime);
    }
    return this.finish('FAILED', startTime, {
      name: 'Error',
      message: 'Block stream ended before the end of the range',
    });
  }

  private async finish(
    status: RunStatus,
    startTime: number,
    failure?: RunSummary['failure'],
  ): Promise<RunSummary> {
    this.setState(status);
    if (status === 'FAILED') {
      metrics.errorsCounter.inc();
    }

    const unverifiedHeights = [
      ...new Set([
        ...(this.checkpoint?.unverifiedHeights ?? []),
        ...this.runUnverifiedHeights,
      ]),
    ].sort((a, b) => a - b);
    const divergenceCount = this.divergenceCount();

    const summary: RunSummary = {
      status,
      chain: this.config.chain,
      protocol: this.config.protocol,
      ...(this.range !== undefined && { range: this.range }),
      blocksProcessed: this.blocksProcessed,
      blocksMatched: this.blocksMatched,
      blocksDiverged: this.blocksDiverged,
      unverifiedHeights,
      divergenceCount,
      divergencesByKind: { ...this.divergencesByKind },
      divergencesByBucket: { ...this.divergencesByBucket },
      ...(this.checkpoint !== undefined && {
        lastReconciledHeight: this.checkpoint.lastReconciledHeight,
      }),
      divergenceFound: divergenceCount > 0,
      verificationComplete:
        status === 'COMPLETED' && unverifiedHeights.length === 0,
      durationMs: Date.now() - startTime,
      ...(failure !== undefined && { failure }),
    };

    try {
      await this.reportSink.writeSummary(summary);
    } catch (error) {
      this.log.error('Failed to write run summary', errorSummary(error));
    }
    return summary;
  }
}
