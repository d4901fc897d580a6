/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import winston from 'winston';

import {
  BlockResult,
  DivergenceEntry,
  ReportSink,
  RunSummary,
} from '../types.js';

export const DEFAULT_PREVIEW_LIMIT = 10;

export function formatDivergence(entry: DivergenceEntry): string {
  const parts: string[] = [entry.kind, `key=${entry.detail.key}`];
  for (const field of entry.detail.fields ?? []) {
    parts.push(
      `${field.field}=${JSON.stringify(field.primary)} vs ${JSON.stringify(
        field.secondary,
      )}`,
    );
  }
  if (entry.detail.primaryCount !== undefined) {
    parts.push(
      `primary=${entry.detail.primaryCount} secondary=${entry.detail.secondaryCount}`,
    );
  }
  return parts.join(' | ');
}

/**
 * Writes block outcomes and the run summary to the application log, with a
 * short preview of each diverging block.
 */
export class LogReportSink implements ReportSink {
  private log: winston.Logger;
  private previewLimit: number;

  constructor({
    log,
    previewLimit = DEFAULT_PREVIEW_LIMIT,
  }: {
    log: winston.Logger;
    previewLimit?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.previewLimit = previewLimit;
  }

  async writeBlock(result: BlockResult): Promise<void> {
    const { height, status, divergences, error } = result;

    if (status !== 'OK') {
      this.log.warn('Block unverified', { height, status, ...error });
      return;
    }
    if (divergences.length === 0) {
      this.log.debug('Block matched', { height });
      return;
    }

    this.log.warn('Block diverged', {
      height,
      divergenceCount: divergences.length,
    });
    for (const entry of divergences.slice(0, this.previewLimit)) {
      this.log.warn(`  - ${formatDivergence(entry)}`, { height });
    }
    if (divergences.length > this.previewLimit) {
      this.log.warn(
        `  ... and ${divergences.length - this.previewLimit} more`,
        { height },
      );
    }
  }

  async writeSummary(summary: RunSummary): Promise<void> {
    const {
      status,
      range,
      blocksProcessed,
      divergenceCount,
      divergencesByKind,
      unverifiedHeights,
      failure,
    } = summary;
    const fields = {
      status,
      chain: summary.chain,
      protocol: summary.protocol,
      range: range !== undefined ? `${range.start}-${range.end}` : undefined,
      blocksProcessed,
      blocksMatched: summary.blocksMatched,
      blocksDiverged: summary.blocksDiverged,
      divergenceCount,
      divergencesByKind,
      lastReconciledHeight: summary.lastReconciledHeight,
      durationMs: summary.durationMs,
    };

    if (failure !== undefined) {
      this.log.error('Reconciliation failed', { ...fields, failure });
    } else {
      this.log.info('Reconciliation finished', fields);
    }

    // Divergence and incomplete verification are separate outcomes
    if (summary.divergenceFound) {
      this.log.warn('Divergence found', {
        divergenceCount,
        divergencesByBucket: summary.divergencesByBucket,
      });
    }
    if (!summary.verificationComplete) {
      this.log.warn('Verification incomplete', {
        status,
        unverifiedHeights,
      });
    }
  }

  async close(): Promise<void> {
    // No-op
  }
}
