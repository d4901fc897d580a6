/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { BlockResult, ReportSink, RunSummary } from '../types.js';

export class CompositeReportSink implements ReportSink {
  private sinks: ReportSink[];

  constructor({ sinks }: { sinks: ReportSink[] }) {
    this.sinks = sinks;
  }

  async writeBlock(result: BlockResult): Promise<void> {
    for (const sink of this.sinks) {
      await sink.writeBlock(result);
    }
  }

  async writeSummary(summary: RunSummary): Promise<void> {
    for (const sink of this.sinks) {
      await sink.writeSummary(summary);
    }
  }

  async close(): Promise<void> {
    const results = await Promise.allSettled(
      this.sinks.map((sink) => sink.close()),
    );
    const failed = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected',
    );
    if (failed !== undefined) {
      throw failed.reason;
    }
  }
}
