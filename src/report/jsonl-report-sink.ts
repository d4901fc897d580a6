/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fse from 'fs-extra';
import fs from 'node:fs';
import path from 'node:path';

import { BlockResult, ReportSink, RunSummary } from '../types.js';

export type ReportLine =
  | ({ type: 'divergence' } & BlockResult['divergences'][number])
  | {
      type: 'unverified';
      height: number;
      status: BlockResult['status'];
      error?: BlockResult['error'];
    }
  | ({ type: 'summary' } & RunSummary);

/**
 * Appends one JSON object per line: a `divergence` line per divergence, an
 * `unverified` line per block that could not be compared and a final
 * `summary` line. Matching blocks produce no output. Appending lets a resumed
 * run continue the same file.
 */
export class JsonlReportSink implements ReportSink {
  private filePath: string;
  private stream: fs.WriteStream | undefined;
  private streamError: Error | undefined;

  constructor({ filePath }: { filePath: string }) {
    this.filePath = filePath;
  }

  private async open(): Promise<fs.WriteStream> {
    if (this.stream !== undefined) {
      return this.stream;
    }
    await fse.ensureDir(path.dirname(this.filePath));
    const stream = fs.createWriteStream(this.filePath, { flags: 'a' });
    stream.on('error', (error) => {
      this.streamError ??= error;
    });
    await new Promise<void>((resolve, reject) => {
      const onOpen = () => {
        stream.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        stream.off('open', onOpen);
        reject(error);
      };
      stream.once('open', onOpen);
      stream.once('error', onError);
    });
    this.stream = stream;
    return stream;
  }

  private async writeLines(lines: ReportLine[]): Promise<void> {
    if (lines.length === 0) return;
    if (this.streamError !== undefined) {
      throw this.streamError;
    }
    const stream = await this.open();
    const chunk = lines.map((line) => JSON.stringify(line)).join('\n') + '\n';
    await new Promise<void>((resolve, reject) => {
      stream.write(chunk, (error) => (error ? reject(error) : resolve()));
    });
  }

  async writeBlock(result: BlockResult): Promise<void> {
    if (result.status !== 'OK') {
      await this.writeLines([
        {
          type: 'unverified',
          height: result.height,
          status: result.status,
          error: result.error,
        },
      ]);
      return;
    }
    await this.writeLines(
      result.divergences.map(
        (entry): ReportLine => ({ type: 'divergence', ...entry }),
      ),
    );
  }

  async writeSummary(summary: RunSummary): Promise<void> {
    await this.writeLines([{ type: 'summary', ...summary }]);
  }

  async close(): Promise<void> {
    const stream = this.stream;
    this.stream = undefined;
    if (this.streamError !== undefined) {
      throw this.streamError;
    }
    if (stream === undefined) return;
    await new Promise<void>((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }
}
