/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fse from 'fs-extra';
import fs from 'node:fs';
import path from 'node:path';

import { KVBufferStore } from '../types.js';

/**
 * Stores one file per key. Writes go to a temporary file first and are then
 * renamed over the target, so readers see either the old or the new value.
 */
export class FsKVStore implements KVBufferStore {
  private baseDir: string;
  private tmpDir: string;
  private writeCount = 0;

  constructor({ baseDir, tmpDir }: { baseDir: string; tmpDir?: string }) {
    this.baseDir = baseDir;
    // Same filesystem as baseDir so the final rename is atomic
    this.tmpDir = tmpDir ?? path.join(baseDir, '.tmp');
    fs.mkdirSync(this.baseDir, { recursive: true });
    fs.mkdirSync(this.tmpDir, { recursive: true });
  }

  private bufferPath(key: string): string {
    return path.join(this.baseDir, key);
  }

  async get(key: string): Promise<Buffer | undefined> {
    try {
      return await fs.promises.readFile(this.bufferPath(key));
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async has(key: string): Promise<boolean> {
    return fse.pathExists(this.bufferPath(key));
  }

  async del(key: string): Promise<void> {
    await fse.remove(this.bufferPath(key));
  }

  async set(key: string, buffer: Buffer): Promise<void> {
    const tmpPath = path.join(
      this.tmpDir,
      `${key}.${process.pid}.${this.writeCount++}`,
    );
    try {
      await fs.promises.writeFile(tmpPath, buffer);
      await fse.move(tmpPath, this.bufferPath(key), { overwrite: true });
    } catch (error) {
      await fse.remove(tmpPath);
      throw error;
    }
  }

  async close(): Promise<void> {
    // No-op
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
