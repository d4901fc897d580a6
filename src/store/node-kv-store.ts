/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import NodeCache from 'node-cache';
import { KVBufferStore } from '../types.js';

/**
 * In-memory store. Contents are lost on exit; used for dry runs and tests.
 */
export class NodeKvStore implements KVBufferStore {
  private cache: NodeCache;

  constructor() {
    this.cache = new NodeCache({
      stdTTL: 0,
      checkperiod: 0,
      useClones: false,
    });
  }

  async get(key: string): Promise<Buffer | undefined> {
    return this.cache.get<Buffer>(key);
  }

  async set(key: string, buffer: Buffer): Promise<void> {
    this.cache.set(key, buffer);
  }

  async del(key: string): Promise<void> {
    this.cache.del(key);
  }

  async has(key: string): Promise<boolean> {
    return this.cache.has(key);
  }

  async close(): Promise<void> {
    this.cache.close();
  }
}
