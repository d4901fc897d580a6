/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import crypto from 'node:crypto';
import { canonicalize } from 'json-canonicalize';
import winston from 'winston';
import { z } from 'zod';

import { CheckpointIOError } from '../lib/error.js';
import {
  CHAIN_IDS,
  Checkpoint,
  CheckpointKey,
  CheckpointStore,
  KVBufferStore,
  PROTOCOL_IDS,
} from '../types.js';

const CheckpointSchema = z.object({
  chain: z.enum(CHAIN_IDS),
  protocol: z.enum(PROTOCOL_IDS),
  primaryEndpoint: z.string(),
  secondaryEndpoint: z.string(),
  lastReconciledHeight: z.number().int(),
  unverifiedHeights: z.array(z.number().int()).default([]),
  updatedAt: z.string(),
});

function keyFields({
  chain,
  protocol,
  primaryEndpoint,
  secondaryEndpoint,
}: CheckpointKey): CheckpointKey {
  return { chain, protocol, primaryEndpoint, secondaryEndpoint };
}

export function checkpointStorageKey(key: CheckpointKey): string {
  return crypto
    .createHash('sha256')
    .update(canonicalize(keyFields(key)))
    .digest('hex');
}

function sameKey(a: CheckpointKey, b: CheckpointKey): boolean {
  return canonicalize(keyFields(a)) === canonicalize(keyFields(b));
}

/**
 * Persists one checkpoint per (chain, protocol, endpoint pair) in a
 * KVBufferStore. Every store failure surfaces as a CheckpointIOError.
 */
export class KvCheckpointStore implements CheckpointStore {
  private log: winston.Logger;
  private kvBufferStore: KVBufferStore;

  constructor({
    log,
    kvBufferStore,
  }: {
    log: winston.Logger;
    kvBufferStore: KVBufferStore;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.kvBufferStore = kvBufferStore;
  }

  async load(key: CheckpointKey): Promise<Checkpoint | undefined> {
    const storageKey = checkpointStorageKey(key);

    let buffer: Buffer | undefined;
    try {
      buffer = await this.kvBufferStore.get(storageKey);
    } catch (error) {
      throw new CheckpointIOError('Failed to read checkpoint', {
        cause: error,
        storageKey,
      });
    }
    if (buffer === undefined) {
      this.log.debug('No checkpoint found', { storageKey });
      return undefined;
    }

    let body: unknown;
    try {
      body = JSON.parse(buffer.toString('utf8'));
    } catch (error) {
      throw new CheckpointIOError('Stored checkpoint is not valid JSON', {
        cause: error,
        storageKey,
      });
    }

    const parsed = CheckpointSchema.safeParse(body);
    if (!parsed.success) {
      throw new CheckpointIOError('Stored checkpoint is malformed', {
        storageKey,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    if (!sameKey(parsed.data, key)) {
      throw new CheckpointIOError(
        'Stored checkpoint belongs to a different run',
        { storageKey, stored: keyFields(parsed.data) },
      );
    }

    this.log.debug('Loaded checkpoint', {
      storageKey,
      lastReconciledHeight: parsed.data.lastReconciledHeight,
    });
    return parsed.data;
  }

  async save(checkpoint: Checkpoint): Promise<void> {
    const storageKey = checkpointStorageKey(checkpoint);
    try {
      await this.kvBufferStore.set(
        storageKey,
        Buffer.from(canonicalize(checkpoint), 'utf8'),
      );
    } catch (error) {
      throw new CheckpointIOError('Failed to write checkpoint', {
        cause: error,
        storageKey,
        lastReconciledHeight: checkpoint.lastReconciledHeight,
      });
    }
  }

  async close(): Promise<void> {
    try {
      await this.kvBufferStore.close();
    } catch (error) {
      throw new CheckpointIOError('Failed to close checkpoint store', {
        cause: error,
      });
    }
  }
}
