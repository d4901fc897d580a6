/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, beforeEach, describe, it } from 'node:test';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { FsKVStore } from './fs-kv-store.js';

describe('FsKVStore', () => {
  let tempDir: string;
  let store: FsKVStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-kv-store-test-'));
    store = new FsKVStore({ baseDir: path.join(tempDir, 'kv') });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should return undefined for a missing key', async () => {
    assert.equal(await store.get('missing'), undefined);
    assert.equal(await store.has('missing'), false);
  });

  it('should store and read back a value', async () => {
    await store.set('key', Buffer.from('value'));

    assert.equal(await store.has('key'), true);
    assert.equal((await store.get('key'))?.toString(), 'value');
  });

  it('should overwrite an existing value', async () => {
    await store.set('key', Buffer.from('first'));
    await store.set('key', Buffer.from('second'));

    assert.equal((await store.get('key'))?.toString(), 'second');
  });

  it('should leave no temporary files behind', async () => {
    await store.set('key', Buffer.from('first'));
    await store.set('key', Buffer.from('second'));

    assert.deepEqual(await fs.readdir(path.join(tempDir, 'kv', '.tmp')), []);
  });

  it('should keep concurrent writes to the same key whole', async () => {
    await Promise.all([
      store.set('key', Buffer.from('a'.repeat(1000))),
      store.set('key', Buffer.from('b'.repeat(1000))),
    ]);

    const value = (await store.get('key'))?.toString();
    assert.ok(value === 'a'.repeat(1000) || value === 'b'.repeat(1000));
  });

  it('should delete a value', async () => {
    await store.set('key', Buffer.from('value'));
    await store.del('key');
    await store.del('never-set');

    assert.equal(await store.get('key'), undefined);
  });
});
