/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { ReorderBuffer } from './reorder-buffer.js';

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of iterable) {
    values.push(value);
  }
  return values;
}

describe('ReorderBuffer', () => {
  it('should release values in height order regardless of put order', async () => {
    const buffer = new ReorderBuffer<string>(10);
    buffer.put(12, 'c');
    buffer.put(10, 'a');
    buffer.put(11, 'b');
    buffer.close(12);

    assert.deepEqual(await collect(buffer), ['a', 'b', 'c']);
    assert.equal(buffer.size(), 0);
    assert.equal(buffer.next(), 13);
  });

  it('should wait for the lowest missing height before releasing later ones', async () => {
    const buffer = new ReorderBuffer<number>(0);
    const released: number[] = [];
    const consuming = (async () => {
      for await (const value of buffer) {
        released.push(value);
      }
    })();

    buffer.put(1, 1);
    buffer.put(2, 2);
    await new Promise((resolve) => setImmediate(resolve));
    assert.deepEqual(released, []);
    assert.equal(buffer.size(), 2);

    buffer.put(0, 0);
    buffer.close(2);
    await consuming;
    assert.deepEqual(released, [0, 1, 2]);
  });

  it('should end immediately when closed before the start height', async () => {
    const buffer = new ReorderBuffer<number>(5);
    buffer.close(4);
    assert.deepEqual(await collect(buffer), []);
  });

  it('should reject duplicate and out-of-range heights', () => {
    const buffer = new ReorderBuffer<number>(5);
    buffer.put(5, 5);
    assert.throws(() => buffer.put(5, 5), /Duplicate result for height 5/);
    assert.throws(() => buffer.put(4, 4), /Duplicate result for height 4/);
    buffer.close(6);
    assert.throws(() => buffer.put(7, 7), /beyond the closed range ending at 6/);
  });
});
