/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import {
  CheckpointIOError,
  DetailedError,
  SchemaError,
  TransientFetchError,
  errorSummary,
  isTransientFetchError,
} from './error.js';

describe('DetailedError', () => {
  it('should take its name from the subclass', () => {
    assert.equal(new CheckpointIOError('boom').name, 'CheckpointIOError');
  });

  it('should serialize extra fields alongside name and message', () => {
    const error = new DetailedError('failed', { height: 12 });
    const json: Record<string, unknown> = JSON.parse(JSON.stringify(error));

    assert.equal(json.name, 'DetailedError');
    assert.equal(json.message, 'failed');
    assert.equal(json.height, 12);
    assert.equal(typeof json.stack, 'string');
  });

  it('should keep the cause', () => {
    const cause = new Error('disk full');
    const error = new CheckpointIOError('save failed', { cause });
    assert.equal(error.cause, cause);
  });
});

describe('TransientFetchError', () => {
  it('should carry its reason', () => {
    const error = new TransientFetchError('timed out', {
      reason: 'Timeout',
      endpoint: 'http://primary.test',
    });

    assert.equal(error.reason, 'Timeout');
    assert.equal(
      JSON.parse(JSON.stringify(error)).endpoint,
      'http://primary.test',
    );
    assert.ok(isTransientFetchError(error));
  });

  it('should not classify schema errors as transient', () => {
    const error = new SchemaError('bad body');
    assert.equal(error.reason, 'InvalidResponse');
    assert.equal(isTransientFetchError(error), false);
  });
});

describe('errorSummary', () => {
  it('should summarize errors and non-errors', () => {
    assert.deepEqual(errorSummary(new SchemaError('bad body')), {
      name: 'SchemaError',
      message: 'bad body',
    });
    assert.deepEqual(errorSummary('plain'), {
      name: 'Error',
      message: 'plain',
    });
  });
});
