/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { ConfigDefaults, parseArgs, resolveSettings } from './cli.js';
import * as config from './config.js';
import { ConfigError } from './lib/error.js';

const defaults: ConfigDefaults = {
  ...config,
  PRIMARY_ENDPOINT: 'http://primary.test/',
  SECONDARY_ENDPOINT: 'http://secondary.test',
  PROTOCOL: 'brc20',
  CHAIN: 'fractal',
  START_HEIGHT: undefined,
  END_HEIGHT: undefined,
  THREADS: 100,
  TOLERATE_GAPS: false,
  MAX_FETCH_ATTEMPTS: 5,
  CHECKPOINT_STORE_TYPE: 'fs',
  CHECKPOINT_DIR: 'data/checkpoints',
  REPORT_FILE: undefined,
  PROGRESS_INTERVAL_MS: 10_000,
};

describe('parseArgs', () => {
  it('should parse long and short options', () => {
    assert.deepEqual(
      parseArgs([
        '-p',
        'http://a.test',
        '--secondary-endpoint',
        'http://b.test',
        '-m',
        'ORDINAL',
        '-c',
        'BITCOIN',
        '--start-block',
        '800000',
        '--end-block',
        '800100',
        '--threads',
        '8',
        '--tolerate-gaps',
        '--max-attempts',
        '3',
        '--checkpoint-dir',
        '/tmp/checkpoints',
        '--report-file',
        'report.jsonl',
        '--progress-interval',
        '500',
        '--log-level',
        'debug',
        '--log-file',
        'logs/run.log',
      ]),
      {
        help: false,
        primaryEndpoint: 'http://a.test',
        secondaryEndpoint: 'http://b.test',
        protocol: 'ORDINAL',
        chain: 'BITCOIN',
        startHeight: 800000,
        endHeight: 800100,
        threadCount: 8,
        tolerateGaps: true,
        maxAttempts: 3,
        checkpointDir: '/tmp/checkpoints',
        reportFile: 'report.jsonl',
        progressIntervalMs: 500,
        logLevel: 'debug',
        logFile: 'logs/run.log',
      },
    );
  });

  it('should recognize help', () => {
    assert.deepEqual(parseArgs(['-h']), { help: true });
  });

  it('should reject unknown arguments', () => {
    assert.throws(
      () => parseArgs(['--verbose']),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === 'Unknown argument: --verbose',
    );
  });

  it('should reject a missing value', () => {
    assert.throws(() => parseArgs(['--threads']), {
      message: '--threads requires a value',
    });
    assert.throws(() => parseArgs(['--chain', '--tolerate-gaps']), {
      message: '--chain requires a value',
    });
  });

  it('should reject heights that are not integers', () => {
    assert.throws(() => parseArgs(['--start-block', '12.5']), {
      message: '--start-block requires a non-negative integer, got: 12.5',
    });
  });
});

describe('resolveSettings', () => {
  it('should fill unset options from the environment', () => {
    const settings = resolveSettings({ help: false }, defaults);

    assert.deepEqual(settings.run, {
      chain: 'FRACTAL',
      protocol: 'BRC20',
      primaryEndpoint: 'http://primary.test',
      secondaryEndpoint: 'http://secondary.test',
      startHeight: undefined,
      endHeight: undefined,
      threadCount: 100,
      tolerateGaps: false,
    });
    assert.equal(settings.maxAttempts, 5);
    assert.equal(settings.checkpointStoreType, 'fs');
    assert.equal(settings.checkpointDir, 'data/checkpoints');
    assert.equal(settings.reportFile, undefined);
  });

  it('should prefer command line options', () => {
    const settings = resolveSettings(
      {
        help: false,
        chain: 'bitcoin',
        protocol: 'ordinal',
        startHeight: 10,
        threadCount: 2,
        tolerateGaps: true,
        reportFile: 'out.jsonl',
      },
      defaults,
    );

    assert.equal(settings.run.chain, 'BITCOIN');
    assert.equal(settings.run.protocol, 'ORDINAL');
    assert.equal(settings.run.startHeight, 10);
    assert.equal(settings.run.threadCount, 2);
    assert.equal(settings.run.tolerateGaps, true);
    assert.equal(settings.reportFile, 'out.jsonl');
  });

  it('should apply the log options', () => {
    const settings = resolveSettings(
      { help: false, logLevel: 'DEBUG', logFile: 'logs/run.log' },
      defaults,
    );

    assert.equal(settings.logLevel, 'debug');
    assert.equal(settings.logFile, 'logs/run.log');
    assert.equal(resolveSettings({ help: false }, defaults).logLevel, undefined);
  });

  it('should reject an unknown log level', () => {
    assert.throws(
      () => resolveSettings({ help: false, logLevel: 'loud' }, defaults),
      {
        name: 'ConfigError',
        message:
          'Invalid log level: loud. Valid options: error, warn, info, http, verbose, debug, silly',
      },
    );
  });

  it('should require both endpoints', () => {
    assert.throws(
      () =>
        resolveSettings(
          { help: false },
          { ...defaults, SECONDARY_ENDPOINT: undefined },
        ),
      {
        name: 'ConfigError',
        message: '--secondary-endpoint (or SECONDARY_ENDPOINT) is required',
      },
    );
  });

  it('should reject an unknown chain', () => {
    assert.throws(
      () => resolveSettings({ help: false, chain: 'litecoin' }, defaults),
      { message: 'Invalid chain: litecoin. Valid options: BITCOIN, FRACTAL' },
    );
  });

  it('should reject an unknown checkpoint store type', () => {
    assert.throws(
      () =>
        resolveSettings(
          { help: false },
          { ...defaults, CHECKPOINT_STORE_TYPE: 'redis' },
        ),
      {
        message:
          'Invalid CHECKPOINT_STORE_TYPE: redis. Valid options: fs, memory',
      },
    );
  });
});
