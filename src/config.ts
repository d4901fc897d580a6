/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

//
// Run
//

// Indexer whose receipts are treated as the reference
export const PRIMARY_ENDPOINT = env.varOrUndefined('PRIMARY_ENDPOINT');

// Indexer being validated against the primary
export const SECONDARY_ENDPOINT = env.varOrUndefined('SECONDARY_ENDPOINT');

// ORDINAL or BRC20
export const PROTOCOL = env.varOrUndefined('PROTOCOL');

// BITCOIN or FRACTAL
export const CHAIN = env.varOrUndefined('CHAIN');

// Defaults to the first height the protocol is active on the chain
export const START_HEIGHT = env.intOrUndefined('START_HEIGHT');

// Defaults to the lower of the two indexers' tips
export const END_HEIGHT = env.intOrUndefined('END_HEIGHT');

// Accept FETCH_FAILED heights and continue past them
export const TOLERATE_GAPS =
  env.varOrDefault('TOLERATE_GAPS', 'false') === 'true';

//
// Concurrency and retries
//

export const THREADS = env.intOrDefault('THREADS', 100);

// Defaults to twice THREADS
export const REORDER_BUFFER_CAPACITY = env.intOrUndefined(
  'REORDER_BUFFER_CAPACITY',
);

export const MAX_FETCH_ATTEMPTS = env.intOrDefault('MAX_FETCH_ATTEMPTS', 5);

export const RETRY_BASE_DELAY_MS = env.intOrDefault('RETRY_BASE_DELAY_MS', 1000);

export const RETRY_MAX_DELAY_MS = env.intOrDefault(
  'RETRY_MAX_DELAY_MS',
  30_000,
);

export const REQUEST_TIMEOUT_MS = env.intOrDefault('REQUEST_TIMEOUT_MS', 30_000);

// Per endpoint, 0 disables rate limiting
export const MAX_REQUESTS_PER_SECOND = env.intOrDefault(
  'MAX_REQUESTS_PER_SECOND',
  0,
);

// Time in-flight requests get to finish after an interrupt
export const SHUTDOWN_GRACE_PERIOD_MS = env.intOrDefault(
  'SHUTDOWN_GRACE_PERIOD_MS',
  5000,
);

//
// Checkpoints
//

// 'fs' or 'memory'
export const CHECKPOINT_STORE_TYPE = env.varOrDefault(
  'CHECKPOINT_STORE_TYPE',
  'fs',
);

export const CHECKPOINT_DIR = env.varOrDefault(
  'CHECKPOINT_DIR',
  'data/checkpoints',
);

//
// Reporting
//

// JSON-lines report, appended to on every run
export const REPORT_FILE = env.varOrUndefined('REPORT_FILE');

// Width of the height buckets divergences are counted in
export const REPORT_BUCKET_SIZE = env.intOrDefault('REPORT_BUCKET_SIZE', 1000);

export const PROGRESS_INTERVAL_MS = env.intOrDefault(
  'PROGRESS_INTERVAL_MS',
  10_000,
);

//
// Metrics
//

// Serves /metrics and /status when set
export const METRICS_PORT = env.intOrUndefined('METRICS_PORT');
