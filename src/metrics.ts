/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Global error metrics
//

export const errorsCounter = new promClient.Counter({
  name: 'errors_total',
  help: 'Total error count',
});

export const uncaughtExceptionCounter = new promClient.Counter({
  name: 'uncaught_exceptions_total',
  help: 'Count of uncaught exceptions',
});

//
// Indexer request metrics
//

export const indexerRequestsCounter = new promClient.Counter({
  name: 'indexer_requests_total',
  help: 'Count of requests made to indexer endpoints',
  labelNames: ['endpoint', 'route', 'outcome'],
});

export const indexerRequestDurationSummary = new promClient.Summary({
  name: 'indexer_request_duration_ms',
  help: 'Duration of indexer requests in milliseconds',
  labelNames: ['endpoint', 'route'],
});

export const fetchRetriesCounter = new promClient.Counter({
  name: 'receipt_fetch_retries_total',
  help: 'Count of receipt fetch retries after transient failures',
  labelNames: ['endpoint', 'reason'],
});

//
// Reconciliation metrics
//

export const blocksReconciledCounter = new promClient.Counter({
  name: 'blocks_reconciled_total',
  help: 'Count of blocks reconciled by status',
  labelNames: ['chain', 'protocol', 'status'],
});

export const divergencesCounter = new promClient.Counter({
  name: 'divergences_total',
  help: 'Count of divergences found by kind',
  labelNames: ['chain', 'protocol', 'kind'],
});

export const lastReconciledHeightGauge = new promClient.Gauge({
  name: 'last_reconciled_height',
  help: 'Height of the last block reconciled and checkpointed',
  labelNames: ['chain', 'protocol'],
});

export const reorderBufferSizeGauge = new promClient.Gauge({
  name: 'reorder_buffer_size',
  help: 'Number of completed blocks waiting for a lower height',
});

export const inFlightBlocksGauge = new promClient.Gauge({
  name: 'in_flight_blocks',
  help: 'Number of blocks dispatched and not yet consumed',
});
