/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import EventEmitter from 'node:events';
import winston from 'winston';

import { Settings } from './cli.js';
import { HttpIndexerClient } from './indexer/http-indexer-client.js';
import { CompositeReportSink } from './report/composite-report-sink.js';
import { JsonlReportSink } from './report/jsonl-report-sink.js';
import { LogReportSink } from './report/log-report-sink.js';
import { FsKVStore } from './store/fs-kv-store.js';
import { KvCheckpointStore } from './store/kv-checkpoint-store.js';
import { NodeKvStore } from './store/node-kv-store.js';
import { KVBufferStore, ReportSink } from './types.js';
import { ReconciliationEngine } from './workers/reconciliation-engine.js';

export interface System {
  eventEmitter: EventEmitter;
  engine: ReconciliationEngine;
  checkpointStore: KvCheckpointStore;
  reportSink: ReportSink;
}

function makeKvBufferStore(settings: Settings): KVBufferStore {
  switch (settings.checkpointStoreType) {
    case 'fs':
      return new FsKVStore({ baseDir: settings.checkpointDir });
    case 'memory':
      return new NodeKvStore();
  }
}

export function createSystem({
  log,
  settings,
}: {
  log: winston.Logger;
  settings: Settings;
}): System {
  const eventEmitter = new EventEmitter();

  const primary = new HttpIndexerClient({
    log,
    endpoint: settings.run.primaryEndpoint,
    requestTimeoutMs: settings.requestTimeoutMs,
  });
  const secondary = new HttpIndexerClient({
    log,
    endpoint: settings.run.secondaryEndpoint,
    requestTimeoutMs: settings.requestTimeoutMs,
  });

  const checkpointStore = new KvCheckpointStore({
    log,
    kvBufferStore: makeKvBufferStore(settings),
  });

  const sinks: ReportSink[] = [new LogReportSink({ log })];
  if (settings.reportFile !== undefined) {
    sinks.push(new JsonlReportSink({ filePath: settings.reportFile }));
  }
  const reportSink = new CompositeReportSink({ sinks });

  const engine = new ReconciliationEngine({
    log,
    eventEmitter,
    primary,
    secondary,
    checkpointStore,
    reportSink,
    config: settings.run,
    maxAttempts: settings.maxAttempts,
    retryBaseDelayMs: settings.retryBaseDelayMs,
    retryMaxDelayMs: settings.retryMaxDelayMs,
    maxRequestsPerSecond: settings.maxRequestsPerSecond,
    gracePeriodMs: settings.gracePeriodMs,
    bufferCapacity: settings.bufferCapacity,
    reportBucketSize: settings.reportBucketSize,
  });

  return { eventEmitter, engine, checkpointStore, reportSink };
}
