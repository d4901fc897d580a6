#!/usr/bin/env node
/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import express from 'express';
import { Server } from 'node:http';

import { Settings, USAGE, parseArgs, resolveSettings } from './cli.js';
import { errorSummary } from './lib/error.js';
import log, { configureLogger } from './log.js';
import * as metrics from './metrics.js';
import { createMetricsRouter } from './routes/metrics.js';
import { createSystem } from './system.js';
import { exitCodeFor } from './workers/reconciliation-engine.js';

process.on('uncaughtException', (error) => {
  metrics.uncaughtExceptionCounter.inc();
  log.error('Uncaught exception:', error);
});

let settings: Settings;
try {
  const cli = parseArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(USAGE);
    process.exit(0);
  }
  settings = resolveSettings(cli);
  configureLogger({ level: settings.logLevel, file: settings.logFile });
} catch (error) {
  log.error('Invalid configuration', errorSummary(error));
  console.error(USAGE);
  process.exit(1);
}

const { engine, checkpointStore, reportSink } = createSystem({
  log,
  settings,
});

// Metrics and status server
let server: Server | undefined;
if (settings.metricsPort !== undefined) {
  const port = settings.metricsPort;
  const app = express();
  app.use(createMetricsRouter({ getProgress: () => engine.getProgress() }));
  server = app.listen(port, () => {
    log.info(`Listening on port ${port}`);
  });
}

// First signal cancels gracefully, a second one exits immediately
let signalCount = 0;
const onSignal = (signal: NodeJS.Signals) => {
  signalCount++;
  if (signalCount > 1) {
    log.warn(`Received ${signal} again, exiting without cleanup`);
    process.exit(130);
  }
  log.info(`Received ${signal}, cancelling run`);
  engine.cancel();
};
process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

const startTime = Date.now();
const logProgress = () => {
  const progress = engine.getProgress();
  if (progress.state !== 'RUNNING') return;
  const elapsedSeconds = (Date.now() - startTime) / 1000;
  log.info('Reconciliation progress', {
    processed: `${progress.blocksProcessed}/${progress.blocksTotal}`,
    blocksPerSecond:
      elapsedSeconds > 0
        ? Number((progress.blocksProcessed / elapsedSeconds).toFixed(2))
        : 0,
    lastReconciledHeight: progress.lastReconciledHeight,
    divergences: progress.divergenceCount,
  });
};
const progressTimer =
  settings.progressIntervalMs > 0
    ? setInterval(logProgress, settings.progressIntervalMs)
    : undefined;

const summary = await engine.run();
clearInterval(progressTimer);

const elapsedSeconds = summary.durationMs / 1000;
log.info('Run finished', {
  status: summary.status,
  elapsedSeconds,
  secondsPerBlock:
    summary.blocksProcessed > 0
      ? Number((elapsedSeconds / summary.blocksProcessed).toFixed(4))
      : undefined,
});

try {
  await reportSink.close();
} catch (error) {
  log.error('Failed to close report', errorSummary(error));
}
try {
  await checkpointStore.close();
} catch (error) {
  log.error('Failed to close checkpoint store', errorSummary(error));
}
server?.close();
process.off('SIGINT', onSignal);
process.off('SIGTERM', onSignal);

process.exitCode = exitCodeFor(summary);
