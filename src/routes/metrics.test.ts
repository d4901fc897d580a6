/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import express from 'express';
import * as promClient from 'prom-client';
import request from 'supertest';

import { EngineProgress } from '../workers/reconciliation-engine.js';
import { createMetricsRouter } from './metrics.js';

const progress: EngineProgress = {
  state: 'RUNNING',
  range: { start: 100, end: 199 },
  blocksProcessed: 40,
  blocksTotal: 100,
  lastReconciledHeight: 139,
  divergenceCount: 2,
};

function createApp(registry: promClient.Registry) {
  const app = express();
  app.use(createMetricsRouter({ getProgress: () => progress, registry }));
  return app;
}

describe('metrics router', () => {
  it('should serve the registry in Prometheus text format', async () => {
    const registry = new promClient.Registry();
    const counter = new promClient.Counter({
      name: 'test_blocks_total',
      help: 'Test counter',
      registers: [registry],
    });
    counter.inc(3);

    const res = await request(createApp(registry)).get('/metrics');

    assert.equal(res.status, 200);
    assert.match(res.headers['content-type'], /^text\/plain/);
    assert.match(res.text, /^test_blocks_total 3$/m);
  });

  it('should serve engine progress as JSON', async () => {
    const res = await request(createApp(new promClient.Registry())).get(
      '/status',
    );

    assert.equal(res.status, 200);
    assert.deepEqual(res.body, progress);
  });
});
