/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Router } from 'express';
import * as promClient from 'prom-client';

import { EngineProgress } from '../workers/reconciliation-engine.js';

export function createMetricsRouter({
  getProgress,
  registry = promClient.register,
}: {
  getProgress: () => EngineProgress;
  registry?: promClient.Registry;
}): Router {
  const router = Router();

  router.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', registry.contentType);
      res.send(await registry.metrics());
    } catch (error: unknown) {
      res.status(500).send(error instanceof Error ? error.message : 'Error');
    }
  });

  router.get('/status', (_req, res) => {
    res.json(getProgress());
  });

  return router;
}
