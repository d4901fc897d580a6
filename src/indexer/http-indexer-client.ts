/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { default as axios, AxiosInstance, ResponseType } from 'axios';
import winston from 'winston';

import { SchemaError, TransientFetchError } from '../lib/error.js';
import * as metrics from '../metrics.js';
import {
  parseBlockHash,
  parseNodeInfo,
  parseReceipts,
} from '../protocols/schemas.js';
import {
  ChainId,
  ChainTip,
  ProtocolId,
  ReceiptSource,
  Receipts,
} from '../types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const EVENTS_ROUTES: Record<ProtocolId, string> = {
  ORDINAL: 'ord',
  BRC20: 'brc20',
};

/**
 * Reads chain tips, block hashes and per-block protocol events from a single
 * indexer's REST API. Each endpoint serves exactly one chain; the network it
 * reports is checked by the engine before a run starts.
 */
export class HttpIndexerClient implements ReceiptSource {
  readonly endpoint: string;
  private log: winston.Logger;
  private axiosInstance: AxiosInstance;

  constructor({
    log,
    endpoint,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  }: {
    log: winston.Logger;
    endpoint: string;
    requestTimeoutMs?: number;
  }) {
    this.endpoint = endpoint.replace(/\/+$/, '');
    this.log = log.child({ class: this.constructor.name, endpoint });
    this.axiosInstance = axios.create({
      baseURL: this.endpoint,
      timeout: requestTimeoutMs,
      headers: { Accept: 'application/json, text/plain' },
    });
  }

  async getTip({
    chain,
    signal,
  }: {
    chain: ChainId;
    signal?: AbortSignal;
  }): Promise<ChainTip> {
    const payload = await this.get({
      route: 'node-info',
      path: '/api/v1/node/info',
      signal,
    });
    const tip = parseNodeInfo(payload);
    this.log.debug('Fetched chain tip', { chain, ...tip });
    return tip;
  }

  async getBlockHash(height: number, signal?: AbortSignal): Promise<string> {
    const payload = await this.get({
      route: 'blockhash',
      path: `/blockhash/${height}`,
      responseType: 'text',
      signal,
    });
    return parseBlockHash(payload);
  }

  async getBlockReceipts({
    protocol,
    height,
    signal,
  }: {
    chain: ChainId;
    protocol: ProtocolId;
    height: number;
    signal?: AbortSignal;
  }): Promise<Receipts> {
    const blockHash = await this.getBlockHash(height, signal);
    const payload = await this.get({
      route: `${EVENTS_ROUTES[protocol]}-events`,
      path: `/api/v1/${EVENTS_ROUTES[protocol]}/block/${blockHash}/events`,
      signal,
    });
    return parseReceipts(protocol, blockHash, payload);
  }

  private async get({
    route,
    path,
    responseType,
    signal,
  }: {
    route: string;
    path: string;
    responseType?: ResponseType;
    signal?: AbortSignal;
  }): Promise<unknown> {
    const start = Date.now();
    try {
      const response = await this.axiosInstance.get<unknown>(path, {
        responseType,
        signal,
      });
      metrics.indexerRequestsCounter.inc({
        endpoint: this.endpoint,
        route,
        outcome: 'success',
      });
      return response.data;
    } catch (error) {
      const classified = this.classifyError(error, path);
      metrics.indexerRequestsCounter.inc({
        endpoint: this.endpoint,
        route,
        outcome: classified instanceof Error ? classified.name : 'unknown',
      });
      throw classified;
    } finally {
      metrics.indexerRequestDurationSummary.observe(
        { endpoint: this.endpoint, route },
        Date.now() - start,
      );
    }
  }

  private classifyError(error: unknown, path: string): unknown {
    if (axios.isCancel(error) || !axios.isAxiosError(error)) {
      return error;
    }
    if (error.code === 'ERR_CANCELED') {
      return error;
    }

    const url = `${this.endpoint}${path}`;
    const status = error.response?.status;

    if (status === undefined) {
      const reason =
        error.code !== undefined && TIMEOUT_CODES.has(error.code)
          ? 'Timeout'
          : 'Unavailable';
      return new TransientFetchError(
        `Request to ${url} failed: ${error.message}`,
        { reason, endpoint: this.endpoint, path, code: error.code },
      );
    }

    // 404 usually means the indexer has not caught up to the height yet
    if (status >= 500 || status === 429 || status === 404) {
      return new TransientFetchError(
        `Request to ${url} returned status ${status}`,
        { reason: 'Unavailable', endpoint: this.endpoint, path, status },
      );
    }

    return new SchemaError(`Request to ${url} returned status ${status}`, {
      endpoint: this.endpoint,
      path,
      status,
    });
  }
}
