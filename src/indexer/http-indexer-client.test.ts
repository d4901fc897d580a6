/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { afterEach, describe, it, mock } from 'node:test';
import axios from 'axios';
import winston from 'winston';

import { SchemaError, TransientFetchError } from '../lib/error.js';
import { HttpIndexerClient } from './http-indexer-client.js';

const log = winston.createLogger({ silent: true });

const BLOCK_HASH = 'ab'.repeat(32);

type GetHandler = (path: string) => Promise<{ status: number; data: unknown }>;

function mockAxios(handler: GetHandler) {
  const mockAxiosInstance = {
    get: mock.fn((path: string, _config?: unknown) => handler(path)),
  };
  const create = mock.method(axios, 'create', () => mockAxiosInstance);
  return { mockAxiosInstance, create };
}

function axiosError(code: string | undefined, status?: number) {
  return {
    isAxiosError: true,
    name: 'AxiosError',
    message: status !== undefined ? `status ${status}` : `error ${code}`,
    code,
    response: status !== undefined ? { status, data: '' } : undefined,
  };
}

function rejectWith(error: unknown): GetHandler {
  return () => Promise.reject(error);
}

describe('HttpIndexerClient', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe('constructor', () => {
    it('should strip trailing slashes from the endpoint', () => {
      const { create } = mockAxios(rejectWith(new Error('unused')));
      const client = new HttpIndexerClient({
        log,
        endpoint: 'http://primary.test/',
        requestTimeoutMs: 1234,
      });

      assert.equal(client.endpoint, 'http://primary.test');
      assert.equal(create.mock.calls.length, 1);
    });
  });

  describe('getTip', () => {
    it('should return the height and normalized network', async () => {
      const { mockAxiosInstance } = mockAxios(async () => ({
        status: 200,
        data: {
          data: { chainInfo: { network: 'mainnet', ordBlockHeight: 840000 } },
        },
      }));
      const client = new HttpIndexerClient({
        log,
        endpoint: 'http://primary.test',
      });

      const tip = await client.getTip({ chain: 'BITCOIN' });

      assert.deepEqual(tip, { height: 840000, network: 'bitcoin' });
      assert.equal(
        mockAxiosInstance.get.mock.calls[0].arguments[0],
        '/api/v1/node/info',
      );
    });
  });

  describe('getBlockReceipts', () => {
    it('should resolve the block hash and fetch ordinal events by hash', async () => {
      const { mockAxiosInstance } = mockAxios(async (path) => {
        if (path === '/blockhash/800000') {
          return { status: 200, data: `${BLOCK_HASH}\n` };
        }
        return {
          status: 200,
          data: {
            data: {
              block: [
                {
                  txid: 'tx-1',
                  events: [
                    {
                      type: 'inscribed',
                      inscriptionId: 'tx-1i0',
                      sequenceNumber: 5,
                      owner: 'bc1powner',
                    },
                  ],
                },
              ],
            },
          },
        };
      });
      const client = new HttpIndexerClient({
        log,
        endpoint: 'http://primary.test',
      });

      const receipts = await client.getBlockReceipts({
        chain: 'BITCOIN',
        protocol: 'ORDINAL',
        height: 800000,
      });

      assert.deepEqual(
        mockAxiosInstance.get.mock.calls.map((call) => call.arguments[0]),
        ['/blockhash/800000', `/api/v1/ord/block/${BLOCK_HASH}/events`],
      );
      assert.equal(receipts.protocol, 'ORDINAL');
      assert.equal(receipts.blockHash, BLOCK_HASH);
      assert.ok(receipts.protocol === 'ORDINAL');
      assert.equal(receipts.events.length, 1);
      assert.equal(receipts.events[0].sequence, 5);
    });

    it('should fetch brc20 events from the brc20 route', async () => {
      const { mockAxiosInstance } = mockAxios(async (path) =>
        path.startsWith('/blockhash/')
          ? { status: 200, data: BLOCK_HASH }
          : { status: 200, data: { data: { block: [] } } },
      );
      const client = new HttpIndexerClient({
        log,
        endpoint: 'http://secondary.test',
      });

      const receipts = await client.getBlockReceipts({
        chain: 'FRACTAL',
        protocol: 'BRC20',
        height: 21001,
      });

      assert.equal(
        mockAxiosInstance.get.mock.calls[1].arguments[0],
        `/api/v1/brc20/block/${BLOCK_HASH}/events`,
      );
      assert.deepEqual(receipts, {
        protocol: 'BRC20',
        blockHash: BLOCK_HASH,
        entries: [],
      });
    });

    it('should reject a malformed block hash as a schema error', async () => {
      mockAxios(async () => ({ status: 200, data: '<html>oops</html>' }));
      const client = new HttpIndexerClient({
        log,
        endpoint: 'http://primary.test',
      });

      await assert.rejects(
        client.getBlockReceipts({
          chain: 'BITCOIN',
          protocol: 'ORDINAL',
          height: 1,
        }),
        SchemaError,
      );
    });
  });

  describe('error classification', () => {
    const fetchHash = (error: unknown) => {
      mockAxios(rejectWith(error));
      const client = new HttpIndexerClient({
        log,
        endpoint: 'http://primary.test',
      });
      return client.getBlockHash(10);
    };

    it('should classify timeouts as transient', async () => {
      await assert.rejects(
        fetchHash(axiosError('ECONNABORTED')),
        (error: unknown) =>
          error instanceof TransientFetchError && error.reason === 'Timeout',
      );
    });

    it('should classify connection failures as transient', async () => {
      await assert.rejects(
        fetchHash(axiosError('ECONNRESET')),
        (error: unknown) =>
          error instanceof TransientFetchError &&
          error.reason === 'Unavailable',
      );
    });

    for (const status of [404, 429, 500, 503]) {
      it(`should classify status ${status} as transient`, async () => {
        await assert.rejects(fetchHash(axiosError('ERR_BAD_RESPONSE', status)), {
          name: 'TransientFetchError',
          message: `Request to http://primary.test/blockhash/10 returned status ${status}`,
        });
      });
    }

    it('should classify other client errors as schema errors', async () => {
      await assert.rejects(fetchHash(axiosError('ERR_BAD_REQUEST', 400)), {
        name: 'SchemaError',
        message: 'Request to http://primary.test/blockhash/10 returned status 400',
      });
    });

    it('should pass cancellations through unchanged', async () => {
      const canceled = axiosError('ERR_CANCELED');
      await assert.rejects(fetchHash(canceled), (error: unknown) => {
        assert.equal(error, canceled);
        return true;
      });
    });
  });
});
