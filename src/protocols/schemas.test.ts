/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { SchemaError } from '../lib/error.js';
import {
  brc20BalanceDeltas,
  normalizeDecimal,
  parseBlockHash,
  parseBrc20Receipts,
  parseNodeInfo,
  parseOrdinalReceipts,
  parseReceipts,
} from './schemas.js';

const HASH = 'c'.repeat(64);

describe('parseNodeInfo', () => {
  it('should return the tip height and normalized network', () => {
    assert.deepEqual(
      parseNodeInfo({
        data: { chainInfo: { network: 'Mainnet', ordBlockHeight: 850000 } },
      }),
      { height: 850000, network: 'bitcoin' },
    );
  });

  it('should reject a payload without a tip height', () => {
    assert.throws(
      () => parseNodeInfo({ data: { chainInfo: { network: 'bitcoin' } } }),
      (error: unknown) =>
        error instanceof SchemaError &&
        error.message.startsWith('Malformed node info: ') &&
        error.message.includes('data.chainInfo.ordBlockHeight'),
    );
  });
});

describe('parseBlockHash', () => {
  it('should trim and lower-case a valid hash', () => {
    assert.equal(parseBlockHash(` ${'AB'.repeat(32)}\n`), 'ab'.repeat(32));
  });

  it('should reject non-hash bodies', () => {
    assert.throws(() => parseBlockHash('not found'), SchemaError);
    assert.throws(() => parseBlockHash({ hash: HASH }), SchemaError);
  });
});

describe('parseOrdinalReceipts', () => {
  it('should flatten events across transactions', () => {
    const receipts = parseOrdinalReceipts(HASH, {
      data: {
        block: [
          {
            txid: 'tx-1',
            events: [
              {
                type: 'inscribed',
                inscriptionId: 'tx-1i0',
                sequenceNumber: 0,
                owner: 'bc1pone',
                contentHash: 'h1',
              },
            ],
          },
          {
            txid: 'tx-2',
            events: [
              {
                type: 'transferred',
                inscriptionId: 'tx-0i3',
                sequenceNumber: 4,
              },
            ],
          },
        ],
      },
    });

    assert.deepEqual(receipts, {
      protocol: 'ORDINAL',
      blockHash: HASH,
      events: [
        {
          inscriptionId: 'tx-1i0',
          txid: 'tx-1',
          action: 'inscribed',
          owner: 'bc1pone',
          contentHash: 'h1',
          sequence: 0,
        },
        {
          inscriptionId: 'tx-0i3',
          txid: 'tx-2',
          action: 'transferred',
          owner: null,
          contentHash: null,
          sequence: 4,
        },
      ],
    });
  });

  it('should treat a missing block list as an empty block', () => {
    assert.deepEqual(parseOrdinalReceipts(HASH, { data: null }).events, []);
    assert.deepEqual(
      parseOrdinalReceipts(HASH, { data: { block: [] } }).events,
      [],
    );
  });

  it('should reject an event without an inscription id', () => {
    assert.throws(
      () =>
        parseOrdinalReceipts(HASH, {
          data: {
            block: [
              { txid: 'tx-1', events: [{ type: 'x', sequenceNumber: 1 }] },
            ],
          },
        }),
      SchemaError,
    );
  });
});

describe('normalizeDecimal', () => {
  it('should strip insignificant zeros', () => {
    assert.equal(normalizeDecimal('0010.500'), '10.5');
    assert.equal(normalizeDecimal('7.000'), '7');
    assert.equal(normalizeDecimal('0'), '0');
    assert.equal(normalizeDecimal('000'), '0');
    assert.equal(normalizeDecimal('0.25'), '0.25');
  });
});

describe('brc20BalanceDeltas', () => {
  it('should credit the receiver of a mint', () => {
    assert.deepEqual(brc20BalanceDeltas('mint', '5', null, 'bc1qa'), {
      bc1qa: '5',
    });
  });

  it('should move the amount between sender and receiver', () => {
    assert.deepEqual(brc20BalanceDeltas('transfer', '5', 'bc1qa', 'bc1qb'), {
      bc1qa: '-5',
      bc1qb: '5',
    });
  });

  it('should net a transfer to self to zero', () => {
    assert.deepEqual(brc20BalanceDeltas('transfer', '5', 'bc1qa', 'bc1qa'), {
      bc1qa: '0',
    });
  });

  it('should debit the sender of a burn', () => {
    assert.deepEqual(brc20BalanceDeltas('burn', '2.5', 'bc1qa', null), {
      'bc1qa': '-2.5',
    });
  });

  it('should not change balances on deploy or inscribe-transfer', () => {
    assert.deepEqual(brc20BalanceDeltas('deploy', '0', 'bc1qa', null), {});
    assert.deepEqual(
      brc20BalanceDeltas('inscribe-transfer', '5', null, 'bc1qa'),
      {},
    );
  });
});

describe('parseBrc20Receipts', () => {
  it('should normalize tickers, amounts and operations', () => {
    const receipts = parseBrc20Receipts(HASH, {
      data: {
        block: [
          {
            txid: 'tx-1',
            events: [
              {
                type: 'Transfer',
                tick: 'ORDI',
                amount: '010.50',
                from: 'bc1qa',
                to: 'bc1qb',
                msg: 'ok',
              },
              {
                type: 'inscribeTransfer',
                tick: 'sats',
                amount: 3,
                to: 'bc1qa',
              },
            ],
          },
        ],
      },
    });

    assert.deepEqual(receipts.entries, [
      {
        ticker: 'ordi',
        txid: 'tx-1',
        operation: 'transfer',
        amount: '10.5',
        from: 'bc1qa',
        to: 'bc1qb',
        balanceDeltas: { bc1qa: '-10.5', bc1qb: '10.5' },
      },
      {
        ticker: 'sats',
        txid: 'tx-1',
        operation: 'inscribe-transfer',
        amount: '3',
        from: null,
        to: 'bc1qa',
        balanceDeltas: {},
      },
    ]);
  });

  it('should drop events the indexer marked invalid', () => {
    const receipts = parseBrc20Receipts(HASH, {
      data: {
        block: [
          {
            txid: 'tx-1',
            events: [
              { type: 'mint', tick: 'ordi', amount: '1', to: 'bc1qa' },
              {
                type: 'mint',
                tick: 'ordi',
                amount: '1',
                to: 'bc1qb',
                valid: false,
              },
            ],
          },
        ],
      },
    });

    assert.equal(receipts.entries.length, 1);
    assert.deepEqual(receipts.entries[0].balanceDeltas, { bc1qa: '1' });
  });

  it('should reject an unknown event type', () => {
    assert.throws(
      () =>
        parseBrc20Receipts(HASH, {
          data: {
            block: [{ txid: 'tx-1', events: [{ type: 'swap', tick: 'x' }] }],
          },
        }),
      { name: 'SchemaError', message: 'Unknown BRC20 event type: swap' },
    );
  });

  it('should reject a transfer without a sender', () => {
    assert.throws(
      () =>
        parseBrc20Receipts(HASH, {
          data: {
            block: [
              {
                txid: 'tx-9',
                events: [
                  { type: 'transfer', tick: 'x', amount: '1', to: 'bc1qb' },
                ],
              },
            ],
          },
        }),
      {
        name: 'SchemaError',
        message: "BRC20 transfer event in tx-9 is missing 'from'",
      },
    );
  });

  it('should reject a non-decimal amount', () => {
    assert.throws(
      () =>
        parseBrc20Receipts(HASH, {
          data: {
            block: [
              {
                txid: 'tx-1',
                events: [
                  { type: 'mint', tick: 'x', amount: '-1', to: 'bc1qa' },
                ],
              },
            ],
          },
        }),
      SchemaError,
    );
  });

  it('should reject numeric amounts that are not exact', () => {
    for (const amount of [2 ** 53 + 2, 0.5]) {
      assert.throws(
        () =>
          parseBrc20Receipts(HASH, {
            data: {
              block: [
                {
                  txid: 'tx-1',
                  events: [{ type: 'mint', tick: 'x', amount, to: 'bc1qa' }],
                },
              ],
            },
          }),
        SchemaError,
      );
    }
  });

  it('should keep large amounts sent as strings', () => {
    const receipts = parseBrc20Receipts(HASH, {
      data: {
        block: [
          {
            txid: 'tx-1',
            events: [
              {
                type: 'mint',
                tick: 'x',
                amount: '12345678901234567890',
                to: 'bc1qa',
              },
            ],
          },
        ],
      },
    });

    assert.equal(receipts.entries[0]?.amount, '12345678901234567890');
  });
});

describe('parseReceipts', () => {
  it('should dispatch on protocol', () => {
    assert.equal(
      parseReceipts('ORDINAL', HASH, { data: { block: [] } }).protocol,
      'ORDINAL',
    );
    assert.equal(
      parseReceipts('BRC20', HASH, { data: { block: [] } }).protocol,
      'BRC20',
    );
  });
});
