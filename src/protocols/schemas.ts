/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { z } from 'zod';

import { normalizeNetwork } from '../chains.js';
import { SchemaError } from '../lib/error.js';
import {
  Brc20Entry,
  Brc20Operation,
  Brc20Receipts,
  ChainTip,
  OrdinalEvent,
  OrdinalReceipts,
  ProtocolId,
  Receipts,
} from '../types.js';

// --------------------------------------------------------------------------
// Wire schemas
// --------------------------------------------------------------------------

const DECIMAL_REGEX = /^\d+(\.\d+)?$/;
const BLOCK_HASH_REGEX = /^[0-9a-fA-F]{64}$/;

/** GET /api/v1/node/info */
export const NodeInfoResponseSchema = z.object({
  data: z.object({
    chainInfo: z.object({
      network: z.string().min(1),
      ordBlockHeight: z.number().int().nonnegative(),
    }),
  }),
});

/** One inscription event as reported by /api/v1/ord/block/{hash}/events */
export const OrdinalEventSchema = z.object({
  type: z.string().min(1),
  inscriptionId: z.string().min(1),
  sequenceNumber: z.number().int().nonnegative(),
  owner: z.string().nullish(),
  contentHash: z.string().nullish(),
});

/** One token event as reported by /api/v1/brc20/block/{hash}/events */
export const Brc20EventSchema = z.object({
  type: z.string().min(1),
  tick: z.string().min(1),
  amount: z
    .union([
      z.string(),
      // Exact only up to 2^53
      z
        .number()
        .refine(Number.isSafeInteger, 'Numeric amounts must be safe integers'),
    ])
    .transform((value) => String(value))
    .refine((value) => DECIMAL_REGEX.test(value), 'Must be a decimal amount')
    .optional(),
  from: z.string().nullish(),
  to: z.string().nullish(),
  valid: z.boolean().default(true),
  // Free-text indexer message, never compared
  msg: z.string().nullish(),
});

function blockEventsResponseSchema<T extends z.ZodTypeAny>(eventSchema: T) {
  return z.object({
    data: z
      .object({
        block: z
          .array(
            z.object({
              txid: z.string().min(1),
              events: z.array(eventSchema).nullish(),
            }),
          )
          .nullish(),
      })
      .nullish(),
  });
}

export const OrdinalBlockEventsResponseSchema =
  blockEventsResponseSchema(OrdinalEventSchema);
export const Brc20BlockEventsResponseSchema =
  blockEventsResponseSchema(Brc20EventSchema);

export type OrdinalWireEvent = z.infer<typeof OrdinalEventSchema>;
export type Brc20WireEvent = z.infer<typeof Brc20EventSchema>;

// --------------------------------------------------------------------------
// Parsing
// --------------------------------------------------------------------------

function parseWith<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  description: string,
): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new SchemaError(`Malformed ${description}: ${issues.join('; ')}`, {
      issues,
    });
  }
  return result.data;
}

export function parseNodeInfo(payload: unknown): ChainTip {
  const { data } = parseWith(NodeInfoResponseSchema, payload, 'node info');
  return {
    height: data.chainInfo.ordBlockHeight,
    network: normalizeNetwork(data.chainInfo.network),
  };
}

export function parseBlockHash(payload: unknown): string {
  const hash = typeof payload === 'string' ? payload.trim() : '';
  if (!BLOCK_HASH_REGEX.test(hash)) {
    throw new SchemaError('Malformed block hash response', {
      received: typeof payload === 'string' ? payload.slice(0, 100) : payload,
    });
  }
  return hash.toLowerCase();
}

export function parseOrdinalReceipts(
  blockHash: string,
  payload: unknown,
): OrdinalReceipts {
  const { data } = parseWith(
    OrdinalBlockEventsResponseSchema,
    payload,
    'ORDINAL block events',
  );

  const events: OrdinalEvent[] = [];
  for (const tx of data?.block ?? []) {
    for (const event of tx.events ?? []) {
      events.push({
        inscriptionId: event.inscriptionId,
        txid: tx.txid,
        action: event.type,
        owner: event.owner ?? null,
        contentHash: event.contentHash ?? null,
        sequence: event.sequenceNumber,
      });
    }
  }

  return { protocol: 'ORDINAL', blockHash, events };
}

const BRC20_OPERATIONS: Record<string, Brc20Operation> = {
  deploy: 'deploy',
  mint: 'mint',
  inscribetransfer: 'inscribe-transfer',
  'inscribe-transfer': 'inscribe-transfer',
  inscribe_transfer: 'inscribe-transfer',
  transfer: 'transfer',
  burn: 'burn',
};

/**
 * Strips leading zeros from the integer part and trailing zeros from the
 * fraction so that "0010.500" and "10.5" compare equal.
 */
export function normalizeDecimal(value: string): string {
  const [integerPart, fractionPart = ''] = value.split('.');
  const integer = integerPart.replace(/^0+(?=\d)/, '');
  const fraction = fractionPart.replace(/0+$/, '');
  return fraction === '' ? integer : `${integer}.${fraction}`;
}

function negate(amount: string): string {
  return amount === '0' ? '0' : `-${amount}`;
}

function requireAddress(
  address: string | null | undefined,
  field: 'from' | 'to',
  event: Brc20WireEvent,
  txid: string,
): string {
  if (address === null || address === undefined || address === '') {
    throw new SchemaError(
      `BRC20 ${event.type} event in ${txid} is missing '${field}'`,
      { txid, tick: event.tick },
    );
  }
  return address;
}

export function brc20BalanceDeltas(
  operation: Brc20Operation,
  amount: string,
  from: string | null,
  to: string | null,
): Record<string, string> {
  switch (operation) {
    case 'mint':
      return to !== null ? { [to]: amount } : {};
    case 'transfer':
      if (from !== null && from === to) {
        return { [from]: '0' };
      }
      return {
        ...(from !== null && { [from]: negate(amount) }),
        ...(to !== null && { [to]: amount }),
      };
    case 'burn':
      return from !== null ? { [from]: negate(amount) } : {};
    default:
      return {};
  }
}

function toBrc20Entry(event: Brc20WireEvent, txid: string): Brc20Entry {
  const operation = BRC20_OPERATIONS[event.type.toLowerCase()];
  if (operation === undefined) {
    throw new SchemaError(`Unknown BRC20 event type: ${event.type}`, {
      txid,
      tick: event.tick,
    });
  }

  const amount = normalizeDecimal(event.amount ?? '0');
  const from =
    operation === 'transfer' || operation === 'burn'
      ? requireAddress(event.from, 'from', event, txid)
      : (event.from ?? null);
  const to =
    operation === 'transfer' || operation === 'mint'
      ? requireAddress(event.to, 'to', event, txid)
      : (event.to ?? null);

  return {
    ticker: event.tick.toLowerCase(),
    txid,
    operation,
    amount,
    from,
    to,
    balanceDeltas: brc20BalanceDeltas(operation, amount, from, to),
  };
}

export function parseBrc20Receipts(
  blockHash: string,
  payload: unknown,
): Brc20Receipts {
  const { data } = parseWith(
    Brc20BlockEventsResponseSchema,
    payload,
    'BRC20 block events',
  );

  const entries: Brc20Entry[] = [];
  for (const tx of data?.block ?? []) {
    for (const event of tx.events ?? []) {
      // Events the indexer itself rejected carry no ledger effect
      if (!event.valid) continue;
      entries.push(toBrc20Entry(event, tx.txid));
    }
  }

  return { protocol: 'BRC20', blockHash, entries };
}

export function parseReceipts(
  protocol: ProtocolId,
  blockHash: string,
  payload: unknown,
): Receipts {
  switch (protocol) {
    case 'ORDINAL':
      return parseOrdinalReceipts(blockHash, payload);
    case 'BRC20':
      return parseBrc20Receipts(blockHash, payload);
  }
}
