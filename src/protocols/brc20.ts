/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  Brc20Entry,
  Brc20Receipts,
  DivergenceEntry,
  ProtocolComparator,
} from '../types.js';
import { compareKeyed } from './keyed-diff.js';

const COMPARED_FIELDS = ['operation', 'balanceDeltas'] as const;

/**
 * Matches token ledger entries by (ticker, txid) and compares operation type
 * and per-address balance deltas. Differing totals are reported even when
 * every matched entry agrees, since a one-sided superset is a divergence.
 */
export class Brc20Comparator implements ProtocolComparator<'BRC20'> {
  readonly protocol = 'BRC20';

  compare(
    height: number,
    primary: Brc20Receipts,
    secondary: Brc20Receipts,
  ): DivergenceEntry[] {
    return compareKeyed<Brc20Entry>({
      height,
      primary: primary.entries,
      secondary: secondary.entries,
      label: 'BRC20 entry',
      keyOf: (entry) => `${entry.ticker}:${entry.txid}`,
      fields: COMPARED_FIELDS,
      reportCountMismatch: true,
    });
  }
}
