/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { SchemaError } from '../lib/error.js';
import { DivergenceEntry, ProtocolComparator, Receipts } from '../types.js';
import { Brc20Comparator } from './brc20.js';
import { OrdinalComparator } from './ordinal.js';

// Adding a protocol means adding a receipts variant and an entry here
export const COMPARATORS: {
  ORDINAL: ProtocolComparator<'ORDINAL'>;
  BRC20: ProtocolComparator<'BRC20'>;
} = {
  ORDINAL: new OrdinalComparator(),
  BRC20: new Brc20Comparator(),
};

/**
 * Dispatches a receipt pair to the comparator for its protocol. Both sides
 * must carry the same protocol tag.
 */
export function compareReceipts(
  height: number,
  primary: Receipts,
  secondary: Receipts,
): DivergenceEntry[] {
  if (primary.protocol === 'ORDINAL' && secondary.protocol === 'ORDINAL') {
    return COMPARATORS.ORDINAL.compare(height, primary, secondary);
  }
  if (primary.protocol === 'BRC20' && secondary.protocol === 'BRC20') {
    return COMPARATORS.BRC20.compare(height, primary, secondary);
  }
  throw new SchemaError(
    `Receipt protocols differ at height ${height}: primary=${primary.protocol} secondary=${secondary.protocol}`,
    { height },
  );
}

export { Brc20Comparator, OrdinalComparator };
export * from './schemas.js';
