/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  DivergenceEntry,
  OrdinalEvent,
  OrdinalReceipts,
  ProtocolComparator,
} from '../types.js';
import { compareKeyed } from './keyed-diff.js';

const COMPARED_FIELDS = ['owner', 'contentHash', 'sequence'] as const;

/**
 * Matches inscription events by inscription id and compares owner, content
 * hash and transfer sequence number.
 */
export class OrdinalComparator implements ProtocolComparator<'ORDINAL'> {
  readonly protocol = 'ORDINAL';

  compare(
    height: number,
    primary: OrdinalReceipts,
    secondary: OrdinalReceipts,
  ): DivergenceEntry[] {
    return compareKeyed<OrdinalEvent>({
      height,
      primary: primary.events,
      secondary: secondary.events,
      label: 'Inscription',
      keyOf: (event) => event.inscriptionId,
      fields: COMPARED_FIELDS,
      reportCountMismatch: false,
    });
  }
}
