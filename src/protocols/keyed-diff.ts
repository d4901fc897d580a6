/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { canonicalize } from 'json-canonicalize';

import {
  DIVERGENCE_KINDS,
  DivergenceEntry,
  FieldDifference,
} from '../types.js';

export const COUNT_KEY = '*';

/**
 * Indexes items by their match key. Repeats of the same base key within one
 * block are paired in order of appearance as `<key>#1`, `<key>#2`, ...
 */
export function keyByOccurrence<T>(
  items: readonly T[],
  baseKey: (item: T) => string,
): Map<string, T> {
  const occurrences = new Map<string, number>();
  const keyed = new Map<string, T>();

  for (const item of items) {
    const base = baseKey(item);
    const seen = occurrences.get(base) ?? 0;
    occurrences.set(base, seen + 1);
    keyed.set(seen === 0 ? base : `${base}#${seen}`, item);
  }

  return keyed;
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === 'object' && typeof b === 'object' && a !== null && b !== null) {
    return canonicalize(a) === canonicalize(b);
  }
  return false;
}

export function diffFields<T>(
  primary: T,
  secondary: T,
  fields: readonly (keyof T & string)[],
): FieldDifference[] {
  const differences: FieldDifference[] = [];
  for (const field of fields) {
    if (!valuesEqual(primary[field], secondary[field])) {
      differences.push({
        field,
        primary: primary[field],
        secondary: secondary[field],
      });
    }
  }
  return differences;
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Orders entries by match key, then by divergence kind. Locale-independent
 * so output is identical on every host.
 */
export function sortDivergences(entries: DivergenceEntry[]): DivergenceEntry[] {
  return [...entries].sort(
    (a, b) =>
      compareCodeUnits(a.detail.key, b.detail.key) ||
      DIVERGENCE_KINDS.indexOf(a.kind) - DIVERGENCE_KINDS.indexOf(b.kind),
  );
}

export interface KeyedDiffParams<T> {
  height: number;
  primary: readonly T[];
  secondary: readonly T[];
  label: string;
  keyOf: (item: T) => string;
  fields: readonly (keyof T & string)[];
  reportCountMismatch: boolean;
}

/**
 * Matches two receipt lists by key and reports unmatched keys, differing
 * fields on matched keys and, optionally, differing totals.
 */
export function compareKeyed<T>({
  height,
  primary,
  secondary,
  label,
  keyOf,
  fields,
  reportCountMismatch,
}: KeyedDiffParams<T>): DivergenceEntry[] {
  const entries: DivergenceEntry[] = [];
  const primaryByKey = keyByOccurrence(primary, keyOf);
  const secondaryByKey = keyByOccurrence(secondary, keyOf);

  if (reportCountMismatch && primary.length !== secondary.length) {
    entries.push({
      height,
      kind: 'COUNT_MISMATCH',
      detail: {
        key: COUNT_KEY,
        message: `${label} count differs: primary=${primary.length} secondary=${secondary.length}`,
        primaryCount: primary.length,
        secondaryCount: secondary.length,
      },
    });
  }

  for (const [key, primaryItem] of primaryByKey) {
    const secondaryItem = secondaryByKey.get(key);
    if (secondaryItem === undefined) {
      entries.push({
        height,
        kind: 'MISSING_IN_SECONDARY',
        detail: { key, message: `${label} ${key} missing in secondary` },
      });
      continue;
    }

    const differences = diffFields(primaryItem, secondaryItem, fields);
    if (differences.length > 0) {
      entries.push({
        height,
        kind: 'FIELD_MISMATCH',
        detail: {
          key,
          message: `${label} ${key} differs in ${differences
            .map((d) => d.field)
            .join(', ')}`,
          fields: differences,
        },
      });
    }
  }

  for (const key of secondaryByKey.keys()) {
    if (!primaryByKey.has(key)) {
      entries.push({
        height,
        kind: 'MISSING_IN_PRIMARY',
        detail: { key, message: `${label} ${key} missing in primary` },
      });
    }
  }

  return sortDivergences(entries);
}
