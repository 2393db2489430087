/* eslint-disable prettier/prettier */

/**
 * @file deduplicator.ts
 * @description
 * Stable, single-pass, first-occurrence-wins row filter.
 *
 * Composite key: the values of the key columns, in key order, joined with
 * {@link KEY_DELIMITER}. A column missing from the dataset contributes `''`.
 * Values that themselves contain the delimiter can make two different rows
 * look identical; that risk is accepted.
 *
 * The key spec is taken as given. An empty spec yields the same key for
 * every row (the dataset collapses to its first row); rejecting it is the
 * caller's job.
 */

import { cellValue, type TabularRow, type TabularDataset } from '../../../common/domain/models/TabularDataset.js'
import type { DedupKeySpec, DedupResult } from '../models/DedupResult.js'

export const KEY_DELIMITER = '|'

/**
 * Fields that identify an uplink row by default: frame counter + reception time.
 * A new array on every call.
 */
export function defaultKeySpec(): string[] {
  return ['f_cnt', 'received_at']
}

export function compositeKey(row: TabularRow, keySpec: DedupKeySpec): string {
  return keySpec.map((column) => cellValue(row, column)).join(KEY_DELIMITER)
}

export function deduplicate(
  dataset: TabularDataset,
  keySpec: DedupKeySpec = defaultKeySpec(),
): DedupResult {
  const seen = new Set<string>()
  const rows: TabularRow[] = []

  for (const row of dataset.rows) {
    const key = compositeKey(row, keySpec)
    if (seen.has(key)) continue

    seen.add(key)
    rows.push(row)
  }

  return {
    originalCount: dataset.rows.length,
    uniqueCount: rows.length,
    duplicatesRemoved: dataset.rows.length - rows.length,
    dataset: { columns: dataset.columns, rows },
  }
}
