/* eslint-disable prettier/prettier */

/**
 * @file tabular-encoder.ts
 * @description
 * Schema unification for one device group.
 *
 * - columns: union of the field names of every record, sorted by Unicode
 *   code point, so the header never depends on arrival order
 * - rows: one per record, same order, every column present (`''` when the
 *   record lacks it)
 */

import type { ExtractedRecord } from '../models/ExtractedRecord.js'
import { buildRow, type TabularDataset } from '../../../common/domain/models/TabularDataset.js'

/**
 * Code point order. `Array.prototype.sort` alone compares UTF-16 code units,
 * which misplaces characters outside the BMP.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = a[Symbol.iterator]()
  const right = b[Symbol.iterator]()

  for (;;) {
    const l = left.next()
    const r = right.next()
    if (l.done || r.done) return l.done === r.done ? 0 : l.done ? -1 : 1

    const diff = (l.value.codePointAt(0) ?? 0) - (r.value.codePointAt(0) ?? 0)
    if (diff !== 0) return diff
  }
}

export function unifySchema(records: readonly ExtractedRecord[]): string[] {
  const names = new Set<string>()
  for (const record of records) {
    for (const name of record.getFieldNames()) names.add(name)
  }
  return [...names].sort(compareCodePoints)
}

export function encode(records: readonly ExtractedRecord[]): TabularDataset {
  const columns = unifySchema(records)
  const rows = records.map((record) =>
    buildRow(columns, (column) => record.getText(column) ?? ''),
  )

  return { columns, rows }
}
