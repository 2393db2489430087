/* eslint-disable prettier/prettier */

/**
 * @file TabularDataset.ts
 * @description
 * Column-ordered table shared by the uplink encoder and the deduplicator.
 *
 * Invariant: every row has an own property for every entry of `columns`
 * (possibly the empty string). Rows are built with `Object.fromEntries`, so a
 * column literally named `__proto__` is stored as data and never reaches the
 * prototype chain; always read cells through {@link cellValue}.
 */

export type TabularRow = Readonly<Record<string, string>>

export type TabularDataset = {
  readonly columns: readonly string[]
  readonly rows: readonly TabularRow[]
}

/**
 * Returns the cell of `row` for `column`, or `''` when the row has no such cell.
 */
export function cellValue(row: TabularRow, column: string): string {
  return Object.hasOwn(row, column) ? row[column] : ''
}

/**
 * Builds a row covering exactly `columns`, reading each cell through `pick`.
 */
export function buildRow(
  columns: readonly string[],
  pick: (column: string) => string,
): TabularRow {
  return Object.fromEntries(columns.map((column) => [column, pick(column)]))
}

export function emptyDataset(): TabularDataset {
  return { columns: [], rows: [] }
}
