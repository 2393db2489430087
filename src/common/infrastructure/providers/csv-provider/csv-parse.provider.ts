/* eslint-disable prettier/prettier */
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import type { CsvProvider } from '../../../domain/providers/csv-provider.js'
import {
  cellValue,
  emptyDataset,
  type TabularDataset,
  type TabularRow,
} from '../../../domain/models/TabularDataset.js'
import { BadRequestError } from '../../../domain/errors/bad-request-error.js'

/**
 * @file csv-parse.provider.ts
 * @description
 * Concrete CSV provider built on the `csv-parse` / `csv-stringify` pair.
 *
 * Dialect (RFC 4180 style, the one spreadsheet tools expect):
 * - `,` delimiter, `"` quote, quotes doubled inside quoted fields
 * - `\r\n` after every record, including the last one
 * - a field is quoted only when it contains `,`, `"`, CR or LF
 *
 * Reading rules:
 * - leading UTF-8 BOM is dropped
 * - empty lines are skipped
 * - short records are padded with `''`; cells past the header are dropped
 */
export class CsvParseProvider implements CsvProvider {
  write(dataset: TabularDataset): string {
    if (dataset.columns.length === 0) return ''

    const records = [
      [...dataset.columns],
      ...dataset.rows.map((row) =>
        dataset.columns.map((column) => cellValue(row, column)),
      ),
    ]

    return stringify(records, {
      record_delimiter: 'windows',
      // record_delimiter alone only triggers quoting on a full CRLF
      quoted_match: /[\r\n]/,
    })
  }

  read(text: string): TabularDataset {
    let parsed: unknown
    try {
      parsed = parse(text, {
        bom: true,
        skip_empty_lines: true,
        relax_column_count: true,
      })
    } catch (err) {
      throw new BadRequestError(
        `Invalid CSV: ${err instanceof Error ? err.message : String(err)}`,
      )
    }

    const records = toRecords(parsed)
    if (records.length === 0) return emptyDataset()

    const [header, ...body] = records
    const rows = body.map((record): TabularRow =>
      Object.fromEntries(header.map((column, index) => [column, record[index] ?? ''])),
    )

    return { columns: header, rows }
  }
}

function toRecords(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return []

  return parsed.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => String(cell ?? '')) : [],
  )
}
