/* eslint-disable prettier/prettier */

/**
 * @file ExtractedRecord.ts
 * @description
 * Domain model of one uplink, flattened into named fields.
 *
 * Context:
 * - One valid line of a JSON-lines export becomes one record.
 * - Four reserved fields are always present (`device_id`, `received_at`,
 *   `f_port`, `f_cnt`); the keys of the decoded payload come after them.
 * - The field map is a `Map`, so payload keys such as `__proto__` or
 *   `constructor` are plain data.
 *
 * The record is immutable once built and owns no behaviour beyond lookups.
 */

import { renderFieldValue, type FieldValue } from './FieldValue.js'

export const RESERVED_FIELDS = ['device_id', 'received_at', 'f_port', 'f_cnt'] as const

export const UNKNOWN_DEVICE_ID = 'unknown'

export class ExtractedRecord {
  private readonly fields: ReadonlyMap<string, FieldValue>

  constructor(fields: ReadonlyMap<string, FieldValue>) {
    this.fields = new Map(fields)
  }

  /**
   * Grouping key: the rendered `device_id` field, after any payload overwrite.
   */
  get deviceId(): string {
    return this.getText('device_id') ?? UNKNOWN_DEVICE_ID
  }

  /**
   * Field names in insertion order (reserved fields first).
   */
  getFieldNames(): string[] {
    return [...this.fields.keys()]
  }

  getField(name: string): FieldValue | undefined {
    return this.fields.get(name)
  }

  /**
   * Rendered text of a field, or `undefined` when the record does not carry it.
   */
  getText(name: string): string | undefined {
    const field = this.fields.get(name)
    return field ? renderFieldValue(field) : undefined
  }

  /**
   * Plain object view (rendered values). Useful for logs and JSON responses.
   */
  toJSON(): Record<string, string> {
    return Object.fromEntries(
      [...this.fields].map(([name, field]) => [name, renderFieldValue(field)]),
    )
  }
}

/**
 * A line that could not be turned into a record.
 */
export type ParseFailure = {
  /** 1-based position of the line in the submitted text. */
  lineNumber: number
  /** The offending line, cut to {@link FAILURE_LINE_PREVIEW} characters. */
  line: string
  /** Decoder message (or structural reason). */
  reason: string
}

export const FAILURE_LINE_PREVIEW = 100

export type ExtractOutcome =
  | { ok: true; record: ExtractedRecord }
  | { ok: false; failure: ParseFailure }
