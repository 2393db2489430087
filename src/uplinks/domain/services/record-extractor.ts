/* eslint-disable prettier/prettier */

/**
 * @file record-extractor.ts
 * @description
 * Turns lines of a gateway JSON-lines export into {@link ExtractedRecord}s.
 *
 * Expected envelope (anything missing is defaulted, never rejected):
 *
 * ```json
 * {"result": {
 *   "end_device_ids": {"device_id": "dev1"},
 *   "received_at": "2024-01-01T00:00:00Z",
 *   "uplink_message": {"f_port": 1, "f_cnt": 5, "decoded_payload": {"temp": 21.5}}
 * }}
 * ```
 *
 * Field merge order:
 * 1. reserved fields with their defaults (`device_id` → `unknown`, the rest → `''`)
 * 2. every top-level key of `decoded_payload`, overwriting a reserved field
 *    of the same name (last write wins)
 * 3. a `device_id` left null by either source becomes `unknown`
 *
 * Decoding goes through `lossless-json`, so numbers keep their source text
 * (`20.0`, `9007199254740993`). It also refuses an object repeating a key
 * with a different value; such a line is a failure.
 *
 * Nested payload values are not flattened; they travel as `structured`
 * values. Only a line that is not JSON, or not a JSON object, fails.
 *
 * Pure: no logging, no I/O. Callers decide what to do with failures.
 */

import { isLosslessNumber, parse } from 'lossless-json'
import {
  ExtractedRecord,
  FAILURE_LINE_PREVIEW,
  UNKNOWN_DEVICE_ID,
  type ExtractOutcome,
  type ParseFailure,
} from '../models/ExtractedRecord.js'
import {
  EMPTY_FIELD,
  stringField,
  toFieldValue,
  type FieldValue,
} from '../models/FieldValue.js'

type JsonObject = Record<string, unknown>

export type ExtractionBatch = {
  records: ExtractedRecord[]
  failures: ParseFailure[]
}

function isObject(value: unknown): value is JsonObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !isLosslessNumber(value)
  )
}

function ownValue(source: JsonObject, key: string): unknown {
  return Object.hasOwn(source, key) ? source[key] : undefined
}

/**
 * Nested object under `key`, or `{}` when missing or not an object.
 */
function objectAt(source: JsonObject, key: string): JsonObject {
  const value = ownValue(source, key)
  return isObject(value) ? value : {}
}

function fieldAt(source: JsonObject, key: string): FieldValue {
  return Object.hasOwn(source, key) ? toFieldValue(source[key]) : EMPTY_FIELD
}

function preview(line: string): string {
  return Array.from(line).slice(0, FAILURE_LINE_PREVIEW).join('')
}

function describe(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  if (isLosslessNumber(value)) return 'number'
  return typeof value
}

function failed(line: string, lineNumber: number, reason: string): ExtractOutcome {
  return { ok: false, failure: { lineNumber, line: preview(line), reason } }
}

/**
 * Extracts one line.
 *
 * @param line - Raw line; surrounding whitespace (including a trailing `\r`) is ignored.
 * @param lineNumber - Position reported in a failure.
 * @returns `null` for a blank line, otherwise the record or the failure.
 */
export function extract(line: string, lineNumber = 1): ExtractOutcome | null {
  const trimmed = line.trim()
  if (trimmed === '') return null

  let envelope: unknown
  try {
    envelope = parse(trimmed)
  } catch (err) {
    return failed(trimmed, lineNumber, err instanceof Error ? err.message : String(err))
  }

  if (!isObject(envelope)) {
    return failed(trimmed, lineNumber, `Expected a JSON object, got ${describe(envelope)}`)
  }

  const result = objectAt(envelope, 'result')
  const endDeviceIds = objectAt(result, 'end_device_ids')
  const uplink = objectAt(result, 'uplink_message')
  const payload = objectAt(uplink, 'decoded_payload')

  const fields = new Map<string, FieldValue>([
    ['device_id', toFieldValue(ownValue(endDeviceIds, 'device_id'))],
    ['received_at', fieldAt(result, 'received_at')],
    ['f_port', fieldAt(uplink, 'f_port')],
    ['f_cnt', fieldAt(uplink, 'f_cnt')],
  ])

  for (const [key, value] of Object.entries(payload)) {
    fields.set(key, toFieldValue(value))
  }

  // absent or null, from the envelope or from a payload overwrite
  if (fields.get('device_id')?.kind === 'null') {
    fields.set('device_id', stringField(UNKNOWN_DEVICE_ID))
  }

  return { ok: true, record: new ExtractedRecord(fields) }
}

/**
 * Extracts every line of a JSON-lines text. A bad line never stops the batch.
 */
export function extractBatch(text: string): ExtractionBatch {
  const records: ExtractedRecord[] = []
  const failures: ParseFailure[] = []

  text.split('\n').forEach((line, index) => {
    const outcome = extract(line, index + 1)
    if (outcome === null) return

    if (outcome.ok) records.push(outcome.record)
    else failures.push(outcome.failure)
  })

  return { records, failures }
}
