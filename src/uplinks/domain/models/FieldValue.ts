/* eslint-disable prettier/prettier */
import { isLosslessNumber, stringify } from 'lossless-json'

/**
 * @file FieldValue.ts
 * @description
 * Tagged variant for the values found in an uplink record.
 *
 * JSON payloads mix strings, numbers, booleans, nulls and, now and then, a
 * nested object or array. Every value is classified once, when the record is
 * extracted, and rendered to text with a single rule ({@link renderFieldValue}).
 */

export type FieldValue =
  | { readonly kind: 'string'; readonly value: string }
  /** `value` is the number literal exactly as written in the source JSON. */
  | { readonly kind: 'number'; readonly value: string }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'null' }
  | { readonly kind: 'structured'; readonly value: unknown }

export const EMPTY_FIELD: FieldValue = { kind: 'string', value: '' }

export function stringField(value: string): FieldValue {
  return { kind: 'string', value }
}

/**
 * Classifies a value decoded by `lossless-json`, whose numbers arrive as
 * `LosslessNumber` wrappers around their source text.
 */
export function toFieldValue(raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return { kind: 'null' }
  if (typeof raw === 'string') return { kind: 'string', value: raw }
  if (isLosslessNumber(raw)) return { kind: 'number', value: raw.value }
  if (typeof raw === 'number') return { kind: 'number', value: String(raw) }
  if (typeof raw === 'boolean') return { kind: 'boolean', value: raw }
  return { kind: 'structured', value: raw }
}

/**
 * Canonical text of a value, as written in CSV cells.
 *
 * - numbers: the source literal, untouched (`20.0` stays `20.0`, integers
 *   beyond 2^53 keep every digit)
 * - booleans: `True` / `False`, the spelling already present in exported
 *   device files
 * - null: empty cell
 * - objects / arrays: compact JSON, nested numbers as written
 */
export function renderFieldValue(field: FieldValue): string {
  switch (field.kind) {
    case 'string':
      return field.value
    case 'number':
      return field.value
    case 'boolean':
      return field.value ? 'True' : 'False'
    case 'null':
      return ''
    case 'structured':
      return stringify(field.value) ?? ''
  }
}
