import { describe, expect, it } from 'vitest'
import { extract, extractBatch } from './record-extractor.js'
import { RESERVED_FIELDS, type ExtractedRecord } from '../models/ExtractedRecord.js'

function uplinkLine(
  deviceId: unknown,
  payload: Record<string, unknown>,
  extra: { receivedAt?: string; fPort?: number; fCnt?: number } = {},
): string {
  return JSON.stringify({
    result: {
      end_device_ids: { device_id: deviceId },
      received_at: extra.receivedAt ?? '2024-01-01T00:00:00Z',
      uplink_message: {
        f_port: extra.fPort ?? 1,
        f_cnt: extra.fCnt ?? 5,
        decoded_payload: payload,
      },
    },
  })
}

function recordOf(line: string): ExtractedRecord {
  const outcome = extract(line)
  if (outcome === null || !outcome.ok) throw new Error(`expected a record for ${line}`)
  return outcome.record
}

describe('extract', () => {
  it('flattens the envelope and the decoded payload into one record', () => {
    const record = recordOf(
      '{"result":{"end_device_ids":{"device_id":"dev1"},"received_at":"2024-01-01T00:00:00Z","uplink_message":{"f_port":1,"f_cnt":5,"decoded_payload":{"temp":21.5}}}}',
    )

    expect(record.deviceId).toBe('dev1')
    expect(record.toJSON()).toEqual({
      device_id: 'dev1',
      received_at: '2024-01-01T00:00:00Z',
      f_port: '1',
      f_cnt: '5',
      temp: '21.5',
    })
  })

  it('lists reserved fields before payload fields', () => {
    const record = recordOf(uplinkLine('dev1', { temp: 20, hum: 40 }))

    expect(record.getFieldNames()).toEqual(['device_id', 'received_at', 'f_port', 'f_cnt', 'temp', 'hum'])
  })

  it('returns null for blank lines', () => {
    expect(extract('')).toBeNull()
    expect(extract('   \r')).toBeNull()
  })

  it('defaults every reserved field when the envelope is empty', () => {
    const record = recordOf('{}')

    expect(record.toJSON()).toEqual({ device_id: 'unknown', received_at: '', f_port: '', f_cnt: '' })
  })

  it('uses "unknown" for a null device id', () => {
    expect(recordOf(uplinkLine(null, {})).deviceId).toBe('unknown')
  })

  it('renders a numeric device id as text', () => {
    expect(recordOf(uplinkLine(42, {})).deviceId).toBe('42')
  })

  it('lets payload keys overwrite reserved fields', () => {
    const record = recordOf(uplinkLine('dev1', { device_id: 'dev9', f_cnt: 77 }))

    expect(record.deviceId).toBe('dev9')
    expect(record.getText('f_cnt')).toBe('77')
    expect(record.getFieldNames()).toEqual(['device_id', 'received_at', 'f_port', 'f_cnt'])
  })

  it('renders booleans, nulls and nested values canonically', () => {
    const record = recordOf(
      uplinkLine('dev1', { alarm: true, door: false, empty: null, gps: { lat: 1.5, lng: 2 }, list: [1, 'a'] }),
    )

    expect(record.getText('alarm')).toBe('True')
    expect(record.getText('door')).toBe('False')
    expect(record.getText('empty')).toBe('')
    expect(record.getText('gps')).toBe('{"lat":1.5,"lng":2}')
    expect(record.getText('list')).toBe('[1,"a"]')
    expect(record.getField('gps')?.kind).toBe('structured')
  })

  it('keeps numbers exactly as written in the source', () => {
    const record = recordOf(
      '{"result":{"end_device_ids":{"device_id":"dev1"},"uplink_message":{"f_cnt":9007199254740993,"decoded_payload":{"temp":20.0,"v":1e16,"neg":-0.250,"pos":{"lat":45.10}}}}}',
    )

    expect(record.getText('f_cnt')).toBe('9007199254740993')
    expect(record.getText('temp')).toBe('20.0')
    expect(record.getText('v')).toBe('1e16')
    expect(record.getText('neg')).toBe('-0.250')
    expect(record.getText('pos')).toBe('{"lat":45.10}')
    expect(record.getField('temp')).toEqual({ kind: 'number', value: '20.0' })
  })

  it('uses "unknown" when the payload overwrites the device id with null', () => {
    const record = recordOf(uplinkLine('dev1', { device_id: null, temp: 1 }))

    expect(record.deviceId).toBe('unknown')
    expect(record.getText('device_id')).toBe('unknown')
  })

  it('ignores a decoded payload that is not an object', () => {
    const line = JSON.stringify({
      result: { end_device_ids: { device_id: 'dev1' }, uplink_message: { decoded_payload: [1, 2] } },
    })

    expect(recordOf(line).getFieldNames()).toEqual([...RESERVED_FIELDS])
  })

  it('reports invalid JSON as a failure', () => {
    const outcome = extract('not json', 4)

    expect(outcome).not.toBeNull()
    expect(outcome?.ok).toBe(false)
    if (outcome === null || outcome.ok) return
    expect(outcome.failure.lineNumber).toBe(4)
    expect(outcome.failure.line).toBe('not json')
    expect(outcome.failure.reason).not.toBe('')
  })

  it.each([
    ['[1,2]', 'Expected a JSON object, got array'],
    ['42', 'Expected a JSON object, got number'],
    ['null', 'Expected a JSON object, got null'],
    ['"text"', 'Expected a JSON object, got string'],
  ])('rejects %s', (line, reason) => {
    expect(extract(line)).toEqual({ ok: false, failure: { lineNumber: 1, line, reason } })
  })

  it('cuts the reported line to 100 characters', () => {
    const outcome = extract('x'.repeat(150))

    if (outcome === null || outcome.ok) throw new Error('expected a failure')
    expect(outcome.failure.line).toBe('x'.repeat(100))
  })
})

describe('extractBatch', () => {
  it('skips bad lines and keeps going', () => {
    const text = [uplinkLine('dev1', { temp: 20 }), 'not json', uplinkLine('dev2', { temp: 21 })].join('\n')

    const { records, failures } = extractBatch(text)

    expect(records.map((record) => record.deviceId)).toEqual(['dev1', 'dev2'])
    expect(failures).toHaveLength(1)
    expect(failures[0].lineNumber).toBe(2)
    expect(failures[0].line).toBe('not json')
  })

  it('handles CRLF line endings and blank lines', () => {
    const text = `${uplinkLine('dev1', {})}\r\n\r\n${uplinkLine('dev1', {}, { fCnt: 6 })}\r\n`

    const { records, failures } = extractBatch(text)

    expect(failures).toEqual([])
    expect(records.map((record) => record.getText('f_cnt'))).toEqual(['5', '6'])
  })

  it('numbers lines from 1, blank lines included', () => {
    const { failures } = extractBatch('\n{oops\n')

    expect(failures.map((failure) => failure.lineNumber)).toEqual([2])
  })

  it('returns nothing for empty input', () => {
    expect(extractBatch('')).toEqual({ records: [], failures: [] })
  })
})
