import { describe, expect, it } from 'vitest'
import { CsvParseProvider } from './csv-parse.provider.js'
import { BadRequestError } from '../../../domain/errors/bad-request-error.js'

const csv = new CsvParseProvider()

describe('CsvParseProvider.write', () => {
  it('writes the header then one CRLF-terminated line per row', () => {
    const text = csv.write({
      columns: ['a', 'b'],
      rows: [
        { a: '1', b: '2' },
        { a: '3', b: '' },
      ],
    })

    expect(text).toBe('a,b\r\n1,2\r\n3,\r\n')
  })

  it('quotes fields holding a delimiter, a quote or a line break', () => {
    const text = csv.write({
      columns: ['a', 'b'],
      rows: [
        { a: '1,2', b: 'say "hi"' },
        { a: 'line\nbreak', b: 'plain' },
      ],
    })

    expect(text).toBe('a,b\r\n"1,2","say ""hi"""\r\n"line\nbreak",plain\r\n')
  })

  it('follows the column order, not the row key order', () => {
    expect(csv.write({ columns: ['b', 'a'], rows: [{ a: '1', b: '2' }] })).toBe('b,a\r\n2,1\r\n')
  })

  it('writes a header only for a table without rows', () => {
    expect(csv.write({ columns: ['a'], rows: [] })).toBe('a\r\n')
  })

  it('writes nothing for a table without columns', () => {
    expect(csv.write({ columns: [], rows: [] })).toBe('')
  })
})

describe('CsvParseProvider.read', () => {
  it('keeps the header order', () => {
    const dataset = csv.read('temp,f_cnt,received_at\n20,5,t1\n')

    expect(dataset.columns).toEqual(['temp', 'f_cnt', 'received_at'])
    expect(dataset.rows).toEqual([{ temp: '20', f_cnt: '5', received_at: 't1' }])
  })

  it('drops the BOM, skips empty lines and pads short rows', () => {
    const dataset = csv.read('\uFEFFa,b\r\n1,2\r\n3\r\n\r\n4,5,6\r\n')

    expect(dataset.columns).toEqual(['a', 'b'])
    expect(dataset.rows).toEqual([
      { a: '1', b: '2' },
      { a: '3', b: '' },
      { a: '4', b: '5' },
    ])
  })

  it('unquotes quoted fields', () => {
    expect(csv.read('a,b\r\n"1,2","say ""hi"""\r\n').rows).toEqual([{ a: '1,2', b: 'say "hi"' }])
  })

  it('reads empty text as an empty table', () => {
    expect(csv.read('')).toEqual({ columns: [], rows: [] })
  })

  it('rejects broken quoting', () => {
    expect(() => csv.read('a,b\n"unclosed,1\n')).toThrow(BadRequestError)
  })

  it('reads back what it writes', () => {
    const original = {
      columns: ['device_id', 'note'],
      rows: [{ device_id: 'dev1', note: 'a, "b"\nc' }],
    }

    expect(csv.read(csv.write(original))).toEqual(original)
  })
})
