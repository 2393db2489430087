import AdmZip from 'adm-zip'
import { describe, expect, it } from 'vitest'
import { AdmZipArchiveProvider } from './adm-zip-archive.provider.js'
import { ArchiveError } from '../../../domain/errors/archive-error.js'

const archive = new AdmZipArchiveProvider()

describe('AdmZipArchiveProvider', () => {
  it('stores exactly the given entries', () => {
    const data = archive.pack([
      { fileName: 'dev1_data.csv', content: 'a,b\r\n1,2\r\n' },
      { fileName: 'originals/dev2.csv', content: Buffer.from('x\r\n', 'utf8') },
    ])

    const zip = new AdmZip(data)

    expect(zip.getEntries().map((entry) => entry.entryName).sort()).toEqual([
      'dev1_data.csv',
      'originals/dev2.csv',
    ])
    expect(zip.readAsText('dev1_data.csv')).toBe('a,b\r\n1,2\r\n')
    expect(zip.readAsText('originals/dev2.csv')).toBe('x\r\n')
  })

  it('keeps non-ASCII content intact', () => {
    const zip = new AdmZip(archive.pack([{ fileName: 'fr.csv', content: 'temp,ville\r\n21,Orléans\r\n' }]))

    expect(zip.readAsText('fr.csv')).toBe('temp,ville\r\n21,Orléans\r\n')
  })

  it('refuses two entries with the same name', () => {
    expect(() =>
      archive.pack([
        { fileName: 'a.csv', content: '1' },
        { fileName: 'a.csv', content: '2' },
      ]),
    ).toThrow(ArchiveError)
  })

  it('declares the zip media type', () => {
    expect(archive.contentType).toBe('application/zip')
  })
})
