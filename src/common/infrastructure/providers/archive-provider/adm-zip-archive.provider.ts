/* eslint-disable prettier/prettier */
import AdmZip from 'adm-zip'
import type { ArchiveEntry, ArchiveProvider } from '../../../domain/providers/archive-provider.js'
import { ArchiveError } from '../../../domain/errors/archive-error.js'

/**
 * @file adm-zip-archive.provider.ts
 * @description
 * ZIP implementation of {@link ArchiveProvider} using `adm-zip`, entirely in
 * memory (no temporary directory).
 *
 * Entry names must be unique; a repeated name is refused instead of letting
 * the second file silently replace the first.
 */
export class AdmZipArchiveProvider implements ArchiveProvider {
  readonly contentType = 'application/zip'

  pack(entries: readonly ArchiveEntry[]): Buffer {
    const seen = new Set<string>()
    for (const entry of entries) {
      if (seen.has(entry.fileName)) {
        throw new ArchiveError(`Duplicate archive entry: ${entry.fileName}`)
      }
      seen.add(entry.fileName)
    }

    try {
      const zip = new AdmZip()
      for (const entry of entries) {
        const data =
          typeof entry.content === 'string'
            ? Buffer.from(entry.content, 'utf8')
            : entry.content
        zip.addFile(entry.fileName, data)
      }
      return zip.toBuffer()
    } catch (err) {
      throw new ArchiveError('Failed to create ZIP archive', err)
    }
  }
}
