/* eslint-disable prettier/prettier */
import type { ArchiveEntry, ArchiveProvider } from '../../domain/providers/archive-provider.js'
import { BadRequestError } from '../../domain/errors/bad-request-error.js'

/**
 * @file package-files.usecase.ts
 * @description
 * Bundles generated files (device CSVs, deduplicated CSVs) into one archive
 * for download. Knows nothing about the archive format: that is the
 * provider's job.
 */

export namespace PackageFilesUseCase {
  export type Input = {
    archiveName: string
    entries: ArchiveEntry[]
  }

  export type Output = {
    archiveName: string
    contentType: string
    data: Buffer
  }

  export class UseCase {
    constructor(private readonly archiveProvider: ArchiveProvider) {}

    async execute({ archiveName, entries }: Input): Promise<Output> {
      if (entries.length === 0) {
        throw new BadRequestError('Nothing to package: no files were produced')
      }

      return {
        archiveName,
        contentType: this.archiveProvider.contentType,
        data: this.archiveProvider.pack(entries),
      }
    }
  }
}
