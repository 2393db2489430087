/* eslint-disable prettier/prettier */

/**
 * @file deduplicate-csv.usecase.ts
 * @description
 * Removes duplicate rows from one or more CSV files.
 *
 * @remarks
 * **Responsibilities:**
 * 1. Reject a request without files, or with an explicitly empty key list
 *    ({@link EmptyKeySpecError}). No key list at all means the default one.
 * 2. Run each file on its own (separate seen-set, separate output): files
 *    never influence each other.
 * 3. Keep each file's header exactly as uploaded; only rows are filtered.
 * 4. Return per-file counts plus totals across files.
 *
 * Output file name of each file: `deduplicated_{fileName}`, numbered
 * (`deduplicated_x_2.csv`) when two uploads share a name.
 *
 * @module dedup/app/usecases/deduplicate-csv
 */

import type { Logger } from 'pino'
import type { CsvProvider } from '../../../common/domain/providers/csv-provider.js'
import { BadRequestError } from '../../../common/domain/errors/bad-request-error.js'
import { EmptyKeySpecError } from '../../../common/domain/errors/empty-key-spec-error.js'
import { uniqueFileNames } from '../../../common/domain/models/FileNames.js'
import { deduplicate, defaultKeySpec } from '../../domain/services/deduplicator.js'

export namespace DeduplicateCsvUseCase {
  export type InputFile = {
    fileName: string
    content: string
  }

  export type Input = {
    files: InputFile[]
    /** Identity columns, in order. Omitted → `['f_cnt', 'received_at']`. */
    keyFields?: string[]
  }

  export type FileResult = {
    fileName: string
    outputFileName: string
    originalCount: number
    uniqueCount: number
    duplicatesRemoved: number
    csv: string
    originalCsv: string
  }

  export type Output = {
    keyFields: string[]
    files: FileResult[]
    totals: {
      originalCount: number
      uniqueCount: number
      duplicatesRemoved: number
    }
  }

  export class UseCase {
    constructor(
      private readonly csvProvider: CsvProvider,
      private readonly logger: Logger,
    ) {}

    async execute(input: Input): Promise<Output> {
      if (input.files.length === 0) {
        throw new BadRequestError('At least one CSV file is required')
      }

      const keyFields = input.keyFields ? [...input.keyFields] : defaultKeySpec()
      if (keyFields.length === 0) {
        throw new EmptyKeySpecError()
      }

      const outputFileNames = uniqueFileNames(
        input.files.map((file) => `deduplicated_${file.fileName}`),
      )
      const files = input.files.map((file, index) =>
        this.processFile(file, outputFileNames[index], keyFields),
      )

      const totals = files.reduce(
        (acc, file) => ({
          originalCount: acc.originalCount + file.originalCount,
          uniqueCount: acc.uniqueCount + file.uniqueCount,
          duplicatesRemoved: acc.duplicatesRemoved + file.duplicatesRemoved,
        }),
        { originalCount: 0, uniqueCount: 0, duplicatesRemoved: 0 },
      )

      this.logger.info({ files: files.length, keyFields, ...totals }, 'Duplicate removal finished')

      return { keyFields, files, totals }
    }

    private processFile(file: InputFile, outputFileName: string, keyFields: string[]): FileResult {
      const dataset = this.csvProvider.read(file.content)
      const result = deduplicate(dataset, keyFields)

      this.logger.debug(
        {
          fileName: file.fileName,
          originalCount: result.originalCount,
          duplicatesRemoved: result.duplicatesRemoved,
        },
        'File deduplicated',
      )

      return {
        fileName: file.fileName,
        outputFileName,
        originalCount: result.originalCount,
        uniqueCount: result.uniqueCount,
        duplicatesRemoved: result.duplicatesRemoved,
        csv: this.csvProvider.write(result.dataset),
        originalCsv: file.content,
      }
    }
  }
}
