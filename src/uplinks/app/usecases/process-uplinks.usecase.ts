/* eslint-disable prettier/prettier */

/**
 * @file process-uplinks.usecase.ts
 * @description
 * Use case that converts a JSON-lines uplink export into one CSV per device.
 *
 * Flow:
 * 1. extract every line (bad lines become failures, logged as warnings)
 * 2. group the records by device
 * 3. unify the schema of each group and encode it
 * 4. serialize each group with the CSV provider
 *
 * Partial success is explicit: the summary lists the skipped lines next to
 * the files produced from every line that did parse.
 *
 * @module uplinks/app/usecases/process-uplinks
 */

import type { Logger } from 'pino'
import type { CsvProvider } from '../../../common/domain/providers/csv-provider.js'
import { uniqueFileNames } from '../../../common/domain/models/FileNames.js'
import { extractBatch } from '../../domain/services/record-extractor.js'
import { group } from '../../domain/services/device-grouper.js'
import { encode } from '../../domain/services/tabular-encoder.js'
import {
  deviceCsvFileName,
  type DeviceCsvFile,
  type ProcessingSummary,
} from '../../domain/models/ProcessingSummary.js'

export namespace ProcessUplinksUseCase {
  export type Input = {
    /** JSON-lines text. */
    content: string
    /** Where the text came from (file name, remote application...), for logs. */
    source?: string
  }

  export type Output = ProcessingSummary

  export class UseCase {
    constructor(
      private readonly csvProvider: CsvProvider,
      private readonly logger: Logger,
    ) {}

    async execute(input: Input): Promise<Output> {
      const source = input.source ?? 'upload'
      const { records, failures } = extractBatch(input.content)

      for (const failure of failures) {
        this.logger.warn(
          { source, lineNumber: failure.lineNumber, line: failure.line, reason: failure.reason },
          'Could not parse line, skipping it',
        )
      }

      const groups = [...group(records)]
      // `a/b` and `a_b` sanitize to the same name
      const fileNames = uniqueFileNames(groups.map(([deviceId]) => deviceCsvFileName(deviceId)))

      const files: DeviceCsvFile[] = groups.map(([deviceId, deviceRecords], index) => {
        const dataset = encode(deviceRecords)
        return {
          deviceId,
          fileName: fileNames[index],
          records: deviceRecords.length,
          columns: [...dataset.columns],
          csv: this.csvProvider.write(dataset),
        }
      })

      this.logger.info(
        {
          source,
          devices: files.length,
          records: records.length,
          skippedLines: failures.length,
        },
        'Uplink export processed',
      )

      return {
        devices: files.length,
        records: records.length,
        skippedLines: failures.length,
        failures,
        files,
      }
    }
  }
}
