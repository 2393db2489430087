/* eslint-disable prettier/prettier */
import type { Response } from 'express'
import { container } from 'tsyringe'
import type { OutputFormat } from '../../../../common/infrastructure/http/output-format.js'
import { sendArchive } from '../../../../common/infrastructure/http/send-archive.js'
import { PackageFilesUseCase } from '../../../../common/app/usecases/package-files.usecase.js'
import type { ProcessingSummary } from '../../../domain/models/ProcessingSummary.js'

export const PROCESSED_ARCHIVE_NAME = 'processed_data.zip'

/**
 * Shared tail of the process and fetch controllers: the summary as JSON,
 * or every device CSV in one archive.
 */
export async function respondWithSummary(
  response: Response,
  summary: ProcessingSummary,
  format: OutputFormat,
): Promise<void> {
  if (format === 'json') {
    response.status(200).json(summary)
    return
  }

  const packageFilesUseCase: PackageFilesUseCase.UseCase =
    container.resolve('PackageFilesUseCase')

  const archive = await packageFilesUseCase.execute({
    archiveName: PROCESSED_ARCHIVE_NAME,
    entries: summary.files.map((file) => ({ fileName: file.fileName, content: file.csv })),
  })

  sendArchive(response, archive)
}
