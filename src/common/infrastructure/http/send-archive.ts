/* eslint-disable prettier/prettier */
import type { Response } from 'express'
import type { PackageFilesUseCase } from '../../app/usecases/package-files.usecase.js'

/**
 * Writes a packaged archive as a file download.
 */
export function sendArchive(response: Response, archive: PackageFilesUseCase.Output): void {
  response
    .status(200)
    .type(archive.contentType)
    .attachment(archive.archiveName)
    .send(archive.data)
}
