/* eslint-disable prettier/prettier */
import type { Request, Response } from 'express'
import { container } from 'tsyringe'
import { z } from 'zod'
import { dataValidation } from '../../../../common/infrastructure/validation/zod/index.js'
import { outputFormatSchema } from '../../../../common/infrastructure/http/output-format.js'
import { sendArchive } from '../../../../common/infrastructure/http/send-archive.js'
import { BadRequestError } from '../../../../common/domain/errors/bad-request-error.js'
import { uniqueFileNames } from '../../../../common/domain/models/FileNames.js'
import type { ArchiveEntry } from '../../../../common/domain/providers/archive-provider.js'
import { PackageFilesUseCase } from '../../../../common/app/usecases/package-files.usecase.js'
import { DeduplicateCsvUseCase } from '../../../app/usecases/deduplicate-csv.usecase.js'

/**
 * @fileoverview Deduplicate CSV Controller (HTTP)
 *
 * ## Input
 * - multipart field `files`: one or more CSV files
 * - field `keyFields`: comma list (`f_cnt,received_at`) or repeated field;
 *   omitted means `f_cnt,received_at`, present but empty is rejected
 * - `?format=json|zip`, `?includeOriginals=true|false` (default `true`)
 *
 * ## Output
 * - JSON: per-file counts and CSV text, plus totals
 * - ZIP: `deduplicated_files.zip` with `deduplicated_{name}` per file and,
 *   unless turned off, the uploads under `originals/`
 */

export const DEDUP_ARCHIVE_NAME = 'deduplicated_files.zip'
export const ORIGINALS_FOLDER = 'originals'

/**
 * `undefined` stays `undefined` (default key spec); anything else is split,
 * trimmed and emptied of blanks, so `""` becomes `[]`.
 */
export function parseKeyFields(raw: string | string[] | undefined): string[] | undefined {
  if (raw === undefined) return undefined

  return (Array.isArray(raw) ? raw : [raw])
    .flatMap((value) => value.split(','))
    .map((field) => field.trim())
    .filter((field) => field.length > 0)
}

function uploadedFiles(request: Request): DeduplicateCsvUseCase.InputFile[] {
  const files = Array.isArray(request.files) ? request.files : []
  if (files.length === 0) {
    throw new BadRequestError('At least one CSV file is required (multipart field "files")')
  }

  return files.map((file) => ({
    fileName: file.originalname,
    content: file.buffer.toString('utf8'),
  }))
}

export async function deduplicateCsvController(
  request: Request,
  response: Response,
): Promise<void> {
  const querySchema = z.object({
    format: outputFormatSchema,
    includeOriginals: z
      .enum(['true', 'false'])
      .default('true')
      .transform((value) => value === 'true'),
  })
  const bodySchema = z.object({
    keyFields: z.union([z.string(), z.array(z.string())]).optional(),
  })

  const { format, includeOriginals } = dataValidation(querySchema, request.query)
  const { keyFields } = dataValidation(bodySchema, request.body ?? {})

  const deduplicateCsvUseCase: DeduplicateCsvUseCase.UseCase =
    container.resolve('DeduplicateCsvUseCase')

  const result = await deduplicateCsvUseCase.execute({
    files: uploadedFiles(request),
    keyFields: parseKeyFields(keyFields),
  })

  if (format === 'json') {
    response.status(200).json({
      keyFields: result.keyFields,
      totals: result.totals,
      files: result.files.map(({ originalCsv, ...file }) =>
        includeOriginals ? { ...file, originalCsv } : file,
      ),
    })
    return
  }

  const entries: ArchiveEntry[] = result.files.map((file) => ({
    fileName: file.outputFileName,
    content: file.csv,
  }))
  if (includeOriginals) {
    const originalNames = uniqueFileNames(
      result.files.map((file) => `${ORIGINALS_FOLDER}/${file.fileName}`),
    )
    result.files.forEach((file, index) => {
      entries.push({ fileName: originalNames[index], content: file.originalCsv })
    })
  }

  const packageFilesUseCase: PackageFilesUseCase.UseCase =
    container.resolve('PackageFilesUseCase')

  const archive = await packageFilesUseCase.execute({ archiveName: DEDUP_ARCHIVE_NAME, entries })

  sendArchive(response, archive)
}
