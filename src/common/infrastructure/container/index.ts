/* eslint-disable prettier/prettier */
import { container } from 'tsyringe'
import { CsvParseProvider } from '../providers/csv-provider/csv-parse.provider.js'
import { AdmZipArchiveProvider } from '../providers/archive-provider/adm-zip-archive.provider.js'
import { PackageFilesUseCase } from '../../app/usecases/package-files.usecase.js'
import type { ArchiveProvider } from '../../domain/providers/archive-provider.js'

/**
 * @file index.ts
 * @description
 * Central dependency registry (`tsyringe`).
 *
 * 1) Registers the providers shared by every module (CSV codec, archive).
 * 2) Imports the container of each module (uplinks, dedup): importing one
 *    runs its registrations.
 *
 * Everything is registered through factories, so no decorator metadata is
 * needed and registration order does not matter: dependencies are resolved
 * on first use.
 */

container.register('CsvProvider', {
  useFactory: () => new CsvParseProvider(),
})

container.register('ArchiveProvider', {
  useFactory: () => new AdmZipArchiveProvider(),
})

container.register('PackageFilesUseCase', {
  useFactory: (c) => new PackageFilesUseCase.UseCase(c.resolve<ArchiveProvider>('ArchiveProvider')),
})

import '../../../uplinks/infrastructure/container/index.js'
import '../../../dedup/infrastructure/container/index.js'
