/* eslint-disable prettier/prettier */

/**
 * @file index.ts
 * @description
 * DI container of the **Dedup** module.
 */

import { container } from 'tsyringe'
import { createLogger } from '../../../common/infrastructure/logger/index.js'
import type { CsvProvider } from '../../../common/domain/providers/csv-provider.js'
import { DeduplicateCsvUseCase } from '../../app/usecases/deduplicate-csv.usecase.js'

container.register('DeduplicateCsvUseCase', {
  useFactory: (c) =>
    new DeduplicateCsvUseCase.UseCase(
      c.resolve<CsvProvider>('CsvProvider'),
      createLogger('deduplicate-csv'),
    ),
})
