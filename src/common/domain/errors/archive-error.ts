/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * Failure while packaging CSV files into a ZIP archive.
 */
export class ArchiveError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, {
      category: 'ARCHIVE',
      isOperational: false,
      retryable: false,
      cause,
    })

    this.name = 'ArchiveError'
  }
}
