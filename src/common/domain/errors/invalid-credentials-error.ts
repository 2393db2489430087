/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * Missing or wrong `x-api-key` header on a guarded route.
 */
export class InvalidCredentialsError extends AppError {

  constructor(message = 'Invalid credentials') {
    super(message, {
      category: 'VALIDATION',
      isOperational: true,
      retryable: false,
    })

    this.name = 'InvalidCredentialsError'
  }
}
