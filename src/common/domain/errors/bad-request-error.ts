/* eslint-disable prettier/prettier */

import { AppError } from "./app-error.js";

/**
 * =======================================================
 * @CLASS     : BadRequestError
 * @MODULE    : Common / Errors
 * @PURPOSE   : Invalid input supplied by the caller.
 * =======================================================
 *
 * @description
 * The "HTTP 400" of the toolkit, but agnostic of the transport: use cases
 * throw it and the HTTP error handler translates it.
 *
 * When to throw:
 * - No file uploaded / empty request body
 * - Lookback window outside the allowed set
 * - CSV text with broken quoting
 * - Query or body failing the zod schema (see `dataValidation`)
 *
 * `retryable = false`: sending the same input again will not fix it.
 */
export class BadRequestError extends AppError {
  /**
   * Optional diagnostic details (invalid fields, offending values...).
   */
  public readonly details?: Record<string, unknown>;

  /**
   * @param message - What is invalid.
   * @param details - Extra information for logs and the HTTP payload.
   *
   * @example
   * throw new BadRequestError('lookbackHours must be one of 1, 3, 6, 12, 24, 48', {
   *   lookbackHours: 5,
   * })
   */
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, {
      category: 'VALIDATION',
      isOperational: true,
      retryable: false,
    });

    this.name = 'BadRequestError';
    this.details = details;
  }
}
