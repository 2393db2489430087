/* eslint-disable prettier/prettier */

import { AppError } from './app-error.js'

/**
 * =======================================================
 * @CLASS     : UpstreamError
 * @MODULE    : Common / Errors
 * @PURPOSE   : Failure of an external collaborator (remote storage API).
 * =======================================================
 *
 * @description
 * The message is meant to be shown to the caller as is. `status` keeps the
 * HTTP status returned by the remote API when there was one.
 *
 * Retryable when the remote side answered 5xx / 429 or did not answer at all;
 * not retryable for 4xx (wrong key, unknown application...).
 */
export class UpstreamError extends AppError {
  public readonly details?: Record<string, unknown>

  constructor(
    message: string,
    options: { status?: number; retryable?: boolean; cause?: unknown } = {},
  ) {
    super(message, {
      category: 'UPSTREAM',
      isOperational: true,
      retryable: options.retryable ?? false,
      cause: options.cause,
    })

    this.name = 'UpstreamError'
    this.details = options.status !== undefined ? { status: options.status } : undefined
  }
}
