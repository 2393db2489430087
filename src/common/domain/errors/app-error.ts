/* eslint-disable prettier/prettier */

/**
 * =======================================================
 * @CLASS     : AppError
 * @MODULE    : Common / Errors
 * @PURPOSE   : Base class for every error raised by the uplink
 *              pipeline, the deduplication tool and the HTTP edge.
 * =======================================================
 *
 * @description
 * Carries enough metadata for the HTTP error handler and for structured
 * logging to decide what to do without inspecting messages:
 *
 * - category: which part of the system failed (validation, upstream fetch, archive...)
 * - isOperational: expected failure (bad input, remote API down) vs programming bug
 * - retryable: whether repeating the same request may succeed
 * - cause: the original error, when one was caught
 *
 * Per-line parse problems in a JSON-lines batch are NOT AppErrors: they are
 * returned as `ParseFailure` values so a batch never aborts on one bad line.
 */

export type ErrorCategory =
  | 'VALIDATION'
  | 'UPSTREAM'
  | 'ARCHIVE'
  | 'INFRASTRUCTURE'
  | 'UNKNOWN';

export interface AppErrorOptions {
  category?: ErrorCategory;
  isOperational?: boolean;
  retryable?: boolean;
  cause?: unknown;
}

export class AppError extends Error {

  /**
   * Functional category of the error.
   */
  public readonly category: ErrorCategory;

  /**
   * Whether the error belongs to the normal flow of the application.
   * Example:
   * - Remote storage API unreachable → true
   * - Unexpected undefined access → false
   */
  public readonly isOperational: boolean;

  /**
   * Whether the same request may succeed if repeated later.
   */
  public readonly retryable: boolean;

  /**
   * Wrapped original error (root stack).
   */
  public readonly cause?: unknown;

  /**
   * Creation time, used in the HTTP error payload.
   */
  public readonly timestamp: Date;

  constructor(
    message: string,
    options: AppErrorOptions = {}
  ) {
    super(message);

    this.name = this.constructor.name;

    this.category = options.category ?? 'UNKNOWN';
    this.isOperational = options.isOperational ?? true;
    this.retryable = options.retryable ?? false;
    this.cause = options.cause;
    this.timestamp = new Date();

    Error.captureStackTrace?.(this, this.constructor);
  }
}
