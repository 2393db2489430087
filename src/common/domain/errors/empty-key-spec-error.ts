/* eslint-disable prettier/prettier */

import { BadRequestError } from './bad-request-error.js'

/**
 * Deduplication requested with zero identity fields.
 *
 * The deduplicator itself would collapse the whole dataset to a single row
 * with such a key list, so the rejection happens at the use case boundary.
 */
export class EmptyKeySpecError extends BadRequestError {
  constructor(message = 'At least one field must be selected for duplicate detection') {
    super(message, { keyFields: [] })

    this.name = 'EmptyKeySpecError'
  }
}
