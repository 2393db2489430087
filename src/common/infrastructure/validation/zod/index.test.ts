import { z } from 'zod'
import { describe, expect, it } from 'vitest'
import { dataValidation } from './index.js'
import { BadRequestError } from '../../../domain/errors/bad-request-error.js'

const schema = z.object({ lookbackHours: z.number(), applicationId: z.string() })

describe('dataValidation', () => {
  it('returns the parsed data', () => {
    expect(dataValidation(schema, { lookbackHours: 6, applicationId: 'my-app' })).toEqual({
      lookbackHours: 6,
      applicationId: 'my-app',
    })
  })

  it('throws a BadRequestError listing every issue', () => {
    let caught: unknown
    try {
      dataValidation(schema, { lookbackHours: 'six' })
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(BadRequestError)
    if (!(caught instanceof BadRequestError)) return
    expect(caught.message).toBe(
      'Invalid data: lookbackHours -> Expected number, received string | applicationId -> Required',
    )
    expect(caught.details).toEqual({
      issues: [
        { path: 'lookbackHours', message: 'Expected number, received string' },
        { path: 'applicationId', message: 'Required' },
      ],
    })
  })

  it('uses the custom message when given', () => {
    expect(() => dataValidation(schema, null, { message: 'Invalid body' })).toThrow('Invalid body')
  })
})
