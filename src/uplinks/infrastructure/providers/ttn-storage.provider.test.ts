import axios, { AxiosError, AxiosHeaders, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios'
import { describe, expect, it } from 'vitest'
import { TtnStorageProvider } from './ttn-storage.provider.js'
import { UpstreamError } from '../../../common/domain/errors/upstream-error.js'

type Adapter = (config: InternalAxiosRequestConfig) => Promise<AxiosResponse>

function reply(config: InternalAxiosRequestConfig, status: number, data: unknown): AxiosResponse {
  return { data, status, statusText: String(status), headers: new AxiosHeaders(), config }
}

function makeSut(adapter: Adapter) {
  const requests: InternalAxiosRequestConfig[] = []
  const http = axios.create({
    baseURL: 'https://storage.test',
    adapter: async (config) => {
      requests.push(config)
      return adapter(config)
    },
  })
  return { provider: new TtnStorageProvider(http), requests }
}

const query = { apiKey: 'test-secret', applicationId: 'my-app', lookbackHours: 6 }

async function upstreamErrorOf(promise: Promise<unknown>): Promise<UpstreamError> {
  try {
    await promise
  } catch (err) {
    if (err instanceof UpstreamError) return err
    throw err
  }
  throw new Error('expected an UpstreamError')
}

describe('TtnStorageProvider', () => {
  it('requests the storage endpoint with the lookback and bearer key', async () => {
    const { provider, requests } = makeSut(async (config) => reply(config, 200, '{"result":{}}\n'))

    const text = await provider.fetchUplinks(query)

    expect(text).toBe('{"result":{}}\n')
    expect(requests).toHaveLength(1)
    expect(requests[0].method).toBe('get')
    expect(requests[0].url).toBe('/api/v3/as/applications/my-app/packages/storage/uplink_message')
    expect(requests[0].params).toEqual({ last: '6h' })
    expect(requests[0].headers.Authorization).toBe('Bearer test-secret')
    expect(requests[0].headers.Accept).toBe('text/event-stream')
  })

  it('encodes the application id in the path', async () => {
    const { provider, requests } = makeSut(async (config) => reply(config, 200, ''))

    await provider.fetchUplinks({ ...query, applicationId: 'a/b' })

    expect(requests[0].url).toBe('/api/v3/as/applications/a%2Fb/packages/storage/uplink_message')
  })

  it('returns an empty text for an empty body', async () => {
    const { provider } = makeSut(async (config) => reply(config, 200, null))

    await expect(provider.fetchUplinks(query)).resolves.toBe('')
  })

  it('maps a client error status to a non-retryable UpstreamError', async () => {
    const { provider } = makeSut(async (config) => {
      throw new AxiosError('Request failed with status code 401', 'ERR_BAD_REQUEST', config, null, reply(config, 401, 'denied'))
    })

    const err = await upstreamErrorOf(provider.fetchUplinks(query))

    expect(err.message).toBe('Remote storage API answered 401 for application "my-app"')
    expect(err.retryable).toBe(false)
    expect(err.details).toEqual({ status: 401 })
  })

  it.each([429, 500, 503])('marks a %i answer as retryable', async (status) => {
    const { provider } = makeSut(async (config) => {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, reply(config, status, ''))
    })

    const err = await upstreamErrorOf(provider.fetchUplinks(query))

    expect(err.retryable).toBe(true)
    expect(err.details).toEqual({ status })
  })

  it('maps a missing answer to a retryable UpstreamError', async () => {
    const { provider } = makeSut(async (config) => {
      throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config)
    })

    const err = await upstreamErrorOf(provider.fetchUplinks(query))

    expect(err.message).toBe('Remote storage API unreachable: connect ECONNREFUSED')
    expect(err.retryable).toBe(true)
    expect(err.details).toBeUndefined()
  })

  it('rejects a body that is not text', async () => {
    const { provider } = makeSut(async (config) => reply(config, 200, { unexpected: true }))

    const err = await upstreamErrorOf(provider.fetchUplinks(query))

    expect(err.message).toBe('Remote storage API returned an unexpected body')
  })
})
