/* eslint-disable prettier/prettier */

/**
 * @file ttn-storage.provider.ts
 * @description
 * {@link UplinkSourceProvider} backed by the Storage Integration of a
 * LoRaWAN network server (The Things Stack v3 API).
 *
 * Request:
 * ```
 * GET {baseURL}/api/v3/as/applications/{applicationId}/packages/storage/uplink_message?last=6h
 * Authorization: Bearer <apiKey>
 * Accept: text/event-stream
 * ```
 *
 * The server answers with one `{"result": {...}}` object per line, which is
 * exactly what the record extractor consumes; the body is returned as text.
 *
 * Errors:
 * - HTTP answer outside 2xx → `UpstreamError` with the status
 *   (retryable for 429 and 5xx)
 * - no answer (timeout, DNS, connection refused) → retryable `UpstreamError`
 *
 * @module uplinks/infrastructure/providers/ttn-storage
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios'
import { UpstreamError } from '../../../common/domain/errors/upstream-error.js'
import type {
  UplinkQuery,
  UplinkSourceProvider,
} from '../../domain/providers/uplink-source.provider.js'

export class TtnStorageProvider implements UplinkSourceProvider {
  constructor(private readonly http: AxiosInstance) {}

  /**
   * Builds a provider with its own axios instance.
   *
   * @param baseURL - Cluster address, e.g. `https://eu1.cloud.thethings.network`.
   * @param timeoutMs - Whole-request timeout.
   */
  static create(baseURL: string, timeoutMs: number): TtnStorageProvider {
    return new TtnStorageProvider(axios.create({ baseURL, timeout: timeoutMs }))
  }

  async fetchUplinks(query: UplinkQuery): Promise<string> {
    const path = `/api/v3/as/applications/${encodeURIComponent(query.applicationId)}/packages/storage/uplink_message`

    try {
      const response = await this.http.get<unknown>(path, {
        params: { last: `${query.lookbackHours}h` },
        headers: {
          Authorization: `Bearer ${query.apiKey}`,
          Accept: 'text/event-stream',
        },
        responseType: 'text',
      })

      return toText(response.data)
    } catch (err) {
      throw toUpstreamError(err, query.applicationId)
    }
  }
}

function toText(data: unknown): string {
  if (typeof data === 'string') return data
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (data === null || data === undefined) return ''

  throw new UpstreamError('Remote storage API returned an unexpected body')
}

function toUpstreamError(err: unknown, applicationId: string): UpstreamError {
  if (err instanceof UpstreamError) return err

  if (isAxiosError(err)) {
    const status = err.response?.status
    if (status !== undefined) {
      return new UpstreamError(
        `Remote storage API answered ${status} for application "${applicationId}"`,
        { status, retryable: status === 429 || status >= 500, cause: err },
      )
    }
    return new UpstreamError(`Remote storage API unreachable: ${err.message}`, {
      retryable: true,
      cause: err,
    })
  }

  return new UpstreamError('Remote storage request failed', { cause: err })
}
