/* eslint-disable prettier/prettier */

/**
 * @file uplink-source.provider.ts
 * @description
 * Outbound port for retrieving a JSON-lines uplink export from a remote
 * storage service over a lookback window.
 *
 * The pipeline only needs the raw text back; why a fetch failed is the
 * implementation's business, reported as an `UpstreamError`.
 */

export type UplinkQuery = {
  /** Credential for the remote API (sent as a bearer token). */
  apiKey: string
  /** Application whose stored uplinks are requested. */
  applicationId: string
  /** How far back to look, in hours. */
  lookbackHours: number
}

export interface UplinkSourceProvider {
  /**
   * @returns The export as JSON-lines text, one uplink per line.
   * @throws UpstreamError when the request could not be completed.
   */
  fetchUplinks(query: UplinkQuery): Promise<string>
}
