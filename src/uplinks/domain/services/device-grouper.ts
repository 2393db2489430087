/* eslint-disable prettier/prettier */
import type { ExtractedRecord } from '../models/ExtractedRecord.js'

/**
 * Groups records by {@link ExtractedRecord.deviceId}.
 *
 * Records keep their extraction order inside each group; groups appear in
 * the order their device was first seen.
 */
export function group(records: Iterable<ExtractedRecord>): Map<string, ExtractedRecord[]> {
  const groups = new Map<string, ExtractedRecord[]>()

  for (const record of records) {
    const bucket = groups.get(record.deviceId)
    if (bucket) bucket.push(record)
    else groups.set(record.deviceId, [record])
  }

  return groups
}
