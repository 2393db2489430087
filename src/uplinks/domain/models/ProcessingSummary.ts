/* eslint-disable prettier/prettier */
import type { ParseFailure } from './ExtractedRecord.js'

/**
 * One CSV file per device, as handed to the caller.
 */
export type DeviceCsvFile = {
  deviceId: string
  /**
   * `{device_id}_data.csv` (see {@link deviceCsvFileName}), numbered
   * `_2`, `_3`... when two ids sanitize to the same name.
   */
  fileName: string
  records: number
  columns: string[]
  csv: string
}

export type ProcessingSummary = {
  devices: number
  records: number
  skippedLines: number
  failures: ParseFailure[]
  files: DeviceCsvFile[]
}

/**
 * File name of a device's CSV. Path separators in the id are replaced by `_`
 * so an id can never escape the archive root.
 */
export function deviceCsvFileName(deviceId: string): string {
  return `${deviceId.replace(/[\\/]/g, '_')}_data.csv`
}
