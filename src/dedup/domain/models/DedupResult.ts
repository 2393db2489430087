/* eslint-disable prettier/prettier */
import type { TabularDataset } from '../../../common/domain/models/TabularDataset.js'

/**
 * Outcome of one deduplication pass.
 *
 * Invariant: `uniqueCount + duplicatesRemoved === originalCount`.
 */
export type DedupResult = {
  originalCount: number
  uniqueCount: number
  duplicatesRemoved: number
  dataset: TabularDataset
}

/**
 * Ordered column names whose values identify a row.
 */
export type DedupKeySpec = readonly string[]
