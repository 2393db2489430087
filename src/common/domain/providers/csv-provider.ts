/* eslint-disable prettier/prettier */
import type { TabularDataset } from '../models/TabularDataset.js'

/**
 * Port for CSV serialization.
 *
 * - `write` emits a header row with `dataset.columns` in the given order,
 *   followed by one record per row.
 * - `read` takes the first record as the header, verbatim.
 */
export interface CsvProvider {
  write(dataset: TabularDataset): string
  read(text: string): TabularDataset
}
