/* eslint-disable prettier/prettier */

export type ArchiveEntry = {
  fileName: string
  content: string | Buffer
}

/**
 * Port for packaging several files into one downloadable archive.
 */
export interface ArchiveProvider {
  /** MIME type of the produced bytes (e.g. `application/zip`). */
  readonly contentType: string

  pack(entries: readonly ArchiveEntry[]): Buffer
}
