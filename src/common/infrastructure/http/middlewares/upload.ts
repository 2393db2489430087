/* eslint-disable prettier/prettier */
import multer from 'multer'
import { env } from '../../env/index.js'

/**
 * Multipart upload parser. Files stay in memory (`file.buffer`): every
 * upload is text processed in one pass and never written to disk.
 */
export const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: env.UPLOAD_MAX_BYTES },
})
