/* eslint-disable prettier/prettier */
import { Router } from 'express'
import { upload } from '../../../../common/infrastructure/http/middlewares/upload.js'
import { deduplicateCsvController } from '../controllers/deduplicate-csv.controller.js'

const dedupRoutes = Router()

/**
 * @openapi
 * /dedup:
 *   post:
 *     summary: Remove duplicate rows from one or more CSV files
 *     parameters:
 *       - in: query
 *         name: format
 *         schema: { type: string, enum: [json, zip], default: json }
 *       - in: query
 *         name: includeOriginals
 *         schema: { type: boolean, default: true }
 *     requestBody:
 *       content:
 *         multipart/form-data:
 *           schema:
 *             type: object
 *             properties:
 *               files:
 *                 type: array
 *                 items: { type: string, format: binary }
 *               keyFields:
 *                 type: string
 *                 example: f_cnt,received_at
 *     responses:
 *       200:
 *         description: Per-file results and totals (JSON) or deduplicated_files.zip
 *       400:
 *         description: No files, empty key field list or malformed CSV
 */
dedupRoutes.post('/dedup', upload.array('files'), deduplicateCsvController)

export { dedupRoutes }
