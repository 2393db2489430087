/* eslint-disable prettier/prettier */
import { Router } from 'express'
import { isAuthenticated } from '../../../../common/infrastructure/http/middlewares/isAuthenticated.js'
import { upload } from '../../../../common/infrastructure/http/middlewares/upload.js'
import { processUplinksController } from '../controllers/process-uplinks.controller.js'
import { fetchUplinksController } from '../controllers/fetch-uplinks.controller.js'

const uplinkRoutes = Router()

/**
 * @openapi
 * /uplinks/process:
 *   post:
 *     summary: Convert a JSON-lines uplink export into one CSV per device
 *     parameters:
 *       - in: query
 *         name: format
 *         schema: { type: string, enum: [json, zip], default: json }
 *     requestBody:
 *       content:
 *         multipart/form-data:
 *           schema:
 *             type: object
 *             properties:
 *               file: { type: string, format: binary }
 *         text/plain:
 *           schema: { type: string }
 *     responses:
 *       200:
 *         description: Processing summary (JSON) or processed_data.zip
 *       400:
 *         description: No export supplied
 */
uplinkRoutes.post('/uplinks/process', upload.single('file'), processUplinksController)

/**
 * @openapi
 * /uplinks/fetch:
 *   post:
 *     summary: Fetch stored uplinks from the remote storage API and process them
 *     security:
 *       - apiKey: []
 *     requestBody:
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [apiKey, applicationId, lookbackHours]
 *             properties:
 *               apiKey: { type: string }
 *               applicationId: { type: string }
 *               lookbackHours: { type: integer, enum: [1, 3, 6, 12, 24, 48] }
 *               format: { type: string, enum: [json, zip], default: json }
 *     responses:
 *       200:
 *         description: Processing summary (JSON) or processed_data.zip
 *       400:
 *         description: Missing credentials or lookback outside the allowed set
 *       401:
 *         description: Missing or wrong x-api-key
 *       502:
 *         description: The remote storage API rejected the request
 *       503:
 *         description: The remote storage API is unreachable or overloaded
 */
uplinkRoutes.post('/uplinks/fetch', isAuthenticated, fetchUplinksController)

export { uplinkRoutes }
