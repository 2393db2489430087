/* eslint-disable prettier/prettier */
import { Router } from 'express'
import { uplinkRoutes } from '../../../uplinks/infrastructure/http/routes/uplink.routes.js'
import { dedupRoutes } from '../../../dedup/infrastructure/http/routes/dedup.routes.js'

/**
 * @file routes.ts
 * @description
 * Root router: health check plus the routers of each module. Every module
 * keeps its own routes under `<module>/infrastructure/http/routes`.
 */

const routes = Router()

/**
 * @openapi
 * /health:
 *   get:
 *     summary: Liveness check
 *     responses:
 *       200:
 *         description: The API is up
 */
routes.get('/health', (_req, res) => {
  res.status(200).json({ status: 'ok' })
})

routes.use(uplinkRoutes)
routes.use(dedupRoutes)

export { routes }
