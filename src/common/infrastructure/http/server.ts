/* eslint-disable prettier/prettier */
import 'reflect-metadata'
import '../container/index.js'
import { app } from './app.js'
import { env } from '../env/index.js'
import { createLogger } from '../logger/index.js'

/**
 * @file server.ts
 * @description
 * Executable entry point: loads the DI container and starts listening on
 * `env.PORT`. The Express `app` lives in `app.ts` so it can be mounted
 * without a socket.
 */

const log = createLogger('http-api')

const server = app.listen(env.PORT)

server.on('listening', () => {
  log.info({ port: env.PORT, nodeEnv: env.NODE_ENV }, 'HTTP API listening')
  log.info('API docs available at GET /docs')
})

server.on('error', (err: NodeJS.ErrnoException) => {
  if (err.code === 'EADDRINUSE') {
    log.fatal({ port: env.PORT }, 'Port already in use, stop the process holding it and retry')
  } else {
    log.fatal({ err }, 'Failed to start the HTTP server')
  }
  process.exit(1)
})
