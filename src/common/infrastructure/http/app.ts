/* eslint-disable prettier/prettier */
// Express 5 forwards rejected promises from handlers to the error middleware
import express from 'express'
import cors from 'cors'
import swaggerJSDOC from 'swagger-jsdoc'
import swaggerUI from 'swagger-ui-express'

import { routes } from './routes.js'
import { errorHandler } from './middlewares/errorHandler.js'
import { env } from '../env/index.js'

const options: swaggerJSDOC.Options = {
  definition: {
    openapi: '3.0.0',
    info: { title: 'Uplink CSV Toolkit API', version: '1.0.0' },
  },
  apis: ['./src/**/http/routes/*.ts', './dist/**/http/routes/*.js'],
}

const swaggerSpec = swaggerJSDOC(options)
const app = express()

app.use(cors())
app.use(express.json())
app.use(express.text({ type: 'text/plain', limit: env.UPLOAD_MAX_BYTES }))

app.use('/docs', swaggerUI.serve, swaggerUI.setup(swaggerSpec))

app.use(routes)
app.use(errorHandler)

export { app }
