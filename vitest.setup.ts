// tsyringe needs the Reflect metadata polyfill before the container is imported.
import 'reflect-metadata'

process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent'
