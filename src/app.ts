/**
 * Express application wiring
 *
 * The lock service (and the registry inside it) is built by the caller and
 * handed in, so every handler shares the one instance.
 */

import 'express-async-errors'
import express, { Express } from 'express'
import type { Config } from './config'
import type { LockService } from './services/lock-service'
import { setupMiddleware, errorHandler } from './middleware'
import { setupRoutes } from './routes'

export function createApp(config: Config, lockService: LockService): Express {
  const app = express()
  app.set('case sensitive routing', true)
  app.set('strict routing', true)

  setupMiddleware(app, config)
  setupRoutes(app, lockService, config)

  // Error handler (must be last)
  app.use(errorHandler)

  return app
}
