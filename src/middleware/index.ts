/**
 * Express Middleware Setup
 */

import express, { Express } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import type { Config } from '../config'
import { requestLogger } from './request-logger'

export { ApiError, errorHandler } from './error-handler'

export function setupMiddleware(app: Express, config: Config) {
  // Security headers
  app.use(helmet())

  // CORS
  app.use(cors({
    origin: config.cors.origin
  }))

  // Body parsing; any valid JSON gets through so shape errors answer 422
  app.use(express.json({ limit: config.http.bodyLimit, strict: false }))

  // Request logging
  app.use(requestLogger)
}
