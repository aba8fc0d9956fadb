/**
 * API Routes Setup
 */

import { Express } from 'express'
import type { Config } from './config'
import type { LockService } from './services/lock-service'
import { createLockRouter } from './api/locks'

export const VERSION = '0.1.0'

export function setupRoutes(app: Express, lockService: LockService, config: Config) {
  // Health check
  app.get('/health', async (req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      timestamp: new Date().toISOString(),
      env: config.env,
      locks: await lockService.count()
    })
  })

  app.use(createLockRouter(lockService))

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path
    })
  })
}
