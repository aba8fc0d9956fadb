/**
 * Request Logger Middleware
 *
 * Logs the matched route pattern rather than the raw path, so entries for
 * `/lock/a` and `/lock/b` group under `/lock/:key`, with the key alongside.
 * Client errors log at warn (410 for an unheld lock included), server errors
 * at error.
 */

import { Request, Response, NextFunction } from 'express'
import { logger } from '../utils/logger'

export interface RequestLogEntry {
  method: string
  route: string
  key?: string
  status: number
  duration: number
}

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now()

  res.on('finish', () => {
    // req.route is only set once a route matched
    const routePath: unknown = req.route?.path
    const entry: RequestLogEntry = {
      method: req.method,
      route: typeof routePath === 'string' ? routePath : `unmatched ${req.path}`,
      status: res.statusCode,
      duration: Date.now() - start
    }
    const key = req.params.key
    if (typeof key === 'string') {
      entry.key = key
    }

    if (res.statusCode >= 500) {
      logger.error('Lock API request', entry)
    } else if (res.statusCode >= 400) {
      logger.warn('Lock API request', entry)
    } else {
      logger.info('Lock API request', entry)
    }
  })

  next()
}
