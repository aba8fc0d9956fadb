/**
 * Prometheus Metrics Setup
 */

import { createServer } from 'http'
import type { Server } from 'http'
import { register, collectDefaultMetrics, Counter, Gauge } from 'prom-client'
import { logger } from '../utils/logger'
import { listen } from '../utils/listen'

// Collect default metrics (CPU, memory, etc.)
collectDefaultMetrics({
  prefix: 'lock_registry_'
})

export const lockOperationsTotal = new Counter({
  name: 'lock_registry_operations_total',
  help: 'Total number of lock registry operations',
  labelNames: ['operation', 'outcome'] as const
})

export const locksHeld = new Gauge({
  name: 'lock_registry_locks_held',
  help: 'Number of keys currently holding a lock'
})

/**
 * Start Prometheus metrics server
 */
export async function startMetricsServer(port: number, host?: string): Promise<Server> {
  const server = createServer(async (req, res) => {
    if (req.url === '/metrics') {
      res.setHeader('Content-Type', register.contentType)
      res.end(await register.metrics())
    } else {
      res.statusCode = 404
      res.end('Not Found')
    }
  })

  await listen(server, port, host)
  logger.info(`Metrics server listening on http://localhost:${port}/metrics`)

  return server
}
