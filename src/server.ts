/**
 * Lock Registry - Main Server
 */

import http from 'http'
import type { Server } from 'http'
import { config } from './config'
import { createApp } from './app'
import { createLockRegistry } from './storage'
import { LockService } from './services/lock-service'
import { startMetricsServer } from './observability/metrics'
import { logger } from './utils/logger'
import { listen } from './utils/listen'

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()))
  })
}

async function startServer() {
  const registry = createLockRegistry(config.registry.strategy)
  const lockService = new LockService(registry)
  const app = createApp(config, lockService)
  const server = http.createServer(app)

  const metricsServer = config.metrics.enabled
    ? await startMetricsServer(config.metrics.port)
    : null

  await listen(server, config.port, config.host)
  logger.info('Lock registry started', {
    port: config.port,
    host: config.host,
    env: config.env,
    strategy: config.registry.strategy,
    metrics: metricsServer ? `http://localhost:${config.metrics.port}/metrics` : 'disabled'
  })

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down gracefully...`)

    // Force shutdown after timeout
    setTimeout(() => {
      logger.error('Forced shutdown after timeout')
      process.exit(1)
    }, 10000).unref()

    try {
      await Promise.all([
        closeServer(server),
        metricsServer ? closeServer(metricsServer) : Promise.resolve()
      ])
      logger.info('HTTP server closed')
      process.exit(0)
    } catch (error) {
      logger.error('Error during shutdown', { error })
      process.exit(1)
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'))
  process.on('SIGINT', () => void shutdown('SIGINT'))
}

startServer().catch((error) => {
  logger.error('Failed to start server', { error })
  process.exit(1)
})
