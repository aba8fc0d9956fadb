import type { Server } from 'http'
import { logger } from './logger'

/**
 * Start listening, rejecting on a bind failure such as EADDRINUSE.
 * Errors raised after the server is up are logged instead of crashing
 * the process through an unhandled 'error' event.
 */
export function listen(server: Server, port: number, host?: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onStartupError = (error: Error) => reject(error)
    server.once('error', onStartupError)

    server.listen(port, host, () => {
      server.off('error', onStartupError)
      server.on('error', (error) => {
        logger.error('Server error', { error: error.message })
      })
      resolve()
    })
  })
}
