/**
 * Lock Service - Registry operations as seen by the API
 *
 * Logs every operation by key (tokens stay out of the logs) and keeps the
 * Prometheus counters and the held-locks gauge current.
 */

import type { LockRecord, LockRegistry } from '../storage'
import { LockNotFoundError } from '../storage'
import { logger } from '../utils/logger'
import { lockOperationsTotal, locksHeld } from '../observability/metrics'

export class LockService {
  constructor(private registry: LockRegistry) {}

  async acquire(key: string, token: string): Promise<void> {
    await this.registry.acquire(key, token)
    lockOperationsTotal.inc({ operation: 'acquire', outcome: 'ok' })
    await this.refreshGauge()
    logger.debug('Lock acquired', { key })
  }

  async release(key: string): Promise<LockRecord> {
    try {
      const record = await this.registry.release(key)
      lockOperationsTotal.inc({ operation: 'release', outcome: 'ok' })
      await this.refreshGauge()
      logger.debug('Lock released', { key })
      return record
    } catch (error) {
      if (error instanceof LockNotFoundError) {
        lockOperationsTotal.inc({ operation: 'release', outcome: 'not_found' })
        logger.debug('Release of unheld lock', { key })
      }
      throw error
    }
  }

  async purgeAll(): Promise<void> {
    const before = await this.registry.size()
    await this.registry.purgeAll()
    lockOperationsTotal.inc({ operation: 'purge', outcome: 'ok' })
    await this.refreshGauge()
    logger.info('Lock registry purged', { discarded: before })
  }

  async count(): Promise<number> {
    return this.registry.size()
  }

  private async refreshGauge(): Promise<void> {
    locksHeld.set(await this.registry.size())
  }
}
