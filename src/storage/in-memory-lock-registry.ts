import { LockNotFoundError } from './lock-registry'
import type { LockRecord, LockRegistry } from './lock-registry'

/**
 * InMemoryLockRegistry - Map-backed registry
 *
 * Each operation is a single synchronous map mutation, so it completes within
 * one event-loop turn and nothing can observe it half done.
 */
export class InMemoryLockRegistry implements LockRegistry {
  private locks = new Map<string, LockRecord>()

  async acquire(key: string, token: string): Promise<void> {
    this.locks.set(key, { token })
  }

  async release(key: string): Promise<LockRecord> {
    const existing = this.locks.get(key)
    if (!existing) {
      throw new LockNotFoundError(key)
    }

    this.locks.delete(key)
    return existing
  }

  async purgeAll(): Promise<void> {
    this.locks.clear()
  }

  async size(): Promise<number> {
    return this.locks.size
  }
}
