import { KeyedMutex } from './keyed-mutex'
import { LockNotFoundError } from './lock-registry'
import type { LockRecord, LockRegistry } from './lock-registry'

/**
 * GuardedLockRegistry - Map behind a per-key mutex
 *
 * acquire and release hold the key's section for their read-modify-write;
 * purgeAll holds every key. Unlike InMemoryLockRegistry the contract does not
 * rest on each operation finishing within one event-loop turn.
 */
export class GuardedLockRegistry implements LockRegistry {
  private locks = new Map<string, LockRecord>()
  private mutex = new KeyedMutex<string>()

  async acquire(key: string, token: string): Promise<void> {
    await this.mutex.withLock(key, async () => {
      this.locks.set(key, { token })
    })
  }

  async release(key: string): Promise<LockRecord> {
    return this.mutex.withLock(key, async () => {
      const existing = this.locks.get(key)
      if (!existing) {
        throw new LockNotFoundError(key)
      }

      this.locks.delete(key)
      return existing
    })
  }

  async purgeAll(): Promise<void> {
    await this.mutex.withExclusive(async () => {
      this.locks.clear()
    })
  }

  async size(): Promise<number> {
    return this.locks.size
  }
}
