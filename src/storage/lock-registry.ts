/**
 * LockRecord - What a key holds while locked
 */
export interface LockRecord {
  token: string
}

/**
 * LockRegistry - Named locks keyed by string, each carrying an opaque token
 *
 * Acquire overwrites whatever the key held before (last writer wins) and
 * release does not check the token. Both are atomic per key; purgeAll is
 * atomic over the whole registry.
 */
export interface LockRegistry {
  /**
   * Store `{ token }` under key, replacing any previous record
   */
  acquire(key: string, token: string): Promise<void>

  /**
   * Remove and return the record for key
   * @throws LockNotFoundError when the key holds nothing
   */
  release(key: string): Promise<LockRecord>

  /**
   * Drop every record
   */
  purgeAll(): Promise<void>

  /**
   * Number of keys currently held
   */
  size(): Promise<number>
}

export type LockStrategy = 'in-memory' | 'guarded'

export class LockNotFoundError extends Error {
  readonly code = 'LOCK_NOT_FOUND'

  constructor(public readonly key: string) {
    super(`Lock not found: ${key}`)
    this.name = 'LockNotFoundError'
  }
}
