/**
 * Registry Factory - Picks a LockRegistry implementation from configuration
 */

import type { LockRegistry, LockStrategy } from './lock-registry'
import { InMemoryLockRegistry } from './in-memory-lock-registry'
import { GuardedLockRegistry } from './guarded-lock-registry'

export function createLockRegistry(strategy: LockStrategy = 'in-memory'): LockRegistry {
  switch (strategy) {
    case 'in-memory':
      return new InMemoryLockRegistry()
    case 'guarded':
      return new GuardedLockRegistry()
  }
}
