// Registry exports
export * from './storage'

// Service and HTTP wiring
export { LockService } from './services/lock-service'
export { createApp } from './app'
export { ApiError } from './middleware/error-handler'

// Configuration exports
export { loadConfig } from './config'
export type { Config } from './config'
