import { describe, it, expect } from 'vitest'
import { createLogger, logger, SERVICE_NAME } from '../../utils/logger'

describe('createLogger', () => {
  it('should tag every entry with the service name', () => {
    const created = createLogger({ env: 'development', logging: { level: 'debug', format: 'text' } })

    expect(created.defaultMeta).toEqual({ service: 'lock-registry' })
    expect(created.level).toBe('debug')
    expect(created.silent).toBe(false)
  })

  it('should stay silent under test', () => {
    const created = createLogger({ env: 'test', logging: { level: 'info', format: 'json' } })

    expect(created.silent).toBe(true)
  })

  it('should build the shared logger from config', () => {
    expect(logger.defaultMeta).toEqual({ service: SERVICE_NAME })
    expect(logger.silent).toBe(true)
  })
})
