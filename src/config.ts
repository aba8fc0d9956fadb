/**
 * Configuration Management
 */

import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

const flag = z.enum(['true', 'false']).transform((value) => value === 'true')

const ConfigSchema = z.object({
  env: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  host: z.string().default('0.0.0.0'),

  registry: z.object({
    strategy: z.enum(['in-memory', 'guarded']).default('in-memory')
  }),

  http: z.object({
    bodyLimit: z.string().default('2mb')
  }),

  cors: z.object({
    origin: z.string().default('*')
  }),

  metrics: z.object({
    enabled: flag.default('true'),
    port: z.coerce.number().int().min(0).max(65535).default(9090)
  }),

  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    format: z.enum(['json', 'text']).default('json')
  })
})

export type Config = z.infer<typeof ConfigSchema>

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,

    registry: {
      strategy: env.LOCK_STRATEGY
    },

    http: {
      bodyLimit: env.BODY_LIMIT
    },

    cors: {
      origin: env.CORS_ORIGIN
    },

    metrics: {
      enabled: env.METRICS_ENABLED,
      port: env.METRICS_PORT
    },

    logging: {
      level: env.LOG_LEVEL,
      format: env.LOG_FORMAT
    }
  })
}

export const config: Config = loadConfig()
