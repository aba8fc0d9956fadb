/**
 * Logger Utility
 *
 * Every entry carries `service: 'lock-registry'`. Lock tokens are never
 * passed to the logger; entries name keys only.
 */

import winston from 'winston'
import { config } from '../config'
import type { Config } from '../config'

export const SERVICE_NAME = 'lock-registry'

function buildFormat(format: Config['logging']['format']) {
  if (format === 'json') {
    return winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    )
  }

  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
      return `${timestamp} [${service}] ${level}: ${message}${metaStr}`
    })
  )
}

export function createLogger(options: Pick<Config, 'env' | 'logging'>): winston.Logger {
  return winston.createLogger({
    level: options.logging.level,
    format: buildFormat(options.logging.format),
    defaultMeta: { service: SERVICE_NAME },
    silent: options.env === 'test',
    transports: [
      new winston.transports.Console()
    ]
  })
}

export const logger = createLogger(config)
