import winston from 'winston'

import { getConfig } from './config.js'

let logger: winston.Logger | null = null

export function getLogger(component?: string): winston.Logger {
  const base = logger ?? createDefaultLogger()
  logger = base
  return component ? base.child({ component }) : base
}

export function setLogger(instance: winston.Logger | null) {
  logger = instance
}

function createDefaultLogger(): winston.Logger {
  const config = getConfig()
  const isProd = config.nodeEnv === 'production'

  const baseFormat = isProd
    ? winston.format.json()
    : winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : ''
          return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`
        })
      )

  return winston.createLogger({
    level: config.logLevel,
    // Test runs stay quiet unless a level was asked for explicitly.
    silent: config.nodeEnv === 'test' && !config.logLevelExplicit,
    defaultMeta: { service: 'modelforge' },
    transports: [new winston.transports.Console({ format: baseFormat })]
  })
}
