import winston from 'winston'
import { setLogger } from '@modelforge/shared'

export type CapturedLog = Record<string, unknown>

/** Installs a logger that records every entry instead of printing it. */
export function captureLogs(level = 'debug'): CapturedLog[] {
  const entries: CapturedLog[] = []
  const capture = winston.format((info) => {
    entries.push({ ...info })
    return false
  })
  setLogger(
    winston.createLogger({
      level,
      defaultMeta: { service: 'modelforge' },
      format: capture(),
      transports: [new winston.transports.Console()]
    })
  )
  return entries
}
