/**
 * Structured JSON-line logger.
 *
 * One object per line with `ts`, `level` and `event`. Errors go to stderr,
 * everything else to stdout.
 */

import type { LogLevel } from './env'

export type LogFields = Record<string, unknown>
type EntryLevel = Exclude<LogLevel, 'silent'>

export interface Logger {
  debug(event: string, fields?: LogFields): void
  info(event: string, fields?: LogFields): void
  warn(event: string, fields?: LogFields): void
  error(event: string, fields?: LogFields): void
}

export type LogSink = (line: string, level: EntryLevel) => void

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

const stdSink: LogSink = (line, level) => {
  if (level === 'error') process.stderr.write(line)
  else process.stdout.write(line)
}

export function createLogger(minLevel: LogLevel, sink: LogSink = stdSink): Logger {
  const emit = (level: EntryLevel) => (event: string, fields: LogFields = {}) => {
    if (RANK[level] < RANK[minLevel]) return
    sink(JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields }) + '\n', level)
  }
  return { debug: emit('debug'), info: emit('info'), warn: emit('warn'), error: emit('error') }
}
