import { isLogLevel, type LogLevel } from './logger'

export const DEFAULT_SOURCE = 'data.csv'
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

export interface AppConfig {
  defaultSource: string
  logLevel: LogLevel
  encoding?: string
  delimiter?: string
}

/**
 * Accepts `tab` and the two-character escape `\t` for a tab delimiter.
 */
export const normalizeDelimiter = (value: string | undefined): string | undefined => {
  if (value === undefined || value === '') {
    return undefined
  }
  if (value === 'tab' || value === '\\t') {
    return '\t'
  }
  return value
}

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export const resolveConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const level = nonEmpty(env.CSV_SUMMARY_LOG_LEVEL)?.toLowerCase()

  return {
    defaultSource: nonEmpty(env.CSV_SUMMARY_SOURCE) ?? DEFAULT_SOURCE,
    logLevel: level && isLogLevel(level) ? level : DEFAULT_LOG_LEVEL,
    encoding: nonEmpty(env.CSV_SUMMARY_ENCODING),
    delimiter: normalizeDelimiter(env.CSV_SUMMARY_DELIMITER)
  }
}
