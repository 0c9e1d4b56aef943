import chalk from 'chalk'

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Logger {
  level: LogLevel
  error: (message: string) => void
  warn: (message: string) => void
  info: (message: string) => void
  debug: (message: string) => void
}

export interface LoggerOptions {
  colors?: boolean
  write?: (line: string) => void
}

type MessageLevel = Exclude<LogLevel, 'silent'>

export const isLogLevel = (value: string): value is LogLevel => {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

// stdout is reserved for the JSON document
const writeStderr = (line: string): void => {
  process.stderr.write(`${line}\n`)
}

export const createLogger = (level: LogLevel, options: LoggerOptions = {}): Logger => {
  const colors = options.colors ?? chalk.stderr.level > 0
  const palette = new chalk.Instance({ level: colors ? 1 : 0 })
  const write = options.write ?? writeStderr
  const threshold = LOG_LEVELS.indexOf(level)

  const styles: Record<MessageLevel, (text: string) => string> = {
    error: palette.red,
    warn: palette.yellow,
    info: palette.cyan,
    debug: palette.gray
  }

  const emit = (messageLevel: MessageLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(messageLevel) > threshold) {
      return
    }
    write(`${styles[messageLevel](`[${messageLevel}]`)} ${message}`)
  }

  return {
    level,
    error: (message) => emit('error', message),
    warn: (message) => emit('warn', message),
    info: (message) => emit('info', message),
    debug: (message) => emit('debug', message)
  }
}

export const silentLogger: Logger = createLogger('silent')
