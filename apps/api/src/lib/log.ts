// ============================================
// Logger
// ============================================

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel) {
  threshold = level
}

function enabled(level: LogLevel) {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold)
}

function write(level: LogLevel, message: string) {
  if (!enabled(level)) return
  const timestamp = new Date().toISOString().split('T')[1].split('.')[0]
  const line = level === 'info' ? `[${timestamp}] ${message}` : `[${timestamp}] ${level.toUpperCase()}: ${message}`
  if (level === 'error') {
    console.error(line)
  } else if (level === 'warn') {
    console.warn(line)
  } else {
    console.log(line)
  }
}

export const log = {
  debug: (message: string) => write('debug', message),
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
}
