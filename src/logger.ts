/**
 * Structured console logging for store operations.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  timestamp: string
  level: LogLevel
  event: string
  /** Entity type the event concerns (car, customer, rental) */
  entity?: string
  message?: string
  details?: Record<string, unknown>
}

const levelOrder: LogLevel[] = ['debug', 'info', 'warn', 'error']

class Logger {
  private enabled = true
  private minLevel: LogLevel = process.env.CAR_RENTAL_DEBUG ? 'debug' : 'info'

  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.enabled || !this.shouldLog(level)) {
      return
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data
    }

    const parts = [
      `[${entry.timestamp}] [${level.toUpperCase()}] [${entry.event}]`
    ]
    if (entry.entity) {
      parts.push(entry.entity)
    }
    if (entry.message) {
      parts.push(entry.message)
    }
    if (entry.details) {
      parts.push(JSON.stringify(entry.details))
    }
    const line = parts.join(' ')

    switch (level) {
      case 'debug':
        console.debug(line)
        break
      case 'info':
        console.log(line)
        break
      case 'warn':
        console.warn(line)
        break
      case 'error':
        console.error(line)
        break
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log('debug', event, data)
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log('info', event, data)
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log('warn', event, data)
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log('error', event, data)
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled
  }

  isEnabled(): boolean {
    return this.enabled
  }

  private shouldLog(level: LogLevel): boolean {
    return levelOrder.indexOf(level) >= levelOrder.indexOf(this.minLevel)
  }
}

export const logger = new Logger()

export function setLogLevel(level: LogLevel): void {
  logger.setLevel(level)
}

export function setLoggingEnabled(enabled: boolean): void {
  logger.setEnabled(enabled)
}
