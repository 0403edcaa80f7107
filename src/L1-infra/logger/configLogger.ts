import winston from 'winston'

/**
 * Sanitize user input for logging to prevent log injection attacks.
 * Removes or escapes newlines, carriage returns, and other control characters.
 */
export function sanitizeForLog(value: unknown): string {
  if (value === null || value === undefined) return String(value)
  const str = String(value)
  return str.replace(/[\r\n\t]/g, (c) => {
    switch (c) {
      case '\r': return '\\r'
      case '\n': return '\\n'
      case '\t': return '\\t'
      default: return c
    }
  })
}

const LOG_FORMAT = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message }) => {
    return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}`
  })
)

// stdout carries the one-line result; every log level goes to stderr.
const consoleTransport = new winston.transports.Console({
  stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
})

const logger = winston.createLogger({
  level: 'info',
  format: LOG_FORMAT,
  transports: [consoleTransport],
})

export function setVerbose(): void {
  logger.level = 'debug'
}

// ── Log file ─────────────────────────────────────────────────────────────────

let fileTransport: winston.transports.FileTransportInstance | undefined

/** Mirror all log output to `filename`. Replaces a previously attached file. */
export function attachLogFile(filename: string): void {
  detachLogFile()
  fileTransport = new winston.transports.File({ filename, format: LOG_FORMAT })
  logger.add(fileTransport)
}

export function detachLogFile(): void {
  if (fileTransport) {
    logger.remove(fileTransport)
    fileTransport = undefined
  }
}

export default logger
