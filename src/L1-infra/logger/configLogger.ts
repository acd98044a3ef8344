import winston from 'winston'

/**
 * Sanitize caller-supplied values (paths, arguments) for logging.
 * Escapes newlines, carriage returns and tabs so one value stays on one log line.
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

export interface LogLineParts {
  timestamp?: unknown
  level: string
  message: unknown
}

/** One log line: `<timestamp> [ffprobe] [LEVEL]: <message>`. */
export function formatLogLine({ timestamp, level, message }: LogLineParts): string {
  return `${String(timestamp)} [ffprobe] [${level.toUpperCase()}]: ${String(message)}`
}

const LOG_FORMAT = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf((info) => formatLogLine(info))
)

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']

// Every level goes to stderr: stdout belongs to the host program
const logger = winston.createLogger({
  level: 'info',
  format: LOG_FORMAT,
  transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
})

export function setVerbose(): void {
  logger.level = 'debug'
}

/** Silence or restore all library logging. */
export function setSilent(silent: boolean): void {
  logger.silent = silent
}

export default logger
