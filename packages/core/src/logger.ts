/**
 * Flat key/value context attached to a log line. Values stay primitive so a
 * line can always be printed on one row.
 */
export type LogContext = Record<string, string | number | boolean | null>

export type Logger = {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
}

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
}

export type ConsoleLoggerOptions = {
  verbose?: boolean
  color?: boolean
}

export function formatContext(context?: LogContext): string {
  if (!context) return ''
  const pairs = Object.entries(context).map(
    ([key, value]) => `${key}=${value === null ? 'null' : String(value)}`,
  )
  return pairs.length > 0 ? ` ${pairs.join(' ')}` : ''
}

export function createConsoleLogger(
  options: ConsoleLoggerOptions = {},
): Logger {
  const { verbose = false, color = process.stderr.isTTY === true } = options

  const paint = (code: string, text: string) =>
    color ? `${code}${text}${colors.reset}` : text

  // stdout is reserved for command output
  return {
    debug(message, context) {
      if (!verbose) return
      console.error(paint(colors.dim, `· ${message}${formatContext(context)}`))
    },
    info(message, context) {
      console.error(
        `${paint(colors.cyan, '▶')} ${message}${paint(colors.dim, formatContext(context))}`,
      )
    },
    warn(message, context) {
      console.error(
        `${paint(colors.yellow, '⚠')} ${message}${paint(colors.dim, formatContext(context))}`,
      )
    },
    error(message, context) {
      console.error(
        `${paint(colors.red, '✗')} ${message}${paint(colors.dim, formatContext(context))}`,
      )
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}
