import { stringifyWithBigInt } from '@chain-explorer/utils'
import type { Logger as WinstonLogger } from 'winston'
import { createLogger, format, transports as wTransports } from 'winston'

const { combine, timestamp, printf, colorize, errors } = format

export type Logger = WinstonLogger

export const LogLevels = ['error', 'warn', 'info', 'debug', 'off'] as const
export type LogLevel = (typeof LogLevels)[number]

export interface LoggerArgs {
  logLevel?: LogLevel
  /** Disable colors, e.g. when output is piped to a file */
  noColor?: boolean
}

const LEVEL_LABELS: Record<string, string> = {
  error: 'ERROR',
  warn: 'WARN ',
  info: 'INFO ',
  debug: 'DEBUG',
}

const logFormat = printf(({ level, message, timestamp: ts, stack, ...meta }) => {
  const label = LEVEL_LABELS[level.replace(/\u001b\[\d+m/g, '')] ?? level
  const rest = Object.keys(meta).length > 0 ? ` ${stringifyWithBigInt(meta)}` : ''
  const trace = typeof stack === 'string' ? `\n${stack}` : ''
  return `${label} [${String(ts)}] ${String(message)}${rest}${trace}`
})

function formatConfig(colors: boolean) {
  return combine(
    errors({ stack: true }),
    ...(colors ? [colorize({ level: true })] : []),
    timestamp({ format: 'MM-DD|HH:mm:ss' }),
    logFormat,
  )
}

/**
 * Returns a formatted {@link Logger}.
 * `logLevel: 'off'` gives a logger that drops everything.
 */
export function getLogger(args: LoggerArgs = {}): Logger {
  const logLevel = args.logLevel ?? 'info'
  const silent = logLevel === 'off'
  return createLogger({
    level: silent ? 'error' : logLevel,
    silent,
    transports: [
      new wTransports.Console({
        format: formatConfig(args.noColor !== true),
        silent,
      }),
    ],
  })
}
