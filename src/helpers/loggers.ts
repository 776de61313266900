import { createLogger, transports, format } from 'winston'
import moment from 'moment-timezone'
import { config } from '../config/config.js'

const { combine, timestamp, label, printf } = format

const customTimestamp = () =>
  moment().tz(config.logTimezone).format('YYYY-MM-DD HH:mm:ss')

const logFormat = printf(({ level, message, label, timestamp }) => {
  return `${timestamp} - ${level}: [${label}] ${message}`
})

// The console carries the operator-facing output (tables, plots) unadorned
const consoleFormat = printf(({ message }) => `${message}`)

// Validate log level
const validLogLevels = [
  'error',
  'warn',
  'info',
  'http',
  'verbose',
  'debug',
  'silly'
]
const logLevel = validLogLevels.includes(config.logLevel)
  ? config.logLevel
  : 'info'

if (!validLogLevels.includes(config.logLevel)) {
  console.warn(`Invalid LOG_LEVEL "${config.logLevel}", defaulting to "info"`)
}

const logger = createLogger({
  level: 'debug',
  format: combine(
    label({ label: 'i19.screen' }),
    timestamp({ format: customTimestamp })
  ),
  transports: [
    new transports.Console({
      level: logLevel,
      format: consoleFormat
    })
  ]
})

/**
 * Attach the two per-session log files: one at info level mirroring the
 * console, one at debug level carrying every command line and process result.
 */
const configureLogFiles = (infoFile: string, debugFile: string): void => {
  logger.add(
    new transports.File({ level: 'info', filename: infoFile, format: logFormat })
  )
  logger.add(
    new transports.File({
      level: 'debug',
      filename: debugFile,
      format: logFormat
    })
  )
}

export { logger, configureLogFiles }
