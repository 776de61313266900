import dotenv from 'dotenv'
dotenv.config()

const plotTimeoutSeconds = process.env.SCREEN_PLOT_TIMEOUT
  ? parseInt(process.env.SCREEN_PLOT_TIMEOUT)
  : 120

export const config = {
  logLevel: process.env.LOG_LEVEL ?? 'info',
  logTimezone: process.env.SCREEN_LOG_TIMEZONE ?? 'Europe/London',
  infoLogFile: process.env.SCREEN_INFO_LOG ?? 'i19.screen.log',
  debugLogFile: process.env.SCREEN_DEBUG_LOG ?? 'i19.screen.debug.log',
  // Tools resolve to <root>/build/bin/<tool> when set, otherwise via PATH
  installRoot: process.env.DIALS_INSTALL_ROOT || undefined,
  plotTimeoutMs:
    (plotTimeoutSeconds > 0 ? plotTimeoutSeconds : 120) * 1000
}
