import pc from 'picocolors'

/** Log severity. */
type Level = 'SUCCESS' | 'ERROR' | 'INFO' | 'WARN'

let colors: Record<Level, (value: string) => string> = {
  SUCCESS: pc.green,
  ERROR: pc.redBright,
  INFO: pc.cyan,
  WARN: pc.yellow,
}

/**
 * Format a log line as `<iso timestamp> - <LEVEL> - <message>`.
 *
 * @param level - Log severity.
 * @param message - Text to print.
 * @param now - Timestamp source.
 * @returns Colored log line.
 */
export function formatLogLine(
  level: Level,
  message: string,
  now: Date = new Date(),
): string {
  return `${pc.gray(now.toISOString())} - ${colors[level](level)} - ${message}`
}

/** Timestamped console logger used by the sync workflow. */
export let logger = {
  error: (message: string): void => {
    console.error(formatLogLine('ERROR', message))
  },
  success: (message: string): void => {
    console.info(formatLogLine('SUCCESS', message))
  },
  warn: (message: string): void => {
    console.warn(formatLogLine('WARN', message))
  },
  info: (message: string): void => {
    console.info(formatLogLine('INFO', message))
  },
}
