import pc from 'picocolors'

import type { Logger } from '../types/logger'

/**
 * Logger that colors messages for the terminal.
 *
 * @returns Logger writing to the console.
 */
export function createCliLogger(): Logger {
  return {
    error: (message, ...details) => {
      console.error(pc.redBright(`✗ ${message}`), ...details)
    },
    warn: (message, ...details) => {
      console.warn(pc.yellow(`⚠️  ${message}`), ...details)
    },
    info: (message, ...details) => {
      console.info(pc.gray(message), ...details)
    },
  }
}
