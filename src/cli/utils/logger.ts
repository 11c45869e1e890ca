/**
 * Console Logger
 *
 * Colored console output for the CLI. Debug lines only print with --verbose.
 */

import chalk from 'chalk'
import type { GenerationLogger } from '../../core/generation-driver.js'

export interface ConsoleLoggerOptions {
  verbose?: boolean
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): GenerationLogger {
  return {
    info(message) {
      console.log(message)
    },
    warn(message) {
      console.warn(chalk.yellow(`⚠️  ${message}`))
    },
    error(message) {
      console.error(chalk.red(`❌ ${message}`))
    },
    debug(message) {
      if (options.verbose) {
        console.log(chalk.gray(message))
      }
    },
  }
}
