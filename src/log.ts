import chalk from 'chalk'
import argv from './argv.js'

/** Logs info to the console. */
const log = (...args: unknown[]) => console.info(...args)

/** Logs a warning to the console. */
log.warn = (...args: unknown[]) => console.warn(chalk.yellow('!'), ...args)

/** Logs an error to the console. */
log.error = (...args: unknown[]) => console.error(chalk.red('✗'), ...args)

/** Logs a passing check to the console. */
log.ok = (...args: unknown[]) => console.info(chalk.green('✓'), ...args)

/** Logs info to the console if argv.verbose is true. */
const verbose = (...args: unknown[]) => argv.verbose && console.info(...args)

/** Logs a passing check to the console if argv.verbose is true. */
verbose.ok = (...args: unknown[]) => argv.verbose && log.ok(...args)

log.verbose = verbose

export default log
