import chalk from 'chalk'

/** Prints a fatal error and exits with an error code. */
const error = (...msg: unknown[]): never => {
  console.error(chalk.red('Error:'), ...msg)
  process.exit(1)
}

export default error
