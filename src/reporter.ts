import chalk from 'chalk'
import ora from 'ora'

export interface Reporter {
  /** a plain line on stdout */
  info: (message: string) => void
  warn: (message: string) => void
  fail: (message: string) => void
}

export function createConsoleReporter(): Reporter {
  const spinner = ora({
    hideCursor: false,
    discardStdin: false,
  })

  return {
    info(message) {
      process.stdout.write(`${message}\n`)
    },
    warn(message) {
      spinner.warn(chalk.yellowBright(message))
    },
    fail(message) {
      spinner.fail(chalk.redBright(message))
    },
  }
}
