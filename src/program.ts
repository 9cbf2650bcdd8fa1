import type {
  FilterConfig,
  ProgramOptions,
} from './types'
import { Command } from '@commander-js/extra-typings'
import pkg from '../package.json'
import delimiterOption from './options/delimiter'
import filterOption from './options/filter'
import inputOption from './options/input'
import logPathOption from './options/logPath'
import outputOption from './options/output'
import tempFieldOption from './options/tempField'
import tempMinOption from './options/tempMin'
import { ExitCode } from './types'

export function createCommand() {
  return new Command(pkg.name)
    .version(pkg.version)
    .description('Filter weather station records by temperature and write the kept rows to a new CSV file')
    .showSuggestionAfterError(true)
    .addOption(inputOption)
    .addOption(outputOption)
    .addOption(tempMinOption)
    .addOption(tempFieldOption)
    .addOption(logPathOption)
    .addOption(delimiterOption)
    .addOption(filterOption)
    .exitOverride((err) => {
      process.exit(err.exitCode === 0 ? ExitCode.Success : ExitCode.Usage)
    })
}

export function createProgram(run: (config: FilterConfig) => void) {
  return createCommand().action((options) => {
    run(toFilterConfig(options))
  })
}

export function toFilterConfig(options: ProgramOptions): FilterConfig {
  return Object.freeze({
    input: options.input,
    output: options.output,
    tempMin: options.tempMin,
    tempField: options.tempField,
    logPath: options.log,
    delimiter: options.delimiter,
    filtering: options.filter,
  })
}
