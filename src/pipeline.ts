import type { Reporter } from './reporter'
import type {
  FilterConfig,
  FilterResult,
} from './types'
import fs from 'fs-extra'
import { tryit } from 'radash'
import { appendRunLog } from './audit-log'
import {
  copyRecords,
  filterRecords,
  selectTemperatureField,
} from './filter'
import {
  readWeatherCsv,
  writeWeatherCsv,
} from './helpers'
import { ExitCode } from './types'

/**
 * Reads `config.input`, keeps the records at or above `config.tempMin`,
 * writes them to `config.output` and appends a line to the audit log.
 *
 * A missing input file or an undeterminable temperature column ends the run
 * with {@link ExitCode.InvalidInput} before anything is written. A failing
 * audit append is only a warning. Any other I/O error is thrown.
 */
export function runWeatherFilter(config: FilterConfig, reporter: Reporter): ExitCode {
  if (!fs.existsSync(config.input)) {
    reporter.fail(`Error: input file does not exist: ${config.input}`)

    return ExitCode.InvalidInput
  }

  const {
    records,
    fields,
  } = readWeatherCsv(config.input, config.delimiter)

  let result: FilterResult

  if (config.filtering) {
    const tempField = selectTemperatureField(records, config.tempField)

    if (tempField.kind === 'none') {
      reporter.fail('Error: could not determine temperature field. Use --temp-field.')

      return ExitCode.InvalidInput
    }

    result = filterRecords(records, tempField.value, config.tempMin)
    writeWeatherCsv(config.output, result.kept, fields, config.delimiter)

    const [logError] = tryit(appendRunLog)(config.logPath, {
      input: config.input,
      output: config.output,
      tempField: tempField.value,
      tempMin: config.tempMin,
      stats: result.stats,
    })

    if (logError)
      reporter.warn(`Warning: failed to write log: ${logError.message}`)
  }
  else {
    result = copyRecords(records)
    writeWeatherCsv(config.output, result.kept, fields, config.delimiter)
  }

  reporter.info(`Read ${result.stats.read} records; wrote ${result.stats.written} to ${config.output}`)

  return ExitCode.Success
}

/** Runs the filter, turning an unexpected error into a failure status. */
export function runWeatherFilterSafely(config: FilterConfig, reporter: Reporter): ExitCode {
  const [err, exitCode] = tryit(runWeatherFilter)(config, reporter)

  if (err) {
    reporter.fail(`Error: ${err.message}`)

    return ExitCode.Failure
  }

  return exitCode ?? ExitCode.Success
}
