export {
  appendRunLog,
  DEFAULT_LOG_PATH,
  formatLogLine,
} from './audit-log'
export {
  copyRecords,
  FIELD_SAMPLE_SIZE,
  filterRecords,
  selectTemperatureField,
  TEMPERATURE_FIELD_CANDIDATES,
  toTemperature,
} from './filter'
export {
  formatThreshold,
  none,
  readWeatherCsv,
  some,
  writeWeatherCsv,
} from './helpers'
export {
  runWeatherFilter,
  runWeatherFilterSafely,
} from './pipeline'
export {
  createCommand,
  createProgram,
  toFilterConfig,
} from './program'
export {
  createConsoleReporter,
  type Reporter,
} from './reporter'
export * from './types'
