import { Option } from '@commander-js/extra-typings'
import { DEFAULT_LOG_PATH } from '../audit-log'

export default new Option('--log <path>', 'the audit log a summary line is appended to after each run')
  .default(DEFAULT_LOG_PATH)
  .env('WEATHER_FILTER_LOG')
