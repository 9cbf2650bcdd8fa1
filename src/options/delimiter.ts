import { Option } from '@commander-js/extra-typings'
import { csvDelimiters } from '../types'

export default new Option('--delimiter <string>', 'the CSV delimiter used to parse the input and write the output')
  .choices(csvDelimiters)
  .default(`,` as const)
