import { Option } from '@commander-js/extra-typings'
import chalk from 'chalk'

export default new Option(
  '--temp-field <column name>',
  `the column holding the temperature (if not set, the first of ${chalk.cyan('temperature, temp, tavg, tmax, tmin')} found in the header is used)`,
)
