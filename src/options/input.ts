import { Option } from '@commander-js/extra-typings'

export default new Option('-i, --input <path>', 'the path to the CSV file of weather records')
  .makeOptionMandatory()
