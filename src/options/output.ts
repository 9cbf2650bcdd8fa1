import { Option } from '@commander-js/extra-typings'

export default new Option('-o, --output <path>', 'the path of the CSV file to write the kept records to (overwritten)')
  .makeOptionMandatory()
