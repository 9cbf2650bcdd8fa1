import { Option } from '@commander-js/extra-typings'

export default new Option('--no-filter', 'copy every record to the output unchanged (no threshold, no audit log)')
