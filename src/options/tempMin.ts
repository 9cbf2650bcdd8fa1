import {
  InvalidArgumentError,
  Option,
} from '@commander-js/extra-typings'
import validator from 'validator'

export function parseThreshold(val: string): number {
  const trimmed = val.trim()

  const parsed = validator.isFloat(trimmed) ? validator.toFloat(trimmed) : Number.NaN

  if (Number.isNaN(parsed))
    throw new InvalidArgumentError(`"${val}" is not a number.`)

  return parsed
}

export default new Option('--temp-min <number>', 'the minimum temperature a record must reach to be kept (inclusive)')
  .makeOptionMandatory()
  .argParser(parseThreshold)
