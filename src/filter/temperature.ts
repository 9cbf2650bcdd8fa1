import type {
  CellValue,
  Maybe,
  WeatherRecord,
} from '../types'
import { objectify } from 'radash'
import validator from 'validator'
import {
  none,
  some,
} from '../helpers'

/** Column names tried, in priority order, when no field is given. */
export const TEMPERATURE_FIELD_CANDIDATES = ['temperature', 'temp', 'tavg', 'tmax', 'tmin'] as const

export const FIELD_SAMPLE_SIZE = 25

export function toTemperature(value: CellValue): Maybe<number> {
  if (typeof value === 'number')
    return some(value)

  if (typeof value !== 'string')
    return none

  const trimmed = value.trim()

  if (!trimmed.length || !validator.isFloat(trimmed))
    return none

  // isFloat lets a bare exponent or sign through ("e5", "-.")
  const parsed = validator.toFloat(trimmed)

  return Number.isNaN(parsed) ? none : some(parsed)
}

export function selectTemperatureField(records: readonly WeatherRecord[], preferred?: string): Maybe<string> {
  if (preferred)
    return some(preferred)

  for (const record of records.slice(0, FIELD_SAMPLE_SIZE)) {
    const columnsByLowerName = objectify(Object.keys(record), key => key.toLowerCase())

    const match = TEMPERATURE_FIELD_CANDIDATES.find(candidate => Object.hasOwn(columnsByLowerName, candidate))

    if (typeof match !== 'undefined')
      return some(columnsByLowerName[match])
  }

  return none
}
