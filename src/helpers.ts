import type {
  CsvDelimiter,
  FieldSet,
  Maybe,
  WeatherRecord,
} from './types'
import {
  parse,
  stringify,
} from 'csv/sync'
import fs from 'fs-extra'
import { padStart } from 'lodash-es'

export const none: Maybe<never> = { kind: 'none' }

export function some<T>(value: T): Maybe<T> {
  return {
    kind: 'some',
    value,
  }
}

export function resolveDelimiter(delimiter: CsvDelimiter): string {
  return delimiter === 'tab' ? '\t' : delimiter
}

/**
 * Renders a threshold the way it appears in the audit log: integral values
 * keep one decimal place (`10` becomes `10.0`), and magnitudes from `1e16`
 * up or below `1e-4` use an exponent of at least two digits (`1e-05`).
 */
export function formatThreshold(value: number): string {
  if (!Number.isFinite(value))
    return `${value}`

  const magnitude = Math.abs(value)

  if (magnitude !== 0 && (magnitude >= 1e16 || magnitude < 1e-4)) {
    const [mantissa, exponent] = value.toExponential().split('e')

    const sign = exponent.startsWith('-') ? '-' : '+'

    return `${mantissa}e${sign}${padStart(exponent.replace(/^[+-]/, ''), 2, '0')}`
  }

  if (Object.is(value, -0))
    return '-0.0'

  return Number.isInteger(value) ? value.toFixed(1) : `${value}`
}

export function readWeatherCsv(filePath: string, delimiter: CsvDelimiter = ','): {
  records: WeatherRecord[]
  fields: FieldSet
} {
  const text = fs.readFileSync(filePath, 'utf-8')

  const rows: string[][] = parse(text, {
    bom: true,
    delimiter: resolveDelimiter(delimiter),
    skip_empty_lines: true,
    relax_column_count: true,
    relax_quotes: true,
  })

  const [header = [], ...body] = rows

  // short rows keep every header key with an absent value; extra cells are dropped
  const records = body.map(row => Object.fromEntries(header.map((field, index): [string, string | undefined] => [field, index < row.length ? row[index] : undefined])))

  return {
    records,
    fields: header,
  }
}

export function writeWeatherCsv(filePath: string, records: readonly WeatherRecord[], fields: FieldSet, delimiter: CsvDelimiter = ','): void {
  const rows = [
    [...fields],
    ...records.map(record => fields.map(field => record[field] ?? '')),
  ]

  const csvOutput = stringify(rows, {
    delimiter: resolveDelimiter(delimiter),
    record_delimiter: 'windows',
  })

  fs.outputFileSync(filePath, csvOutput, 'utf-8')
}
