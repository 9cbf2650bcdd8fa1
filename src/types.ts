import type {
  JsonPrimitive,
  Simplify,
} from 'type-fest'
import type { createCommand } from './program'

/** A raw cell as it comes out of the reader; `undefined` marks a missing cell. */
export type CellValue = JsonPrimitive | undefined

export type WeatherRecord = Readonly<Record<string, CellValue>>

export type FieldSet = readonly string[]

export type Maybe<T> =
  | { readonly kind: 'some', readonly value: T }
  | { readonly kind: 'none' }

export interface RunStats {
  read: number
  written: number
  skippedMissingTemp: number
  skippedBadTemp: number
}

export interface FilterResult {
  kept: WeatherRecord[]
  stats: Readonly<RunStats>
}

export const csvDelimiters = [`,`, `;`, `|`, `tab`] as const

export type CsvDelimiter = (typeof csvDelimiters)[number]

export type ProgramOptions = ReturnType<ReturnType<typeof createCommand>['opts']>

export type FilterConfig = Simplify<Readonly<{
  input: string
  output: string
  tempMin: number
  tempField?: string
  logPath: string
  delimiter: CsvDelimiter
  /** when false, every record is copied through and nothing is logged */
  filtering: boolean
}>>

export interface RunLogEntry {
  input: string
  output: string
  tempField: string
  tempMin: number
  stats: Readonly<RunStats>
}

export const ExitCode = {
  Success: 0,
  Failure: 1,
  InvalidInput: 2,
  Usage: 2,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]
