import type {
  FilterResult,
  RunStats,
  WeatherRecord,
} from '../types'
import { toTemperature } from './temperature'

export {
  FIELD_SAMPLE_SIZE,
  selectTemperatureField,
  TEMPERATURE_FIELD_CANDIDATES,
  toTemperature,
} from './temperature'

/**
 * Keeps every record whose `field` holds a number at or above `threshold`.
 * Records lacking the column count as `skippedMissingTemp`, records whose
 * value is not numeric as `skippedBadTemp`; colder records are dropped
 * without being counted.
 */
export function filterRecords(records: readonly WeatherRecord[], field: string, threshold: number): FilterResult {
  const stats: RunStats = {
    read: records.length,
    written: 0,
    skippedMissingTemp: 0,
    skippedBadTemp: 0,
  }

  const kept: WeatherRecord[] = []

  for (const record of records) {
    if (!Object.hasOwn(record, field)) {
      stats.skippedMissingTemp++
      continue
    }

    const temperature = toTemperature(record[field])

    if (temperature.kind === 'none') {
      stats.skippedBadTemp++
      continue
    }

    if (temperature.value >= threshold)
      kept.push(record)
  }

  stats.written = kept.length

  return {
    kept,
    stats,
  }
}

export function copyRecords(records: readonly WeatherRecord[]): FilterResult {
  return {
    kept: [...records],
    stats: {
      read: records.length,
      written: records.length,
      skippedMissingTemp: 0,
      skippedBadTemp: 0,
    },
  }
}
