import type { Dayjs } from 'dayjs'
import type { RunLogEntry } from '../types'
import dayjs from 'dayjs'
import fs from 'fs-extra'
import { dirname } from 'pathe'
import { formatThreshold } from '../helpers'

export const DEFAULT_LOG_PATH = 'weather_filter.log'

export function formatLogLine(entry: RunLogEntry, now: Dayjs = dayjs()): string {
  const {
    input,
    output,
    tempField,
    tempMin,
    stats,
  } = entry

  return [
    now.format('YYYY-MM-DDTHH:mm:ssZ'),
    `input=${input}`,
    `output=${output}`,
    `temp_field=${tempField}`,
    `temp_min=${formatThreshold(tempMin)}`,
    `read=${stats.read}`,
    `written=${stats.written}`,
    `skip_missing_temp=${stats.skippedMissingTemp}`,
    `skip_bad_temp=${stats.skippedBadTemp}`,
  ].join(' | ')
}

/** Appends one line per run; earlier lines are never rewritten. */
export function appendRunLog(logPath: string, entry: RunLogEntry): void {
  fs.ensureDirSync(dirname(logPath))
  fs.appendFileSync(logPath, `${formatLogLine(entry)}\n`, 'utf-8')
}
