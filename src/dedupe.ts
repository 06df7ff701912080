import type { LogRecord } from './log-parser.js'

/**
 * Map each target to the position of its most recent record. Position in
 * the log decides recency, not the recorded timestamps.
 */
export function mostRecentIndex(records: readonly Pick<LogRecord, 'target'>[]): Map<string, number> {
  const index = new Map<string, number>()
  records.forEach((record, position) => {
    index.set(record.target, position)
  })
  return index
}

/**
 * Keep only the last record for every target, preserving log order.
 */
export function mostRecentRecords<T extends Pick<LogRecord, 'target'>>(records: readonly T[]): T[] {
  const index = mostRecentIndex(records)
  return records.filter((record, position) => index.get(record.target) === position)
}
