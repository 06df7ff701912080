import type { ReportFormat } from './config.js'

export interface OutputRow {
  source: string
  durationMs: number
  preprocessedSizeBytes: number
  objectSizeBytes: number
  lineCount: number
}

export const CSV_HEADER = 'name,t_ms,in_size_bytes,out_size_bytes,nlines'

/**
 * Receives rows as they are measured. `begin` is called once before the
 * first row and `finish` once after the last.
 */
export interface Reporter {
  begin(): void
  row(row: OutputRow): void
  finish(): void
}

export type WriteLine = (line: string) => void

/**
 * Paths are written as-is: a comma in a source path shifts the columns.
 */
export function formatCsvRow(row: OutputRow): string {
  return `${row.source},${row.durationMs},${row.preprocessedSizeBytes},${row.objectSizeBytes},${row.lineCount}`
}

export class CsvReporter implements Reporter {
  constructor(private write: WriteLine) {}

  begin(): void {
    this.write(CSV_HEADER)
  }

  row(row: OutputRow): void {
    this.write(formatCsvRow(row))
  }

  finish(): void {}
}

/**
 * Buffers rows and writes a single `{ "data": [...] }` document at the end.
 */
export class JsonReporter implements Reporter {
  private rows: OutputRow[] = []

  constructor(private write: WriteLine) {}

  begin(): void {
    this.rows = []
  }

  row(row: OutputRow): void {
    this.rows.push(row)
  }

  finish(): void {
    const data = this.rows.map(row => ({
      name: row.source,
      t_ms: row.durationMs,
      in_size_bytes: row.preprocessedSizeBytes,
      out_size_bytes: row.objectSizeBytes,
      nlines: row.lineCount,
    }))
    this.write(JSON.stringify({ data }, null, 2))
  }
}

export function createReporter(format: ReportFormat, write: WriteLine): Reporter {
  switch (format) {
    case 'csv':
      return new CsvReporter(write)
    case 'json':
      return new JsonReporter(write)
  }
}
