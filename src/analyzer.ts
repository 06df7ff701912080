import { readFile, stat } from 'fs/promises'
import path from 'path'
import type { CompileStatsConfig } from './config.js'
import { resolveLogFile } from './config.js'
import { mostRecentRecords } from './dedupe.js'
import { LAST_COMMAND_LOG_VERSION, parseBuildLog, type LogRecord, type LogSummary } from './log-parser.js'
import { Preprocessor, type CommandRunner } from './preprocess.js'
import type { OutputRow, Reporter } from './report.js'
import { PhaseTimer } from './timing.js'

const debug = process.env.DEBUG === '1'

export interface AnalyzeOptions {
  reporter: Reporter
  /** Diagnostics sink; defaults to stderr. */
  log?: (line: string) => void
  runner?: CommandRunner
  timer?: PhaseTimer
  tempRoot?: string
}

export interface AnalyzeResult {
  summary: LogSummary
  rows: number
}

export async function objectSize(buildDir: string, target: string): Promise<number> {
  const stats = await stat(path.join(buildDir, target))
  return stats.size
}

/**
 * Read the build log, keep the latest compile of every target and report
 * one row per target, measuring each file in turn.
 *
 * Rows are handed to the reporter as soon as they are measured. Any failure
 * aborts the run; rows already reported stay reported.
 */
export async function analyzeBuildLog(config: CompileStatsConfig, options: AnalyzeOptions): Promise<AnalyzeResult> {
  const log = options.log ?? ((line: string) => console.error(line))
  const timer = options.timer ?? new PhaseTimer()
  const { reporter } = options

  const logFile = resolveLogFile(config)
  const { records, summary } = await timer.time('parse', async () =>
    parseBuildLog(await readFile(logFile, 'utf8'), {
      buildDir: config.buildDir,
      compilers: config.compilers,
      compileFlag: config.compileFlag,
    }),
  )

  if (summary.version !== null && summary.version > LAST_COMMAND_LOG_VERSION) {
    log(`[compile-stats] warning: ${logFile} is a v${summary.version} log, which stores command hashes; no compile commands can be recovered`)
  }
  if (debug) {
    log(`[compile-stats] ${summary.totalEntries} entries, ${summary.compileEntries} compiles, ${summary.uniqueTargets} unique targets`)
  }

  const latest: LogRecord[] = mostRecentRecords(records)
  const preprocessor = new Preprocessor({ buildDir: config.buildDir, runner: options.runner, tempRoot: options.tempRoot })

  reporter.begin()
  let rows = 0
  for (const record of latest) {
    if (config.progress) {
      log(`[${rows + 1}/${latest.length}] ${record.source}`)
    }

    const preprocessed = await timer.time('preprocess', () => preprocessor.measure(record))
    const objectSizeBytes = await timer.time('stat', () => objectSize(config.buildDir, record.target))

    const row: OutputRow = {
      source: record.source,
      durationMs: record.end - record.start,
      preprocessedSizeBytes: preprocessed.sizeBytes,
      objectSizeBytes,
      lineCount: preprocessed.lineCount,
    }
    reporter.row(row)
    rows++
  }
  reporter.finish()

  if (config.timings) {
    timer.report(log)
  }

  return { summary, rows }
}
