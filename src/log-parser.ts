import path from 'path'
import { tokenizeCommandLine, type CommandToken } from './command-line.js'
import { LogFormatError } from './errors.js'

/**
 * One compile invocation recovered from the build log.
 */
export interface LogRecord {
  readonly start: number
  readonly end: number
  /** Output artifact, relative to the build directory. */
  readonly target: string
  /** Compiled source file, resolved against the build directory. */
  readonly source: string
  readonly command: string
  readonly argv: readonly string[]
  /** Words of `command` with their original quoting. */
  readonly tokens: readonly CommandToken[]
  /** 1-based line number in the log. */
  readonly line: number
}

export interface LogSummary {
  /** Version from the `# ninja log vN` signature, if the log has one. */
  version: number | null
  /** Data lines read, compile or not. */
  totalEntries: number
  compileEntries: number
  uniqueTargets: number
}

export interface ParsedLog {
  records: readonly LogRecord[]
  summary: LogSummary
}

export interface ParseOptions {
  buildDir: string
  compilers: readonly string[]
  compileFlag: string
}

/** Last log version that stores full command lines; later ones store hashes. */
export const LAST_COMMAND_LOG_VERSION = 4

const SIGNATURE = /^# ninja log v(\d+)\s*$/
const INTEGER = /^-?\d+$/

/**
 * Resolve a source argument the way the compiler sees it: relative to the
 * build directory, normalized.
 */
export function resolveSource(buildDir: string, source: string): string {
  return path.isAbsolute(source) ? path.normalize(source) : path.join(buildDir, source)
}

/**
 * Find the source file a command compiles: the argument right after the
 * first compile flag. Returns null when the flag is absent.
 */
export function findCompiledSource(argv: readonly string[], compileFlag: string, lineNumber: number): string | null {
  const index = argv.indexOf(compileFlag)
  if (index === -1) {
    return null
  }
  if (index === argv.length - 1) {
    throw new LogFormatError(lineNumber, `${compileFlag} is the last argument, no source file follows`)
  }
  return argv[index + 1]
}

function parseTime(field: string, name: string, lineNumber: number): number {
  if (!INTEGER.test(field)) {
    throw new LogFormatError(lineNumber, `${name} time is not an integer: "${field}"`)
  }
  return Number.parseInt(field, 10)
}

/**
 * Split a data line into its five fields. The command is everything after
 * the fourth tab, so it may contain tabs of its own.
 */
export function splitLogLine(line: string, lineNumber: number): [string, string, string, string, string] {
  const fields: string[] = []
  let rest = line
  for (let i = 0; i < 4; i++) {
    const tab = rest.indexOf('\t')
    if (tab === -1) {
      throw new LogFormatError(lineNumber, `expected 5 tab-separated fields, found ${fields.length + 1}`)
    }
    fields.push(rest.slice(0, tab))
    rest = rest.slice(tab + 1)
  }
  return [fields[0], fields[1], fields[2], fields[3], rest]
}

/**
 * Parse one data line. Returns null for entries that are not single-file
 * compiles by one of the configured compilers.
 */
export function parseLogLine(line: string, lineNumber: number, options: ParseOptions): LogRecord | null {
  const [startField, endField, , target, rawCommand] = splitLogLine(line, lineNumber)
  const start = parseTime(startField, 'start', lineNumber)
  const end = parseTime(endField, 'end', lineNumber)
  const command = rawCommand.trimEnd()

  if (!options.compilers.some(marker => command.includes(marker))) {
    return null
  }

  const tokens = tokenizeCommandLine(command)
  const argv = tokens.map(token => token.value)
  const source = findCompiledSource(argv, options.compileFlag, lineNumber)
  if (source === null) {
    return null
  }

  return Object.freeze({
    start,
    end,
    target,
    source: resolveSource(options.buildDir, source),
    command,
    argv: Object.freeze(argv),
    tokens: Object.freeze(tokens.map(token => Object.freeze(token))),
    line: lineNumber,
  })
}

/**
 * Parse a whole build log into its compile records, in log order.
 */
export function parseBuildLog(text: string, options: ParseOptions): ParsedLog {
  const records: LogRecord[] = []
  const targets = new Set<string>()
  const summary: LogSummary = { version: null, totalEntries: 0, compileEntries: 0, uniqueTargets: 0 }

  const lines = text.split('\n')
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].endsWith('\r') ? lines[i].slice(0, -1) : lines[i]
    const lineNumber = i + 1

    if (line.startsWith('#')) {
      const signature = SIGNATURE.exec(line)
      if (signature && summary.version === null && summary.totalEntries === 0) {
        summary.version = Number.parseInt(signature[1], 10)
      }
      continue
    }
    if (line.trim() === '') {
      continue
    }

    summary.totalEntries++
    const record = parseLogLine(line, lineNumber, options)
    if (record) {
      records.push(record)
      targets.add(record.target)
    }
  }

  summary.compileEntries = records.length
  summary.uniqueTargets = targets.size
  return { records, summary }
}
