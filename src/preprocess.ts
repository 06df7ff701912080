import { spawn } from 'child_process'
import { mkdtemp, readFile, rm } from 'fs/promises'
import os from 'os'
import path from 'path'
import { argumentToken, renderCommandLine, type CommandToken } from './command-line.js'
import { PreprocessError } from './errors.js'
import type { LogRecord } from './log-parser.js'

const debug = process.env.DEBUG === '1'

function debugLog(...args: unknown[]): void {
  if (debug) {
    console.error(...args)
  }
}

export interface PreprocessResult {
  sizeBytes: number
  lineCount: number
}

/**
 * Runs a shell command to completion in a given directory.
 */
export interface CommandRunner {
  run(command: string, cwd: string): Promise<void>
}

/**
 * Runs commands through the system shell. The compiler's stdout goes to our
 * stderr so it cannot interleave with the report.
 */
export class ShellCommandRunner implements CommandRunner {
  /** @param shell Shell to run commands with; `true` picks the system default. */
  constructor(private shell: string | true = true) {}

  run(command: string, cwd: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const child = spawn(command, {
        cwd,
        shell: this.shell,
        stdio: ['ignore', 2, 'inherit'],
      })

      child.on('error', err => {
        reject(new PreprocessError(command, null, err.message))
      })

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve()
        } else if (signal) {
          reject(new PreprocessError(command, code, `killed by ${signal}`))
        } else {
          reject(new PreprocessError(command, code))
        }
      })
    })
  }
}

const DROPPED_FLAGS = new Set(['-MMD'])
const DROPPED_FLAGS_WITH_VALUE = new Set(['-MF', '-o'])

/**
 * Turn a compile command into one that only preprocesses: dependency-file
 * and output flags are removed, `-E -o <outputPath>` is appended. Kept
 * tokens are not re-quoted, so shell operators in the logged command still
 * take effect.
 */
export function rewriteForPreprocessing(tokens: readonly CommandToken[], outputPath: string): CommandToken[] {
  const result: CommandToken[] = []
  for (let i = 0; i < tokens.length; i++) {
    const { value } = tokens[i]
    if (DROPPED_FLAGS.has(value)) {
      continue
    }
    if (DROPPED_FLAGS_WITH_VALUE.has(value)) {
      i++
      continue
    }
    result.push(tokens[i])
  }
  result.push(argumentToken('-E'), argumentToken('-o'), argumentToken(outputPath))
  return result
}

/**
 * Count lines the way a line reader would: every newline ends a line, and
 * trailing text without one is a line too.
 */
export function countLines(content: Buffer): number {
  let lines = 0
  let offset = content.indexOf(0x0a)
  while (offset !== -1) {
    lines++
    offset = content.indexOf(0x0a, offset + 1)
  }
  if (content.length > 0 && content[content.length - 1] !== 0x0a) {
    lines++
  }
  return lines
}

/**
 * A command that exits 0 without writing the output file never reached the
 * compiler.
 */
async function readOutput(command: string, outputPath: string): Promise<Buffer> {
  try {
    return await readFile(outputPath)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new PreprocessError(command, 0, 'no preprocessed output was written')
    }
    throw error
  }
}

export interface PreprocessorOptions {
  buildDir: string
  runner?: CommandRunner
  /** Directory under which per-invocation temp directories are created. */
  tempRoot?: string
}

/**
 * Re-runs logged compile commands in preprocess-only mode and measures the
 * expanded translation unit.
 */
export class Preprocessor {
  private buildDir: string
  private runner: CommandRunner
  private tempRoot: string

  constructor(options: PreprocessorOptions) {
    this.buildDir = options.buildDir
    this.runner = options.runner ?? new ShellCommandRunner()
    this.tempRoot = options.tempRoot ?? os.tmpdir()
  }

  async measure(record: Pick<LogRecord, 'tokens'>): Promise<PreprocessResult> {
    // A fresh directory per call keeps concurrent measurements apart.
    const tempDir = await mkdtemp(path.join(this.tempRoot, 'compile-stats-'))
    const outputPath = path.join(tempDir, 'preprocessed.ii')
    try {
      const command = renderCommandLine(rewriteForPreprocessing(record.tokens, outputPath))
      debugLog(`[compile-stats] ${command}`)
      await this.runner.run(command, this.buildDir)

      const content = await readOutput(command, outputPath)
      return { sizeBytes: content.length, lineCount: countLines(content) }
    } finally {
      await rm(tempDir, { recursive: true, force: true })
    }
  }
}
