import { Command, Option } from 'commander'
import { analyzeBuildLog } from './analyzer.js'
import { loadConfig, mergeConfig, type ConfigFile, type ReportFormat } from './config.js'
import type { CommandRunner } from './preprocess.js'
import { createReporter, type WriteLine } from './report.js'

export interface ProgramIO {
  /** Report output; defaults to stdout. */
  out?: WriteLine
  /** Diagnostics; defaults to stderr. */
  err?: WriteLine
  runner?: CommandRunner
}

interface CliOptions {
  buildDir?: string
  log?: string
  compiler?: string[]
  format?: ReportFormat
  config?: string
  progress?: boolean
  timings?: boolean
}

export function createProgram(io: ProgramIO = {}): Command {
  const out = io.out ?? ((line: string) => process.stdout.write(line + '\n'))
  const err = io.err ?? ((line: string) => console.error(line))

  const program = new Command()

  program
    .name('compile-stats')
    .description('Per-file compile time, preprocessed size and object size from a ninja build log')
    .version('0.1.0')
    .option('-C, --build-dir <dir>', 'build output directory (default: out/Release)')
    .option('-l, --log <file>', 'ninja log to read (default: <build-dir>/.ninja_log)')
    .option('--compiler <marker...>', 'substring that marks a compiler command (default: clang)')
    .addOption(new Option('-f, --format <format>', 'report format (default: csv)').choices(['csv', 'json']))
    .option('-c, --config <file>', 'config file path (default: compile-stats.json)')
    .option('--progress', 'print progress to stderr')
    .option('--timings', 'print a phase timing report to stderr')
    .action(async (options: CliOptions) => {
      const overrides: ConfigFile = {
        buildDir: options.buildDir,
        logFile: options.log,
        compilers: options.compiler,
        format: options.format,
        progress: options.progress,
        timings: options.timings,
      }
      const config = mergeConfig(loadConfig(options.config), overrides)

      await analyzeBuildLog(config, {
        reporter: createReporter(config.format, out),
        log: err,
        runner: io.runner,
      })
    })

  return program
}
