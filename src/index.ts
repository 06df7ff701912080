export { analyzeBuildLog, objectSize } from './analyzer.js'
export type { AnalyzeOptions, AnalyzeResult } from './analyzer.js'
export { tokenizeCommandLine, splitCommandLine, joinCommandLine, renderCommandLine, argumentToken, quoteArgument } from './command-line.js'
export type { CommandToken } from './command-line.js'
export { loadConfig, mergeConfig, parseConfigFile, resolveLogFile, defaultConfig } from './config.js'
export type { CompileStatsConfig, ConfigFile, ReportFormat } from './config.js'
export { mostRecentIndex, mostRecentRecords } from './dedupe.js'
export { CompileStatsError, CommandLineError, ConfigError, LogFormatError, PreprocessError } from './errors.js'
export { parseBuildLog, parseLogLine, splitLogLine, findCompiledSource, resolveSource } from './log-parser.js'
export type { LogRecord, LogSummary, ParsedLog, ParseOptions } from './log-parser.js'
export { Preprocessor, ShellCommandRunner, rewriteForPreprocessing, countLines } from './preprocess.js'
export type { CommandRunner, PreprocessResult, PreprocessorOptions } from './preprocess.js'
export { createReporter, CsvReporter, JsonReporter, formatCsvRow, CSV_HEADER } from './report.js'
export type { OutputRow, Reporter, WriteLine } from './report.js'
export { PhaseTimer } from './timing.js'
export { createProgram } from './program.js'
export type { ProgramIO } from './program.js'
