/**
 * Base class for every failure the analyzer reports to the operator.
 */
export class CompileStatsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * A log line that cannot be read as `start\tend\trestat\ttarget\tcommand`.
 */
export class LogFormatError extends CompileStatsError {
  constructor(
    public readonly lineNumber: number,
    reason: string,
  ) {
    super(`log line ${lineNumber}: ${reason}`)
  }
}

export class CommandLineError extends CompileStatsError {}

export class ConfigError extends CompileStatsError {}

/**
 * The preprocess-only compiler run failed to start or exited non-zero.
 */
export class PreprocessError extends CompileStatsError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    detail?: string,
  ) {
    const status = exitCode === null ? 'did not run' : `exited with code ${exitCode}`
    super(`preprocess command ${status}${detail ? ` (${detail})` : ''}: ${command}`)
  }
}
