import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { ConfigError } from './errors.js'

export type ReportFormat = 'csv' | 'json'

export interface CompileStatsConfig {
  /** Build output directory; compile commands run here and targets resolve against it. */
  buildDir: string
  /**
   * Ninja log to read. Relative paths resolve against the working directory.
   * Default: `<buildDir>/.ninja_log`
   */
  logFile?: string
  /**
   * Substrings that mark a logged command as a compiler invocation.
   * A command matching none of them is skipped.
   */
  compilers: string[]
  /** Flag whose following argument names the single source file being compiled. */
  compileFlag: string
  format: ReportFormat
  /** Print `[n/total] source` to stderr before each file is measured. */
  progress: boolean
  /** Print a phase timing report to stderr when the run finishes. */
  timings: boolean
}

export const defaultConfig: CompileStatsConfig = {
  buildDir: 'out/Release',
  compilers: ['clang'],
  compileFlag: '-c',
  format: 'csv',
  progress: false,
  timings: false,
}

export const DEFAULT_CONFIG_FILE = 'compile-stats.json'

const ConfigFileSchema = z
  .object({
    buildDir: z.string().min(1, 'buildDir must not be empty'),
    logFile: z.string().min(1, 'logFile must not be empty'),
    compilers: z.array(z.string().min(1)).min(1, 'at least one compiler marker is required'),
    compileFlag: z.string().min(1),
    format: z.enum(['csv', 'json']),
    progress: z.boolean(),
    timings: z.boolean(),
  })
  .partial()
  .strict()

export type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * Load the config file and merge it over the defaults.
 *
 * A missing default config file is not an error; a missing file the user
 * named explicitly is.
 */
export function loadConfig(configPath?: string): CompileStatsConfig {
  const configFile = configPath || path.join(process.cwd(), DEFAULT_CONFIG_FILE)

  if (!fs.existsSync(configFile)) {
    if (configPath) {
      throw new ConfigError(`config file not found: ${configFile}`)
    }
    return { ...defaultConfig }
  }

  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(configFile, 'utf8'))
  } catch (error) {
    throw new ConfigError(`failed to parse config file ${configFile}: ${error instanceof Error ? error.message : String(error)}`)
  }

  return mergeConfig(defaultConfig, parseConfigFile(raw, configFile))
}

export function parseConfigFile(raw: unknown, source = 'config'): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigError(`invalid ${source}: ${issues.join('; ')}`)
  }
  return result.data
}

/**
 * Overlay the defined keys of `overrides` onto `base`.
 */
export function mergeConfig(base: CompileStatsConfig, overrides: ConfigFile): CompileStatsConfig {
  const result: CompileStatsConfig = { ...base, compilers: [...base.compilers] }
  if (overrides.buildDir !== undefined) result.buildDir = overrides.buildDir
  if (overrides.logFile !== undefined) result.logFile = overrides.logFile
  if (overrides.compilers !== undefined) result.compilers = [...overrides.compilers]
  if (overrides.compileFlag !== undefined) result.compileFlag = overrides.compileFlag
  if (overrides.format !== undefined) result.format = overrides.format
  if (overrides.progress !== undefined) result.progress = overrides.progress
  if (overrides.timings !== undefined) result.timings = overrides.timings
  return result
}

export function resolveLogFile(config: CompileStatsConfig): string {
  return config.logFile ?? path.join(config.buildDir, '.ninja_log')
}
