import { describe, it, before, after } from 'node:test'
import assert from 'node:assert'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { defaultConfig, loadConfig, mergeConfig, parseConfigFile, resolveLogFile } from '../src/config.js'
import { ConfigError } from '../src/errors.js'

let dir: string

before(() => {
  dir = mkdtempSync(join(tmpdir(), 'compile-stats-config-'))
})

after(() => {
  rmSync(dir, { recursive: true, force: true })
})

function writeConfig(name: string, content: string): string {
  const file = join(dir, name)
  writeFileSync(file, content)
  return file
}

void describe('loadConfig', () => {
  it('merges the file over the defaults', () => {
    const file = writeConfig('ok.json', JSON.stringify({ buildDir: 'out/Debug', compilers: ['clang', 'gcc'], format: 'json' }))

    assert.deepStrictEqual(loadConfig(file), {
      ...defaultConfig,
      buildDir: 'out/Debug',
      compilers: ['clang', 'gcc'],
      format: 'json',
    })
  })

  it('fails when a named file does not exist', () => {
    const file = join(dir, 'missing.json')
    assert.throws(() => loadConfig(file), {
      name: 'ConfigError',
      message: `config file not found: ${file}`,
    })
  })

  it('fails on invalid JSON', () => {
    const file = writeConfig('broken.json', '{ "buildDir": ')
    assert.throws(
      () => loadConfig(file),
      (error: unknown) => error instanceof ConfigError && error.message.startsWith(`failed to parse config file ${file}: `),
    )
  })

  it('fails on values of the wrong shape', () => {
    const file = writeConfig('bad.json', JSON.stringify({ format: 'xml' }))
    assert.throws(
      () => loadConfig(file),
      (error: unknown) => error instanceof ConfigError && error.message.startsWith(`invalid ${file}: format: `),
    )
  })
})

void describe('parseConfigFile', () => {
  it('rejects unknown keys', () => {
    assert.throws(() => parseConfigFile({ buildDirectory: 'out' }), ConfigError)
  })

  it('rejects an empty compiler list', () => {
    assert.throws(() => parseConfigFile({ compilers: [] }), {
      message: 'invalid config: compilers: at least one compiler marker is required',
    })
  })
})

void describe('mergeConfig', () => {
  it('ignores undefined overrides', () => {
    const merged = mergeConfig(defaultConfig, { buildDir: undefined, progress: true })
    assert.strictEqual(merged.buildDir, 'out/Release')
    assert.strictEqual(merged.progress, true)
  })

  it('does not share the compiler list with the base', () => {
    const merged = mergeConfig(defaultConfig, {})
    merged.compilers.push('gcc')
    assert.deepStrictEqual(defaultConfig.compilers, ['clang'])
  })
})

void describe('resolveLogFile', () => {
  it('defaults to the ninja log in the build directory', () => {
    assert.strictEqual(resolveLogFile(defaultConfig), join('out/Release', '.ninja_log'))
  })

  it('prefers an explicit log file', () => {
    assert.strictEqual(resolveLogFile({ ...defaultConfig, logFile: 'logs/build.log' }), 'logs/build.log')
  })
})
