#!/usr/bin/env node

import { createProgram } from './program.js'

try {
  await createProgram().parseAsync()
} catch (error) {
  console.error(`compile-stats: ${error instanceof Error ? error.message : String(error)}`)
  process.exitCode = 1
}
