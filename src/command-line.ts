import { CommandLineError } from './errors.js'

const SAFE_ARGUMENT = /^[A-Za-z0-9_@%+=:,./-]+$/

// Characters a backslash may escape inside double quotes.
const DOUBLE_QUOTE_ESCAPABLE = new Set(['"', '\\', '`', '$'])

/**
 * One word of a command line: its unquoted value and the text it was
 * written as. Shell operators such as `&&` keep working when a command is
 * rebuilt from the raw text.
 */
export interface CommandToken {
  value: string
  raw: string
}

/**
 * Split a logged command into words the way a POSIX shell would, without
 * expanding variables or globs.
 *
 * Quoting rules:
 * - whitespace separates words
 * - `'...'` keeps every character literally
 * - `"..."` keeps every character except `\"`, `\\`, `` \` `` and `\$`
 * - a backslash outside quotes escapes the next character
 */
export function tokenizeCommandLine(command: string): CommandToken[] {
  const tokens: CommandToken[] = []
  let current = ''
  let start = -1
  let quote: "'" | '"' | null = null

  for (let i = 0; i < command.length; i++) {
    const ch = command[i]

    if (quote === "'") {
      if (ch === "'") {
        quote = null
      } else {
        current += ch
      }
      continue
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null
      } else if (ch === '\\' && i + 1 < command.length && DOUBLE_QUOTE_ESCAPABLE.has(command[i + 1])) {
        current += command[++i]
      } else {
        current += ch
      }
      continue
    }

    if (ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r') {
      if (start !== -1) {
        tokens.push({ value: current, raw: command.slice(start, i) })
        current = ''
        start = -1
      }
      continue
    }

    if (start === -1) {
      start = i
    }
    if (ch === "'" || ch === '"') {
      quote = ch
    } else if (ch === '\\') {
      if (i + 1 >= command.length) {
        throw new CommandLineError(`trailing backslash in command: ${command}`)
      }
      current += command[++i]
    } else {
      current += ch
    }
  }

  if (quote) {
    throw new CommandLineError(`unterminated ${quote} quote in command: ${command}`)
  }
  if (start !== -1) {
    tokens.push({ value: current, raw: command.slice(start) })
  }
  return tokens
}

export function splitCommandLine(command: string): string[] {
  return tokenizeCommandLine(command).map(token => token.value)
}

export function quoteArgument(arg: string): string {
  if (arg === '') {
    return "''"
  }
  if (SAFE_ARGUMENT.test(arg)) {
    return arg
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`
}

/**
 * A token for a new argument, quoted so the shell reads it back as `value`.
 */
export function argumentToken(value: string): CommandToken {
  return { value, raw: quoteArgument(value) }
}

/**
 * Inverse of {@link splitCommandLine}: build a shell command string whose
 * words are exactly `argv`.
 */
export function joinCommandLine(argv: readonly string[]): string {
  return argv.map(quoteArgument).join(' ')
}

/**
 * Rebuild a command from tokens, each as it was originally written.
 */
export function renderCommandLine(tokens: readonly CommandToken[]): string {
  return tokens.map(token => token.raw).join(' ')
}
