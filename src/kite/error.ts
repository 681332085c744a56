// Kite errors.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import type {KiteVal} from './data.js'

export class SourceLoc {
  constructor(
    public line: number,
    public column: number,
  ) {}

  toString() {
    return `${this.line}:${this.column}`
  }
}

export class KiteError extends Error {
  constructor(
    public readonly rawMessage: string,
    public source?: SourceLoc,
    public file = '<input>',
    options: ErrorOptions = {},
  ) {
    super(`${source ? `${file}:${source}: ` : ''}${rawMessage}`, options)
  }
}

export class KiteLexError extends KiteError {}

export class KiteParseError extends KiteError {}

export type KiteLoadErrorKind = 'file-not-found' | 'parse-error'

export class KiteLoadError extends KiteError {
  constructor(
    public readonly kind: KiteLoadErrorKind,
    public readonly specifier: string,
    message: string,
    options: ErrorOptions = {},
  ) {
    super(message, undefined, undefined, options)
  }
}

// Raised when the engine's own invariants are broken (for example an
// operand stack underflow in a malformed Chunk).
export class KiteInternalError extends KiteError {}

export type ErrorKind =
  | 'LexError'
  | 'ParseError'
  | 'LoadError'
  | 'TypeError'
  | 'ReferenceError'
  | 'RangeError'
  | 'SyntaxError'
  | 'UserThrow'
  | 'InternalError'

export interface StackEntry {
  name: string
  file: string
  line: number
  column: number
}

export interface KiteErrorReport {
  kind: ErrorKind
  message: string
  file: string
  line: number
  column: number
  stack: StackEntry[]
}

export function formatReport(report: KiteErrorReport) {
  const lines = [`${report.kind}: ${report.message}`]
  for (const entry of report.stack) {
    lines.push(`    at ${entry.name} (${entry.file}:${entry.line}:${entry.column})`)
  }
  return lines.join('\n')
}

export type DiagnosticKind = 'UnhandledRejection' | 'CircularImport' | 'TimerLimit'

export interface Diagnostic {
  kind: DiagnosticKind
  message: string
}

// A guest value in flight from `throw` or a runtime error, carrying the
// call stack at the point it was raised.
export class KiteThrow extends Error {
  constructor(
    public readonly value: KiteVal,
    public readonly kind: ErrorKind,
    public readonly stackEntries: StackEntry[],
  ) {
    super('Uncaught guest exception')
  }
}
