// Kite engine: the entry points for hosts.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {Program} from './ast.js'
import {BridgeStats, KiteBridge} from './bridge.js'
import {CompiledProgram, compileProgram, disassemble} from './compiler.js'
import {KiteObject, KiteVal} from './data.js'
import {display} from './display.js'
import {Scope} from './environment.js'
import {
  Diagnostic, KiteError, KiteErrorReport, KiteLexError, KiteLoadError, KiteParseError,
  KiteThrow,
} from './error.js'
import {TreeWalker, evaluateProgram} from './eval.js'
import {KiteVM} from './interpreter.js'
import {Token, tokenize as lex} from './lexer.js'
import {ModuleGraph, ModuleLoader, fileLoader} from './modules.js'
import {parse as parseSource} from './parser.js'
import {Realm} from './realm.js'

export {disassemble}
export type {CompiledProgram, Diagnostic, KiteErrorReport, ModuleLoader, Token}
export {formatReport} from './error.js'

export type Strategy = 'tree' | 'vm'

export const strategies: readonly Strategy[] = ['tree', 'vm']

export interface KiteOptions {
  strategy?: Strategy
  // Name used in positions and stack traces, and the base for relative
  // imports.
  fileName?: string
  maxCallDepth?: number
  maxTimerTicks?: number
  // Receives each line of output as it is printed.
  print?: (line: string) => void
  loader?: ModuleLoader
  onDiagnostic?: (diagnostic: Diagnostic) => void
}

export interface KiteResult {
  // Value of the last top-level expression statement.
  value: KiteVal
  display: string
  output: string[]
  error?: KiteErrorReport
  diagnostics: Diagnostic[]
  bridge: BridgeStats
}

const defaultFileName = '<input>'

export function tokenize(source: string, options: KiteOptions = {}): Token[] {
  return lex(source, {file: options.fileName ?? defaultFileName})
}

export function parse(source: string, options: KiteOptions = {}): Program {
  return parseSource(source, {file: options.fileName ?? defaultFileName, module: true})
}

export function compile(source: string, options: KiteOptions = {}): CompiledProgram {
  return compileProgram(parse(source, options))
}

function errorMessage(value: KiteVal): string {
  if (value instanceof KiteObject) {
    const message = value.getOwn('message')
    if (typeof message === 'string') {
      return message
    }
  }
  return display(value)
}

// Turn an error that ended an evaluation into a report.
export function errorReport(e: unknown, realm: Realm): KiteErrorReport {
  if (e instanceof KiteThrow) {
    const top = e.stackEntries[0]
    return {
      kind: e.kind,
      message: e.kind === 'UserThrow' ? display(e.value) : errorMessage(e.value),
      file: top?.file ?? realm.file,
      line: top?.line ?? 0,
      column: top?.column ?? 0,
      stack: e.stackEntries,
    }
  } else if (e instanceof KiteError) {
    let kind: KiteErrorReport['kind'] = 'InternalError'
    if (e instanceof KiteLexError) {
      kind = 'LexError'
    } else if (e instanceof KiteParseError) {
      kind = 'ParseError'
    } else if (e instanceof KiteLoadError) {
      kind = 'LoadError'
    }
    return {
      kind,
      message: e.rawMessage,
      file: e.file,
      line: e.source?.line ?? 0,
      column: e.source?.column ?? 0,
      stack: [],
    }
  }
  return {
    kind: 'InternalError',
    message: e instanceof Error ? e.message : String(e),
    file: realm.file,
    line: realm.line,
    column: realm.column,
    stack: [],
  }
}

// Wire up a realm with the evaluators for a strategy, returning a function
// that runs a program or module body.
function setUp(realm: Realm, strategy: Strategy) {
  const walker = new TreeWalker(realm)
  const bridge = new KiteBridge(realm)
  const vm = new KiteVM(realm)
  realm.invokers = {interpreted: walker, compiled: vm, bridged: bridge}
  const run = (program: Program, scope: Scope): KiteVal => {
    if (strategy === 'tree') {
      return evaluateProgram(realm, program, scope)
    }
    const compiled = compileProgram(program)
    for (const [node, body] of compiled.bodies) {
      realm.bodies.set(node, body)
    }
    if (compiled.main.kind === 'bridged') {
      return bridge.runProgram(program, scope, compiled.main.reason)
    }
    return vm.runProgram(compiled.main.chunk, scope)
  }
  return {run, bridge}
}

// Run a program to completion: its top-level code, then every microtask
// and timer it schedules.
export function evaluate(source: string, options: KiteOptions = {}): KiteResult {
  const output: string[] = []
  const realm = new Realm({
    maxCallDepth: options.maxCallDepth,
    maxTimerTicks: options.maxTimerTicks,
    print: (line) => {
      output.push(line)
      options.print?.(line)
    },
    onDiagnostic: options.onDiagnostic,
  })
  const {run, bridge} = setUp(realm, options.strategy ?? 'vm')
  const modules = new ModuleGraph(realm, options.loader ?? fileLoader, run)
  let value: KiteVal = undefined
  let error: KiteErrorReport | undefined
  try {
    const program = parse(source, options)
    const scope = new Scope(realm.global)
    modules.addMain(program, scope)
    value = run(program, scope)
    realm.scheduler.runUntilIdle()
  } catch (e) {
    error = errorReport(e, realm)
  }
  return {
    value,
    display: display(value),
    output,
    error,
    diagnostics: realm.diagnostics,
    bridge: bridge.stats,
  }
}
