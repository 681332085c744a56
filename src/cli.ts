// Kite command-line front-end.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import path from 'path'

import {ArgumentParser, RawDescriptionHelpFormatter} from 'argparse'
import fs, {PathOrFileDescriptor} from 'fs-extra'

import programVersion from './version.js'
import {Node} from './kite/ast.js'
import {
  KiteOptions, KiteResult, Strategy, compile, disassemble, evaluate, formatReport, parse,
  strategies, tokenize,
} from './kite/engine.js'
import {debug} from './kite/util.js'

// Where the CLI writes; a test can capture it.
export interface CliOutput {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

const processOutput: CliOutput = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
}

class KiteUsageError extends Error {}

// Raise usage errors instead of exiting, so that `main` can return.
class KiteArgumentParser extends ArgumentParser {
  error(err: string | Error): never {
    throw new KiteUsageError(err instanceof Error ? err.message : err)
  }
}

interface Args {
  // Global arguments
  strategy: Strategy
  max_call_depth: number | undefined
  func: (args: Args, out: CliOutput) => number

  // Sub-command arguments
  source: string
  output: string | undefined
}

function makeParser() {
  const defaultStrategy = strategies.find((s) => s === process.env.KITE_STRATEGY) ?? 'vm'
  const parser = new KiteArgumentParser({
    prog: 'kite',
    description: 'Run a subset of JavaScript by tree walking or on a bytecode VM.',
    formatter_class: RawDescriptionHelpFormatter,
    epilog: `\`-' given as a file name means standard input.

If just one non-option argument is given, Kite treats it as a FILE to be \`run'.

The default strategy is taken from the environment variable KITE_STRATEGY.
Setting DEBUG prints internal traces.`,
  })
  parser.add_argument('--version', {
    action: 'version',
    version: `%(prog)s ${programVersion}`,
  })
  parser.add_argument('--strategy', {
    default: defaultStrategy, choices: [...strategies], help: `execution strategy [default: ${defaultStrategy}]`,
  })
  parser.add_argument('--max-call-depth', {
    type: 'int', metavar: 'N', help: 'maximum guest call depth [default: 250]',
  })

  const subparsers = parser.add_subparsers({description: 'action to take'})

  const runParser = subparsers.add_parser('run', {aliases: ['r'], description: 'Run a Kite program'})
  runParser.set_defaults({func: runCommand})
  runParser.add_argument('source', {metavar: 'FILE', help: 'program to run'})
  runParser.add_argument('--output', '-o', {metavar: 'FILE', help: 'JSON result file'})

  const evalParser = subparsers.add_parser('eval', {aliases: ['e'], description: 'Evaluate Kite code'})
  evalParser.set_defaults({func: evalCommand})
  evalParser.add_argument('source', {metavar: 'CODE', help: 'code to evaluate'})
  evalParser.add_argument('--output', '-o', {metavar: 'FILE', help: 'JSON result file'})

  const tokensParser = subparsers.add_parser('tokens', {description: 'List the tokens of a program'})
  tokensParser.set_defaults({func: tokensCommand})
  tokensParser.add_argument('source', {metavar: 'FILE', help: 'program to tokenize'})

  const astParser = subparsers.add_parser('ast', {description: 'Print the syntax tree of a program as JSON'})
  astParser.set_defaults({func: astCommand})
  astParser.add_argument('source', {metavar: 'FILE', help: 'program to parse'})

  const disasmParser = subparsers.add_parser('disasm', {description: 'Print the bytecode of a program'})
  disasmParser.set_defaults({func: disasmCommand})
  disasmParser.add_argument('source', {metavar: 'FILE', help: 'program to compile'})

  return parser
}

const commands = new Set(['run', 'r', 'eval', 'e', 'tokens', 'ast', 'disasm'])

// Global options given their value as a separate argument.
const optionsWithValues = new Set(['--strategy', '--max-call-depth'])

// Utility routines.

// Use standard input if requested
function getInputFile(args: Args): PathOrFileDescriptor {
  return args.source === '-' ? process.stdin.fd : args.source
}

function fileName(args: Args) {
  return args.source === '-' ? '(stdin)' : args.source
}

function readSourceFile(args: Args) {
  const source = fs.readFileSync(getInputFile(args), {encoding: 'utf-8'})
  if (source.startsWith('#!')) {
    return source.substring(source.indexOf('\n'))
  }
  return source
}

// A syntax tree as plain JSON, each node tagged with its type.
export function astToJson(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(astToJson)
  } else if (value instanceof Node) {
    const json: Record<string, unknown> = {type: value.constructor.name}
    for (const [key, field] of Object.entries(value)) {
      json[key] = key === 'loc' ? String(field) : astToJson(field)
    }
    return json
  } else if (value === undefined) {
    return null
  }
  return value
}

// Sub-command action routines.

function runCode(source: string, file: string, args: Args, out: CliOutput) {
  const options: KiteOptions = {
    strategy: args.strategy,
    fileName: file,
    maxCallDepth: args.max_call_depth,
    print: (line) => out.stdout(`${line}\n`),
    onDiagnostic: (diagnostic) => out.stderr(`${diagnostic.kind}: ${diagnostic.message}\n`),
  }
  const result: KiteResult = evaluate(source, options)
  if (process.env.DEBUG) {
    debug(result.bridge)
  }
  if (args.output !== undefined) {
    fs.outputJsonSync(args.output, {
      value: result.display,
      output: result.output,
      error: result.error,
      diagnostics: result.diagnostics,
      bridge: result.bridge,
    }, {spaces: 2})
  }
  if (result.error !== undefined) {
    out.stderr(`${formatReport(result.error)}\n`)
    return 1
  }
  return 0
}

function runCommand(args: Args, out: CliOutput) {
  return runCode(readSourceFile(args), fileName(args), args, out)
}

function evalCommand(args: Args, out: CliOutput) {
  return runCode(args.source, '(eval)', args, out)
}

function tokensCommand(args: Args, out: CliOutput) {
  for (const token of tokenize(readSourceFile(args), {fileName: fileName(args)})) {
    out.stdout(`${token.line}:${token.column} ${token.kind} ${JSON.stringify(token.lexeme)}\n`)
  }
  return 0
}

function astCommand(args: Args, out: CliOutput) {
  const program = parse(readSourceFile(args), {fileName: fileName(args)})
  out.stdout(`${JSON.stringify(astToJson(program), null, 2)}\n`)
  return 0
}

function disasmCommand(args: Args, out: CliOutput) {
  out.stdout(`${disassemble(compile(readSourceFile(args), {fileName: fileName(args)}))}\n`)
  return 0
}

// Execute given commands and options, returning the exit status.
export function main(argv: string[], out: CliOutput = processOutput): number {
  const argList = [...argv]
  // If the first argument is not a command or option, assume it's a file to run.
  let first = 0
  while (first < argList.length && argList[first].startsWith('-') && argList[first] !== '-') {
    first += optionsWithValues.has(argList[first]) ? 2 : 1
  }
  if (first < argList.length && !commands.has(argList[first])) {
    argList.splice(first, 0, 'run')
  }
  try {
    const args = makeParser().parse_args(argList) as Args
    if (args.func === undefined) {
      throw new KiteUsageError('no command given')
    }
    return args.func(args, out)
  } catch (error) {
    if (process.env.DEBUG) {
      out.stderr(`${error instanceof Error ? error.stack : String(error)}\n`)
    }
    const prog = path.basename(process.argv[1] ?? 'kite')
    out.stderr(`${prog}: ${error instanceof Error ? error.message : String(error)}\n`)
    return error instanceof KiteUsageError ? 2 : 1
  }
}
