// Kite test utilities.
// © Reuben Thomas 2023-2025
// Released under the GPL version 3, or (at your option) any later version.

import fs from 'fs-extra'
import tmp from 'tmp'
import test, {ExecutionContext, Macro} from 'ava'

import {CliOutput, main} from './cli.js'
import {KiteOptions, KiteResult, evaluate, formatReport, strategies} from './kite/engine.js'
import {debug} from './kite/util.js'

// Evaluate `source` with the tree walker and on the VM, check that the two
// agree, and return the tree walker's result.
export function runBoth(t: ExecutionContext, source: string, options: KiteOptions = {}): KiteResult {
  const tree = evaluate(source, {...options, strategy: 'tree'})
  const vm = evaluate(source, {...options, strategy: 'vm'})
  if (process.env.DEBUG) {
    debug({tree, vm})
  }
  t.deepEqual(vm.output, tree.output, 'output differs between strategies')
  t.is(vm.display, tree.display, 'result differs between strategies')
  t.deepEqual(vm.error, tree.error, 'error differs between strategies')
  t.deepEqual(vm.diagnostics, tree.diagnostics, 'diagnostics differ between strategies')
  return tree
}

export function errorLine(result: KiteResult) {
  return result.error === undefined ? undefined : formatReport(result.error).split('\n')[0]
}

// Each test is [source, display of the completion value].
export function testGroup(title: string, tests: [string, string][]) {
  test(title, (t) => {
    for (const [source, expected] of tests) {
      const result = runBoth(t, source)
      t.is(errorLine(result), undefined, source)
      t.is(result.display, expected, source)
    }
  })
}

// Each test is [source, printed lines joined by newlines].
export function testOutputGroup(title: string, tests: [string, string][]) {
  test(title, (t) => {
    for (const [source, expected] of tests) {
      const result = runBoth(t, source)
      t.is(errorLine(result), undefined, source)
      t.is(result.output.join('\n'), expected, source)
    }
  })
}

// Each test is [source, first line of the error report].
export function testErrorGroup(title: string, tests: [string, string][]) {
  test(title, (t) => {
    for (const [source, expected] of tests) {
      t.is(errorLine(runBoth(t, source)), expected, source)
    }
  })
}

// Run the CLI in-process, capturing what it writes.
export function runCli(args: string[]) {
  let stdout = ''
  let stderr = ''
  const out: CliOutput = {
    stdout: (text) => {
      stdout += text
    },
    stderr: (text) => {
      stderr += text
    },
  }
  const status = main(args, out)
  return {status, stdout, stderr}
}

function readIfExists(file: string) {
  return fs.existsSync(file) ? fs.readFileSync(file, {encoding: 'utf-8'}) : undefined
}

// Run `${inputBasename}.js` under each strategy, comparing its output with
// the `.stdout`, `.stderr` and `.result.json` files beside it. A missing
// `.stderr` file means no output to stderr and a successful exit.
const cliTest = test.macro((
  t: ExecutionContext,
  inputBasename: string,
  extraArgs?: string[],
) => {
  const expectedStdout = readIfExists(`${inputBasename}.stdout`)
  const expectedStderr = readIfExists(`${inputBasename}.stderr`)
  const expectedResult = readIfExists(`${inputBasename}.result.json`)
  for (const strategy of strategies) {
    const tempFile = tmp.fileSync()
    t.teardown(() => tempFile.removeCallback())
    const {status, stdout, stderr} = runCli([
      `--strategy=${strategy}`, ...extraArgs ?? [], 'run', `--output=${tempFile.name}`, `${inputBasename}.js`,
    ])
    if (expectedStdout !== undefined) {
      t.is(stdout, expectedStdout, strategy)
    }
    t.is(stderr, expectedStderr ?? '', strategy)
    t.is(status, expectedStderr?.match(/^[A-Za-z]+Error: |^UserThrow: /m) ? 1 : 0, strategy)
    if (expectedResult !== undefined) {
      const result: unknown = fs.readJsonSync(tempFile.name)
      t.like(result, JSON.parse(expectedResult), strategy)
    }
  }
})

function mkTester<Args extends unknown[]>(macro: Macro<Args, unknown>) {
  return (title: string, ...args: Args) => {
    test(title, macro, ...args)
  }
}

export const kiteTest = mkTester(cliTest)
