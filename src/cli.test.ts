import fs from 'fs-extra'
import tmp from 'tmp'
import test, {ExecutionContext} from 'ava'

import {kiteTest, runCli} from './testutil.js'

kiteTest('Hello, world!', 'test/hello')
kiteTest('Fibonacci', 'test/fib')
kiteTest('Classes', 'test/classes')
kiteTest('Destructuring', 'test/destructuring')
kiteTest('Scheduling order', 'test/scheduling')
kiteTest('Uncaught exception', 'test/uncaught')
kiteTest('Unhandled rejection', 'test/unhandled')
kiteTest('Syntax error', 'test/syntax-error')
kiteTest('Modules, timers and the clock', 'test/kitchen-sink')
kiteTest('Call depth option', 'test/fib', ['--max-call-depth', '20'])

function sourceFile(t: ExecutionContext, source: string) {
  const file = tmp.fileSync({postfix: '.js'})
  t.teardown(() => file.removeCallback())
  fs.writeFileSync(file.name, source)
  return file.name
}

test('A file name alone is run', (t) => {
  t.deepEqual(runCli(['test/hello.js']), {status: 0, stdout: 'Hello, world!\n', stderr: ''})
  t.deepEqual(runCli(['--strategy', 'tree', 'test/hello.js']), {status: 0, stdout: 'Hello, world!\n', stderr: ''})
})

test('eval runs code from the command line', (t) => {
  t.deepEqual(runCli(['eval', 'print(6 * 7)']), {status: 0, stdout: '42\n', stderr: ''})
  t.deepEqual(runCli(['--strategy=tree', 'e', 'null.x']), {
    status: 1,
    stdout: '',
    stderr: "TypeError: Cannot read properties of null (reading 'x')\n    at <main> ((eval):1:1)\n",
  })
})

test('--output writes the result as JSON', (t) => {
  const output = tmp.fileSync({postfix: '.json'})
  t.teardown(() => output.removeCallback())
  const {status} = runCli(['eval', '--output', output.name, 'print("hi"); [1, 2]'])
  t.is(status, 0)
  t.deepEqual(fs.readJsonSync(output.name), {
    value: '[ 1, 2 ]',
    output: ['hi'],
    diagnostics: [],
    bridge: {bridgedCalls: 0, bridgedNames: []},
  })
})

test('tokens lists each token with its position', (t) => {
  const file = sourceFile(t, 'let x = "a"')
  const {status, stdout} = runCli(['tokens', file])
  t.is(status, 0)
  t.is(stdout, [
    '1:1 keyword "let"',
    '1:5 identifier "x"',
    '1:7 punctuator "="',
    '1:9 string "\\"a\\""',
    '1:12 eof ""',
    '',
  ].join('\n'))
})

test('ast prints the syntax tree as JSON', (t) => {
  const file = sourceFile(t, 'f(1)')
  const {status, stdout} = runCli(['ast', file])
  t.is(status, 0)
  const json: unknown = JSON.parse(stdout)
  t.like(json, {
    type: 'Program',
    file,
    body: [{
      type: 'ExpStatement',
      exp: {
        type: 'Call',
        loc: '1:1',
        callee: {type: 'Identifier', name: 'f'},
        args: [{type: 'Literal', value: 1, loc: '1:3'}],
      },
    }],
  })
})

test('disasm prints the bytecode', (t) => {
  const file = sourceFile(t, 'print(1 + 2)')
  const {status, stdout} = runCli(['disasm', file])
  t.is(status, 0)
  t.true(stdout.startsWith("== <main> ==\n0000     1:1 GET_NAME 0 ('print')\n"))
  t.true(stdout.endsWith('0001 3\n'))
})

test('Errors in the command line are usage errors', (t) => {
  const bad = runCli(['--strategy=fast', 'eval', '1'])
  t.is(bad.status, 2)
  t.true(bad.stderr.includes('invalid choice'))
  t.is(runCli([]).status, 2)
})

test('A missing file is an error', (t) => {
  const {status, stderr} = runCli(['run', 'test/no-such-file.js'])
  t.is(status, 1)
  t.true(stderr.includes('ENOENT'))
})
