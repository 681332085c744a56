import test from 'ava'

import {Chunk, Op} from './chunk.js'
import {evaluate, errorReport, strategies} from './engine.js'
import {Scope} from './environment.js'
import {SourceLoc} from './error.js'
import {KiteVM} from './interpreter.js'
import {Realm} from './realm.js'
import {runBoth} from '../testutil.js'

const mixed = `function double(x) { return x * 2 }
function pick({v}) { return double(v) + 1 }
const results = [];
for (let i = 0; i < 3; i++) results.push(pick({v: i}));
results.join()`

test('Compiled and bridged functions call each other', (t) => {
  runBoth(t, mixed)
  const vm = evaluate(mixed, {strategy: 'vm'})
  t.is(vm.display, '1,3,5')
  t.deepEqual(vm.bridge, {bridgedCalls: 3, bridgedNames: ['pick']})
  const tree = evaluate(mixed, {strategy: 'tree'})
  t.deepEqual(tree.bridge, {bridgedCalls: 0, bridgedNames: []})
})

test('A bridged main program still calls compiled functions', (t) => {
  const source = 'function sq(x) { return x * x }\nconst [a, b] = [sq(2), sq(3)];\na + b'
  const result = runBoth(t, source)
  t.is(result.display, '13')
  t.deepEqual(evaluate(source).bridge, {bridgedCalls: 1, bridgedNames: ['<main>']})
})

test('Closures created by bridged code share variables with it', (t) => {
  const result = runBoth(t, `function make({start}) {
  let n = start
  return {inc: () => { n += 1 }, get: () => n}
}
const c = make({start: 10});
c.inc();
c.inc();
c.get()`)
  t.is(result.display, '12')
})

test('Unbounded recursion raises RangeError', (t) => {
  const source = 'function r() { return r() }\nr()'
  for (const strategy of strategies) {
    const {error} = evaluate(source, {strategy, maxCallDepth: 50})
    t.is(error?.kind, 'RangeError', strategy)
    t.is(error?.message, 'Maximum call stack size exceeded', strategy)
    t.is(error?.stack.length, 51, strategy)
    t.is(error?.stack[0].name, 'r', strategy)
    t.deepEqual(error?.stack[50], {name: '<main>', file: '<input>', line: 2, column: 1}, strategy)
  }
})

test('Recursion within the default depth succeeds', (t) => {
  const result = runBoth(t, 'function sum(n) { return n === 0 ? 0 : n + sum(n - 1) }\nsum(200)')
  t.is(result.display, '20100')
})

test('Runtime errors carry the position of the failing expression', (t) => {
  const {error} = runBoth(t, 'const o = null;\nfunction get() {\n  return o.x\n}\nget()', {fileName: 'get.js'})
  t.like(error, {kind: 'TypeError', file: 'get.js', line: 3, column: 10})
  t.deepEqual(error?.stack.map((entry) => entry.name), ['get', '<main>'])
})

test('A caught error resumes after the handler', (t) => {
  const result = runBoth(t, `const log = [];
function risky(n) {
  if (n % 2) throw new Error("odd " + n)
  return n
}
for (let i = 0; i < 4; i++) {
  try { log.push(risky(i)) } catch (e) { log.push(e.message) } finally { log.push("|") }
}
log.join(" ")`)
  t.is(result.display, '0 | odd 1 | 2 | odd 3 |')
})

test('Errors thrown from native callbacks unwind through compiled frames', (t) => {
  const result = runBoth(t, `let caught;
try {
  [1, 2, 3].forEach((x) => { if (x === 2) throw x * 10 })
} catch (e) {
  caught = e
}
caught`)
  t.is(result.display, '20')
})

function runChunk(build: (chunk: Chunk) => void) {
  const realm = new Realm({print: () => {}})
  const vm = new KiteVM(realm)
  realm.invokers = {compiled: vm}
  const chunk = new Chunk('<main>', 'bad.js', false)
  build(chunk)
  try {
    vm.runProgram(chunk, new Scope(realm.global))
    return undefined
  } catch (e) {
    return errorReport(e, realm)
  }
}

test('A malformed chunk raises a guest error', (t) => {
  const loc = new SourceLoc(1, 1)
  t.like(runChunk((chunk) => chunk.emit(loc, Op.POP)), {
    kind: 'RangeError', message: 'Operand stack underflow', file: 'bad.js',
  })
  t.like(runChunk((chunk) => chunk.emit(loc, Op.CONST, 99)), {
    kind: 'RangeError', message: 'Bad constant index 99',
  })
  const unknownOpcode = (chunk: Chunk) => {
    chunk.code.push(999)
    chunk.lines.push(1)
    chunk.columns.push(1)
  }
  t.like(runChunk(unknownOpcode), {
    kind: 'TypeError', message: 'Unknown opcode 999',
  })
  t.like(runChunk((chunk) => chunk.emit(loc, Op.NOP)), {
    kind: 'RangeError', message: 'Ran off the end of <main>',
  })
})
