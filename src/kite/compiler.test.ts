import test from 'ava'

import {Chunk, Op, eliminateDeadCode} from './chunk.js'
import {compile, disassemble} from './engine.js'
import {SourceLoc} from './error.js'

// Drop the offset and source position columns of a listing.
function ops(listing: string) {
  return listing.split('\n').map((line) => line.replace(/^\d{4} +(\d+:\d+|\|) /, ''))
}

test('Disassemble a simple program', (t) => {
  const [main, ...rest] = disassemble(compile('print(1 + 2)')).split('\n\n')
  t.deepEqual(rest, [])
  t.deepEqual(ops(main), [
    '== <main> ==',
    "GET_NAME 0 ('print')",
    'UNDEFINED',
    'CONST 1 (3)',
    "CALL 1 'print'",
    'SET_COMPLETION',
    'GET_COMPLETION',
    'RETURN',
    '-- constants --',
    "0000 'print'",
    '0001 3',
  ])
})

test('Positions are shown once per source location', (t) => {
  const lines = disassemble(compile('print(1 + 2)')).split('\n')
  t.is(lines[1], '0000     1:1 GET_NAME 0 (\'print\')')
  t.is(lines[2], '0002       | UNDEFINED')
})

test('Functions without closures keep locals in slots', (t) => {
  const listing = disassemble(compile('function fib(n) { if (n <= 1) return n; return fib(n - 1) + fib(n - 2) }'))
  const sections = listing.split('\n\n')
  t.is(sections.length, 2)
  t.true(sections[1].startsWith('== fib ==\n'))
  t.true(ops(sections[1]).includes('GET_LOCAL 0 (n)'))
  t.false(ops(sections[1]).includes("GET_NAME 0 ('n')"))
})

test('Functions are bridged when the compiler cannot handle them', (t) => {
  const sections = disassemble(compile('async function a() {}\nfunction d({x}) { return x }\nfunction e() { return 1 }')).split('\n\n')
  t.is(sections[1], '== a (bridged: async function) ==')
  t.is(sections[2], '== d (bridged: destructuring) ==')
  t.true(sections[3].startsWith('== e ==\n'))
})

test('Bridging reasons', (t) => {
  const reason = (source: string) => disassemble(compile(source)).split('\n')[0]
  t.is(reason('const {x} = {x: 1}'), '== <main> (bridged: destructuring) ==')
  t.is(reason('const k = "a"; class C { [k]() {} }'), '== <main> (bridged: computed class member name) ==')
  t.true(
    disassemble(compile('class A { m() { return 1 } } class B extends A { m() { return super.m() } }'))
      .includes('(bridged: super) =='),
  )
})

test('Primitive constants are shared', (t) => {
  const chunk = new Chunk('test', '<input>', false)
  t.is(chunk.addConstant('a'), 0)
  t.is(chunk.addConstant(1), 1)
  t.is(chunk.addConstant('a'), 0)
  t.is(chunk.addConstant(-0), 2)
  t.is(chunk.addConstant(0), 3)
  t.is(chunk.addConstant(NaN), 4)
  t.is(chunk.addConstant(NaN), 4)
})

test('Unreachable code is replaced by NOPs', (t) => {
  const loc = new SourceLoc(1, 1)
  const chunk = new Chunk('test', '<input>', false)
  const jump = chunk.emit(loc, Op.JUMP, 0)
  chunk.emit(loc, Op.POP)
  chunk.patch(jump, chunk.emit(loc, Op.UNDEFINED))
  chunk.emit(loc, Op.RETURN)
  chunk.emit(loc, Op.POP)
  eliminateDeadCode(chunk)
  t.deepEqual(chunk.code, [Op.JUMP, 3, Op.NOP, Op.UNDEFINED, Op.RETURN, Op.NOP])
})
