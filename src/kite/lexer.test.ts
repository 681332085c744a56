import test from 'ava'

import {KiteLexError} from './error.js'
import {tokenize} from './lexer.js'

test('Tokens carry kind, lexeme and position', (t) => {
  const tokens = tokenize('let x = 1.5')
  t.deepEqual(
    tokens.map((tok) => [tok.kind, tok.lexeme, tok.line, tok.column]),
    [
      ['keyword', 'let', 1, 1],
      ['identifier', 'x', 1, 5],
      ['punctuator', '=', 1, 7],
      ['number', '1.5', 1, 9],
      ['eof', '', 1, 12],
    ],
  )
  const num = tokens[3]
  t.is(num.kind === 'number' ? num.value : undefined, 1.5)
})

test('Line breaks are recorded on the following token', (t) => {
  const [a, b, eof] = tokenize('a // comment\n  b')
  t.false(a.newlineBefore)
  t.true(b.newlineBefore)
  t.is(b.line, 2)
  t.is(b.column, 3)
  t.is(eof.kind, 'eof')
  t.false(eof.newlineBefore)
})

test('Block comments spanning lines count as line breaks', (t) => {
  const tokens = tokenize('a /* one\ntwo */ b')
  t.true(tokens[1].newlineBefore)
  t.false(tokenize('a /* one */ b')[1].newlineBefore)
})

test('Longest punctuator wins', (t) => {
  t.deepEqual(
    tokenize('a===b!==c**=d...e=>f??g').filter((tok) => tok.kind === 'punctuator').map((tok) => tok.lexeme),
    ['===', '!==', '**=', '...', '=>', '??'],
  )
})

test('Contextual words are identifiers', (t) => {
  t.deepEqual(
    tokenize('async of from as await').map((tok) => tok.kind),
    ['identifier', 'identifier', 'identifier', 'identifier', 'keyword', 'eof'],
  )
})

test('Numbers', (t) => {
  const values = tokenize('0x1F 42 .5 1e3 2.5E-1').flatMap((tok) => (tok.kind === 'number' ? [tok.value] : []))
  t.deepEqual(values, [31, 42, 0.5, 1000, 0.25])
})

test('String escapes are cooked', (t) => {
  const tokens = tokenize(String.raw`'a\n' "it's" '\x41B\u{43}' 'q\'q'`)
  t.deepEqual(
    tokens.flatMap((tok) => (tok.kind === 'string' ? [tok.value] : [])),
    ['a\n', "it's", 'ABC', "q'q"],
  )
  t.is(tokens[0].lexeme, String.raw`'a\n'`)
})

test('Template literals split into quasis and substitutions', (t) => {
  const [tok] = tokenize('`x${y}z${ {a: 1}.a }`')
  if (tok.kind !== 'template') {
    t.fail(`expected a template, got ${tok.kind}`)
    return
  }
  t.deepEqual(tok.quasis, ['x', 'z', ''])
  t.deepEqual(tok.substitutions.map((s) => s.source), ['y', ' {a: 1}.a '])
  t.deepEqual(tok.substitutions[0], {source: 'y', line: 1, column: 5, offset: 4})
})

test('Embedded source is positioned from its base', (t) => {
  const [tok] = tokenize('b', {line: 3, column: 7, offset: 20})
  t.is(tok.line, 3)
  t.is(tok.column, 7)
  t.is(tok.offset, 20)
})

test('Lexical errors are reported with their position', (t) => {
  t.throws(() => tokenize("'abc"), {instanceOf: KiteLexError, message: '<input>:1:1: Unterminated string literal'})
  t.throws(() => tokenize('let a = #'), {instanceOf: KiteLexError, message: "<input>:1:9: Invalid or unexpected token '#'"})
  t.throws(() => tokenize('x\n  @', {file: 'at.js'}), {instanceOf: KiteLexError, message: "at.js:2:3: Invalid or unexpected token '@'"})
  t.throws(() => tokenize('1 /* open'), {instanceOf: KiteLexError, message: '<input>:1:3: Unterminated comment'})
  t.throws(() => tokenize('`abc'), {instanceOf: KiteLexError, message: '<input>:1:1: Unterminated template literal'})
})

test('A lexical error keeps its raw message and location', (t) => {
  const error = t.throws(() => tokenize('ok\n\n   ~'), {instanceOf: KiteLexError})
  t.is(error?.rawMessage, "Invalid or unexpected token '~'")
  t.is(error?.source?.line, 3)
  t.is(error?.source?.column, 4)
})
