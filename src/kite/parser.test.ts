import test from 'ava'

import {
  Binary, Call, ClassDecl, Exp, ExpStatement, FunctionExp, Identifier, Import, Member,
  ObjectLiteral, ObjectPattern, Property, Sequence, VarDecl,
} from './ast.js'
import {KiteParseError} from './error.js'
import {parse} from './parser.js'

function firstExp(source: string): Exp {
  const stmt = parse(source).body[0]
  if (!(stmt instanceof ExpStatement)) {
    throw new Error(`not an expression statement: ${source}`)
  }
  return stmt.exp
}

test('Operator precedence', (t) => {
  const sum = firstExp('1 + 2 * 3')
  t.true(sum instanceof Binary && sum.op === '+' && sum.right instanceof Binary && sum.right.op === '*')
  const power = firstExp('2 ** 3 ** 2')
  t.true(power instanceof Binary && power.op === '**' && power.right instanceof Binary)
  const comparison = firstExp('a < b === c')
  t.true(comparison instanceof Binary && comparison.op === '===' && comparison.left instanceof Binary)
})

test('Member and call chains', (t) => {
  const exp = firstExp('a.b(c)[d]')
  t.true(exp instanceof Member && exp.computed)
  if (exp instanceof Member) {
    t.true(exp.object instanceof Call)
    if (exp.object instanceof Call) {
      t.true(exp.object.callee instanceof Member)
      t.is(exp.object.args.length, 1)
    }
  }
})

test('Arrow functions take the name of their binding', (t) => {
  const [decl] = parse('const f = (x, y = 1) => x').body
  if (!(decl instanceof VarDecl)) {
    t.fail('expected a declaration')
    return
  }
  const fn = decl.declarations[0].init
  t.true(fn instanceof FunctionExp)
  if (fn instanceof FunctionExp) {
    t.is(fn.kind, 'arrow')
    t.is(fn.params.length, 2)
    t.is(fn.inferredName, 'f')
    t.true(fn.body instanceof Identifier)
  }
})

test('Destructuring declarations', (t) => {
  const [decl] = parse('let {a, b: [c], ...r} = o').body
  if (!(decl instanceof VarDecl)) {
    t.fail('expected a declaration')
    return
  }
  const pattern = decl.declarations[0].target
  t.true(pattern instanceof ObjectPattern)
  if (pattern instanceof ObjectPattern) {
    t.is(pattern.properties.length, 2)
    t.true(pattern.rest instanceof Identifier)
  }
})

test('Import declarations', (t) => {
  const [stmt] = parse('import d, {x as y, z} from "./m.js"').body
  t.true(stmt instanceof Import)
  if (stmt instanceof Import) {
    t.is(stmt.source, './m.js')
    t.is(stmt.defaultName, 'd')
    t.deepEqual(stmt.specifiers, [{imported: 'x', local: 'y'}, {imported: 'z', local: 'z'}])
  }
})

test('Class declarations', (t) => {
  const [stmt] = parse('class A extends B { constructor() { super() } m() {} static s() {} }').body
  t.true(stmt instanceof ClassDecl)
  if (stmt instanceof ClassDecl) {
    t.is(stmt.name, 'A')
    t.is(stmt.cls.ctor?.kind, 'constructor')
    t.deepEqual(stmt.cls.members.map((m) => m.isStatic), [false, true])
  }
})

test('Accessors in classes and object literals', (t) => {
  const [stmt] = parse('class A { get x() { return 1 } static set y(v) {} z() {} }').body
  t.true(stmt instanceof ClassDecl)
  if (stmt instanceof ClassDecl) {
    t.deepEqual(stmt.cls.members.map((m) => [m.kind, m.isStatic]), [['get', false], ['set', true], ['init', false]])
  }
  const obj = firstExp('({get: 1, get a() { return 2 }, set a(v) {}})')
  t.true(obj instanceof ObjectLiteral)
  if (obj instanceof ObjectLiteral) {
    t.deepEqual(obj.properties.map((p) => (p instanceof Property ? p.kind : 'spread')), ['init', 'get', 'set'])
  }
})

test('The comma operator', (t) => {
  const exp = firstExp('(a, b, c)')
  t.true(exp instanceof Sequence)
  if (exp instanceof Sequence) {
    t.deepEqual(exp.expressions.map((e) => (e instanceof Identifier ? e.name : '')), ['a', 'b', 'c'])
  }
})

test('Semicolons are inserted at line breaks', (t) => {
  t.is(parse('let a = 1\nlet b = 2\na + b').body.length, 3)
})

test('Syntax errors are reported with their position', (t) => {
  const cases: [string, string][] = [
    ['let = 1', "<input>:1:5: Expected binding name but found '='"],
    ['const x', '<input>:1:8: Missing initializer in const declaration'],
    ['let a = 1 let b', "<input>:1:11: Expected ';' but found 'let'"],
    ['return 1', '<input>:1:1: Illegal return statement'],
    ['break', '<input>:1:1: Illegal break statement'],
    ['if (x {', "<input>:1:7: Expected ')' but found '{'"],
    ['x = (1', "<input>:1:7: Expected ')' but found end of input"],
    ['let a = 1\nlet a = 2', "<input>:2:5: Identifier 'a' has already been declared"],
    ['function f() { import x from "y" }', "<input>:1:16: Cannot use import statement outside a module's top level"],
    ['function f() { await g() }', '<input>:1:16: await is only valid in async functions'],
  ]
  for (const [source, message] of cases) {
    t.throws(() => parse(source), {instanceOf: KiteParseError, message}, source)
  }
})

test('Parse errors name the file', (t) => {
  const error = t.throws(() => parse('1 +', {file: 'sum.js'}), {instanceOf: KiteParseError})
  t.is(error?.file, 'sum.js')
  t.is(error?.source?.toString(), '1:4')
})
