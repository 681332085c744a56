// Kite tree-walk evaluator.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {
  ArrayLiteral, ArrayPattern, Assign, Await, Binary, Block, Break, Call,
  ClassDecl, ClassExp, Conditional, Continue, DoWhile, Empty, Exp, ExportDecl,
  ExportDefault, ExportNames, ExpStatement, For, ForIn, ForOf, FunctionDecl,
  FunctionExp, Identifier, If, Import, Literal, Logical, Member, New,
  ObjectLiteral, ObjectPattern, Pattern, PatternElement, Program, Property,
  Return, Sequence, Spread, Statement, SuperCall, SuperProperty, Switch, TemplateLiteral,
  ThisExp, Throw, Try, Unary, Update, VarDecl, While, boundNames, defaultExportName,
  expName, importedNames, varDeclaredNames,
} from './ast.js'
import {KiteClosure, KiteObject, KiteVal, isObject} from './data.js'
import {inspect} from './display.js'
import {Binding, BindingKind, FunctionInfo, Scope} from './environment.js'
import {KiteInternalError, KiteThrow, SourceLoc} from './error.js'
import {binaryOp, toNumber, toPropertyKey, toStr, truthy, typeOf} from './operators.js'
import {runAsync} from './promise.js'
import type {CallEntry, ClassMethod, Invoker, Realm} from './realm.js'

// Evaluation suspends by yielding the value being awaited, and is resumed
// with its settled value.
export type Eval<T> = Generator<KiteVal, T, KiteVal>

class KiteNonLocalExit extends Error {}

export class KiteBreakSignal extends KiteNonLocalExit {}

export class KiteContinueSignal extends KiteNonLocalExit {}

export class KiteReturnSignal extends KiteNonLocalExit {
  constructor(public readonly value: KiteVal) {
    super()
  }
}

export class EvalState {
  // Value of the last expression statement run at top level.
  completion: KiteVal = undefined

  constructor(
    public readonly realm: Realm,
    public scope: Scope,
    public readonly file: string,
    public readonly isProgram = false,
  ) {}
}

// Run an evaluation that cannot suspend.
export function drive<T>(gen: Eval<T>): T {
  const result = gen.next()
  if (!result.done) {
    throw new KiteInternalError('await outside an async function')
  }
  return result.value
}

// Names and bindings.

function lookup(state: EvalState, name: string, loc: SourceLoc): Binding {
  const binding = state.scope.lookup(name)
  if (binding === undefined) {
    state.realm.at(loc)
    return state.realm.throwError('ReferenceError', `${name} is not defined`)
  } else if (!binding.initialized) {
    state.realm.at(loc)
    return state.realm.throwError('ReferenceError', `Cannot access '${name}' before initialization`)
  }
  return binding
}

function assignName(state: EvalState, name: string, value: KiteVal, loc: SourceLoc) {
  const binding = lookup(state, name, loc)
  if (binding.isConst) {
    state.realm.at(loc)
    state.realm.throwError('TypeError', 'Assignment to constant variable.')
  }
  binding.value = value
}

// Hoisting.

// Declare the block-scoped names of a statement list: functions are
// created at once, classes and let/const start uninitialized.
export function declareLexical(state: EvalState, statements: Statement[], scope: Scope) {
  for (const stmt of statements) {
    let decl: Statement = stmt
    if (stmt instanceof ExportDecl) {
      decl = stmt.declaration
    } else if (stmt instanceof ExportDefault && !(stmt.value instanceof Exp)) {
      decl = stmt.value
    }
    if (decl instanceof FunctionDecl) {
      scope.declare(decl.name, 'function', state.realm.makeClosure(decl.fn, scope, state.file))
    } else if (decl instanceof ClassDecl) {
      scope.declare(decl.name, 'class', undefined, false)
    } else if (decl instanceof VarDecl && decl.kind !== 'var') {
      for (const name of decl.declarations.flatMap((d) => boundNames(d.target))) {
        scope.declare(name, decl.kind, undefined, false)
      }
    } else if (decl instanceof Import) {
      for (const name of importedNames(decl)) {
        scope.declare(name, 'import', undefined, false)
      }
    } else if (decl instanceof ExportDefault) {
      scope.declare(defaultExportName, 'const', undefined, false)
    }
  }
}

export function hoistDeclarations(state: EvalState, statements: Statement[]) {
  for (const name of varDeclaredNames(statements)) {
    state.scope.declare(name, 'var')
  }
  declareLexical(state, statements, state.scope)
}

// Run `f` in a new child scope.
function* withScope<T>(state: EvalState, f: (scope: Scope) => Eval<T>, scope = new Scope(state.scope)): Eval<T> {
  const outer = state.scope
  state.scope = scope
  try {
    return yield* f(scope)
  } finally {
    state.scope = outer
  }
}

// Patterns.

function* propertyKey(state: EvalState, key: Exp, computed: boolean): Eval<string> {
  if (!computed && key instanceof Literal) {
    return String(key.value)
  }
  const value = yield* evalExp(state, key)
  state.realm.at(key.loc)
  return toPropertyKey(state.realm, value)
}

// Bind `pattern` to `value`: a declaration of the given kind, or an
// assignment when kind is undefined.
export function* bindPattern(
  state: EvalState,
  pattern: Pattern,
  value: KiteVal,
  kind: BindingKind | undefined,
): Eval<void> {
  const realm = state.realm
  if (pattern instanceof Identifier) {
    if (kind === undefined) {
      assignName(state, pattern.name, value, pattern.loc)
    } else {
      state.scope.initialize(pattern.name, value, kind)
    }
  } else if (pattern instanceof Member) {
    const obj = yield* evalExp(state, pattern.object)
    const key = yield* propertyKey(state, pattern.property, pattern.computed)
    realm.at(pattern.loc)
    realm.setProperty(obj, key, value)
  } else if (pattern instanceof ObjectPattern) {
    if (value === undefined || value === null) {
      realm.at(pattern.loc)
      realm.throwError('TypeError', `Cannot destructure '${inspect(value)}' as it is ${String(value)}.`)
    }
    const used = new Set<string>()
    for (const prop of pattern.properties) {
      const key = yield* propertyKey(state, prop.key, prop.computed)
      used.add(key)
      realm.at(prop.loc)
      yield* bindElement(state, prop.value, realm.getProperty(value, key), kind)
    }
    if (pattern.rest !== undefined) {
      const rest = realm.newObject()
      if (isObject(value)) {
        for (const key of value.ownKeys()) {
          if (!used.has(key)) {
            rest.setOwn(key, realm.getProperty(value, key))
          }
        }
      }
      yield* bindPattern(state, pattern.rest, rest, kind)
    }
  } else if (pattern instanceof ArrayPattern) {
    realm.at(pattern.loc)
    const iterator = realm.iterate(value)
    const next = () => {
      const result = iterator.next()
      return result.done ? undefined : result.value
    }
    for (const element of pattern.elements) {
      const item = next()
      if (element !== null) {
        yield* bindElement(state, element, item, kind)
      }
    }
    if (pattern.rest !== undefined) {
      const rest: KiteVal[] = []
      for (let r = iterator.next(); !r.done; r = iterator.next()) {
        rest.push(r.value)
      }
      yield* bindPattern(state, pattern.rest, realm.newArray(rest), kind)
    }
  }
}

function* bindElement(state: EvalState, element: PatternElement, value: KiteVal, kind: BindingKind | undefined): Eval<void> {
  let v = value
  if (v === undefined && element.init !== undefined) {
    v = yield* evalExp(state, element.init)
  }
  yield* bindPattern(state, element.target, v, kind)
}

// Functions and classes.

function* bindParams(state: EvalState, node: FunctionExp, args: KiteVal[]): Eval<void> {
  for (let i = 0; i < node.params.length; i += 1) {
    yield* bindElement(state, node.params[i], args[i], 'param')
  }
  if (node.restParam !== undefined) {
    yield* bindPattern(state, node.restParam, state.realm.newArray(args.slice(node.params.length)), 'param')
  }
}

function* functionBody(state: EvalState, node: FunctionExp, args: KiteVal[]): Eval<KiteVal> {
  yield* bindParams(state, node, args)
  if (!(node.body instanceof Block)) {
    return yield* evalExp(state, node.body)
  }
  hoistDeclarations(state, node.body.body)
  try {
    yield* execStatements(state, node.body.body)
  } catch (e) {
    if (e instanceof KiteReturnSignal) {
      return e.value
    }
    throw e
  }
  return undefined
}

// Runs interpreted closures; the Bridge also runs bridged ones through it.
export class TreeWalker implements Invoker {
  constructor(public readonly realm: Realm) {}

  invoke(
    closure: KiteClosure,
    thisBinding: Binding,
    args: KiteVal[],
    newTarget: KiteObject | undefined,
    entry: CallEntry,
  ): KiteVal {
    const info = closure.isArrow ? undefined : new FunctionInfo(thisBinding, closure, newTarget)
    const state = new EvalState(this.realm, new Scope(closure.scope, info), closure.file)
    const body = functionBody(state, closure.node, args)
    if (closure.node.isAsync) {
      return runAsync(this.realm, body, entry)
    }
    return drive(body)
  }
}

function* evalClass(state: EvalState, node: ClassExp): Eval<KiteVal> {
  const realm = state.realm
  return yield* withScope(state, function* evalClassBody(classScope) {
    if (node.name !== undefined) {
      classScope.declare(node.name, 'const', undefined, false)
    }
    const superClass = node.superClass === undefined ? undefined : yield* evalExp(state, node.superClass)
    realm.at(node.loc)
    const parent = realm.classParent(node.superClass !== undefined, superClass)
    const ctor = node.ctor === undefined ? undefined : realm.makeClosure(node.ctor, classScope, state.file)
    const methods: ClassMethod[] = []
    for (const member of node.members) {
      const key = yield* propertyKey(state, member.key, member.computed)
      const fn = realm.makeClosure(member.value, classScope, state.file)
      if (fn.name === '') {
        fn.name = key
      }
      methods.push({key, isStatic: member.isStatic, kind: member.kind, fn})
    }
    realm.at(node.loc)
    const cls = realm.defineClass(node, parent, ctor, methods)
    if (node.name !== undefined) {
      classScope.initialize(node.name, cls, 'const')
    }
    return cls
  })
}

// Expressions.

function* evalArgs(state: EvalState, args: Exp[]): Eval<KiteVal[]> {
  const values: KiteVal[] = []
  for (const arg of args) {
    if (arg instanceof Spread) {
      const iterable = yield* evalExp(state, arg.argument)
      state.realm.at(arg.loc)
      const iterator = state.realm.iterate(iterable, expName(arg.argument))
      for (let r = iterator.next(); !r.done; r = iterator.next()) {
        values.push(r.value)
      }
    } else {
      values.push(yield* evalExp(state, arg))
    }
  }
  return values
}

function* evalObjectLiteral(state: EvalState, exp: ObjectLiteral): Eval<KiteVal> {
  const realm = state.realm
  const obj = realm.newObject()
  for (const prop of exp.properties) {
    if (prop instanceof Property) {
      const key = yield* propertyKey(state, prop.key, prop.computed)
      if (prop.value instanceof FunctionExp && prop.value.kind === 'method') {
        const method = realm.makeClosure(prop.value, state.scope, state.file)
        method.homeObject = obj
        if (method.name === '') {
          method.name = key
        }
        if (prop.kind === 'init') {
          obj.setOwn(key, method)
        } else {
          obj.defineAccessor(key, prop.kind, method)
        }
      } else {
        obj.setOwn(key, yield* evalExp(state, prop.value))
      }
    } else {
      const source = yield* evalExp(state, prop.argument)
      if (typeof source === 'string') {
        [...source].forEach((c, i) => obj.setOwn(String(i), c))
      } else if (isObject(source)) {
        for (const key of source.ownKeys()) {
          obj.setOwn(key, realm.getProperty(source, key))
        }
      }
    }
  }
  return obj
}

function* evalUnary(state: EvalState, exp: Unary): Eval<KiteVal> {
  const realm = state.realm
  if (exp.op === 'typeof' && exp.argument instanceof Identifier && state.scope.lookup(exp.argument.name) === undefined) {
    return 'undefined'
  } else if (exp.op === 'delete' && exp.argument instanceof Member) {
    const obj = yield* evalExp(state, exp.argument.object)
    const key = yield* propertyKey(state, exp.argument.property, exp.argument.computed)
    realm.at(exp.loc)
    return realm.deleteProperty(obj, key)
  }
  const value = yield* evalExp(state, exp.argument)
  realm.at(exp.loc)
  switch (exp.op) {
    case '!':
      return !truthy(value)
    case '-':
      return -toNumber(realm, value)
    case '+':
      return toNumber(realm, value)
    case 'typeof':
      return typeOf(value)
    case 'void':
      return undefined
    default:
      return true
  }
}

// Evaluate the object and key of a member expression.
function* memberReference(state: EvalState, exp: Member): Eval<[KiteVal, string]> {
  const obj = yield* evalExp(state, exp.object)
  const key = yield* propertyKey(state, exp.property, exp.computed)
  return [obj, key]
}

function* evalUpdate(state: EvalState, exp: Update): Eval<KiteVal> {
  const realm = state.realm
  const delta = exp.op === '++' ? 1 : -1
  if (exp.target instanceof Identifier) {
    const old = toNumber(realm, lookup(state, exp.target.name, exp.loc).value)
    assignName(state, exp.target.name, old + delta, exp.loc)
    return exp.prefix ? old + delta : old
  }
  const [obj, key] = yield* memberReference(state, exp.target)
  realm.at(exp.loc)
  const old = toNumber(realm, realm.getProperty(obj, key))
  realm.setProperty(obj, key, old + delta)
  return exp.prefix ? old + delta : old
}

function* evalAssign(state: EvalState, exp: Assign): Eval<KiteVal> {
  const realm = state.realm
  const target = exp.target
  if (target instanceof Identifier) {
    if (exp.op === '=') {
      const value = yield* evalExp(state, exp.value)
      assignName(state, target.name, value, exp.loc)
      return value
    }
    const old = lookup(state, target.name, exp.loc).value
    const right = yield* evalExp(state, exp.value)
    realm.at(exp.loc)
    const value = binaryOp(realm, compoundOp(exp.op), old, right)
    assignName(state, target.name, value, exp.loc)
    return value
  } else if (target instanceof Member) {
    const [obj, key] = yield* memberReference(state, target)
    let value: KiteVal
    if (exp.op === '=') {
      value = yield* evalExp(state, exp.value)
    } else {
      realm.at(exp.loc)
      const old = realm.getProperty(obj, key)
      const right = yield* evalExp(state, exp.value)
      realm.at(exp.loc)
      value = binaryOp(realm, compoundOp(exp.op), old, right)
    }
    realm.at(exp.loc)
    realm.setProperty(obj, key, value)
    return value
  }
  const value = yield* evalExp(state, exp.value)
  yield* bindPattern(state, target, value, undefined)
  return value
}

export function compoundOp(op: Assign['op']) {
  switch (op) {
    case '+=': return '+'
    case '-=': return '-'
    case '*=': return '*'
    case '/=': return '/'
    case '%=': return '%'
    default: return '**'
  }
}

function* evalCall(state: EvalState, exp: Call): Eval<KiteVal> {
  const realm = state.realm
  const callee = exp.callee
  let fn: KiteVal
  let thisVal: KiteVal
  if (callee instanceof Member) {
    const [obj, key] = yield* memberReference(state, callee)
    realm.at(callee.loc)
    fn = realm.getProperty(obj, key)
    thisVal = obj
  } else if (callee instanceof SuperProperty) {
    const key = yield* propertyKey(state, callee.property, callee.computed)
    const info = state.scope.functionInfo()
    realm.at(callee.loc)
    fn = realm.superProperty(info, key)
    thisVal = realm.thisValue(info?.thisBinding)
  } else {
    fn = yield* evalExp(state, callee)
    thisVal = undefined
  }
  const args = yield* evalArgs(state, exp.args)
  realm.at(exp.loc)
  return realm.call(fn, thisVal, args, expName(callee))
}

export function* evalExp(state: EvalState, exp: Exp): Eval<KiteVal> {
  const realm = state.realm
  if (exp instanceof Literal) {
    return exp.value
  } else if (exp instanceof Identifier) {
    return lookup(state, exp.name, exp.loc).value
  } else if (exp instanceof TemplateLiteral) {
    let s = exp.quasis[0]
    for (let i = 0; i < exp.exps.length; i += 1) {
      const value = yield* evalExp(state, exp.exps[i])
      realm.at(exp.loc)
      s += toStr(realm, value) + exp.quasis[i + 1]
    }
    return s
  } else if (exp instanceof ThisExp) {
    realm.at(exp.loc)
    return realm.thisValue(state.scope.functionInfo()?.thisBinding)
  } else if (exp instanceof SuperCall) {
    const args = yield* evalArgs(state, exp.args)
    realm.at(exp.loc)
    return realm.superCall(state.scope.functionInfo(), args)
  } else if (exp instanceof SuperProperty) {
    const key = yield* propertyKey(state, exp.property, exp.computed)
    realm.at(exp.loc)
    return realm.superProperty(state.scope.functionInfo(), key)
  } else if (exp instanceof ArrayLiteral) {
    const elements: KiteVal[] = []
    for (const element of exp.elements) {
      if (element === null) {
        elements.push(undefined)
      } else {
        elements.push(...yield* evalArgs(state, [element]))
      }
    }
    return realm.newArray(elements)
  } else if (exp instanceof ObjectLiteral) {
    return yield* evalObjectLiteral(state, exp)
  } else if (exp instanceof FunctionExp) {
    return realm.makeClosure(exp, state.scope, state.file, true)
  } else if (exp instanceof ClassExp) {
    return yield* evalClass(state, exp)
  } else if (exp instanceof Unary) {
    return yield* evalUnary(state, exp)
  } else if (exp instanceof Update) {
    return yield* evalUpdate(state, exp)
  } else if (exp instanceof Binary) {
    const left = yield* evalExp(state, exp.left)
    const right = yield* evalExp(state, exp.right)
    realm.at(exp.loc)
    return binaryOp(realm, exp.op, left, right)
  } else if (exp instanceof Logical) {
    const left = yield* evalExp(state, exp.left)
    if (exp.op === '&&' ? !truthy(left) : exp.op === '||' ? truthy(left) : left !== undefined && left !== null) {
      return left
    }
    return yield* evalExp(state, exp.right)
  } else if (exp instanceof Conditional) {
    const test = yield* evalExp(state, exp.test)
    return yield* evalExp(state, truthy(test) ? exp.consequent : exp.alternate)
  } else if (exp instanceof Sequence) {
    let value: KiteVal
    for (const e of exp.expressions) {
      value = yield* evalExp(state, e)
    }
    return value
  } else if (exp instanceof Assign) {
    return yield* evalAssign(state, exp)
  } else if (exp instanceof Member) {
    const [obj, key] = yield* memberReference(state, exp)
    realm.at(exp.loc)
    return realm.getProperty(obj, key)
  } else if (exp instanceof Call) {
    return yield* evalCall(state, exp)
  } else if (exp instanceof New) {
    const fn = yield* evalExp(state, exp.callee)
    const args = yield* evalArgs(state, exp.args)
    realm.at(exp.loc)
    return realm.construct(fn, args, undefined, expName(exp.callee))
  } else if (exp instanceof Await) {
    const value = yield* evalExp(state, exp.argument)
    realm.at(exp.loc)
    const result = yield value
    return result
  } else if (exp instanceof Spread) {
    throw new KiteInternalError('Spread outside an argument list')
  }
  throw new KiteInternalError(`Unknown expression ${exp.constructor.name}`)
}

// Statements.

// Run a loop body; returns true if the loop should stop.
function* loopBody(state: EvalState, body: Statement): Eval<boolean> {
  try {
    yield* execStatement(state, body)
  } catch (e) {
    if (e instanceof KiteBreakSignal) {
      return true
    } else if (!(e instanceof KiteContinueSignal)) {
      throw e
    }
  }
  return false
}

function* execVarDecl(state: EvalState, decl: VarDecl): Eval<void> {
  for (const d of decl.declarations) {
    if (d.init !== undefined) {
      const value = yield* evalExp(state, d.init)
      yield* bindPattern(state, d.target, value, decl.kind)
    } else if (decl.kind !== 'var') {
      yield* bindPattern(state, d.target, undefined, decl.kind)
    }
  }
}

function* execFor(state: EvalState, stmt: For): Eval<void> {
  yield* withScope(state, function* forLoop(scope) {
    const perIteration = stmt.init instanceof VarDecl && stmt.init.kind !== 'var'
    if (stmt.init instanceof VarDecl) {
      declareLexical(state, [stmt.init], scope)
      yield* execVarDecl(state, stmt.init)
    } else if (stmt.init !== undefined) {
      yield* evalExp(state, stmt.init)
    }
    if (perIteration) {
      state.scope = state.scope.copy()
    }
    for (;;) {
      if (stmt.test !== undefined && !truthy(yield* evalExp(state, stmt.test))) {
        break
      }
      if (yield* loopBody(state, stmt.body)) {
        break
      }
      if (perIteration) {
        state.scope = state.scope.copy()
      }
      if (stmt.update !== undefined) {
        yield* evalExp(state, stmt.update)
      }
    }
  })
}

// Bind the loop variable of a for-of or for-in loop, and run its body in a
// fresh scope.
function* forEachValue(state: EvalState, stmt: ForOf | ForIn, values: Iterator<KiteVal>): Eval<void> {
  for (let r = values.next(); !r.done; r = values.next()) {
    const value = r.value
    const stop = yield* withScope(state, function* iteration() {
      if (stmt.left instanceof VarDecl) {
        yield* bindPattern(state, stmt.left.declarations[0].target, value, stmt.left.kind)
      } else {
        yield* bindPattern(state, stmt.left, value, undefined)
      }
      return yield* loopBody(state, stmt.body)
    })
    if (stop) {
      break
    }
  }
}

function* execSwitch(state: EvalState, stmt: Switch): Eval<void> {
  const realm = state.realm
  const discriminant = yield* evalExp(state, stmt.discriminant)
  yield* withScope(state, function* switchBody(scope) {
    declareLexical(state, stmt.cases.flatMap((c) => c.body), scope)
    let start = -1
    for (let i = 0; i < stmt.cases.length && start < 0; i += 1) {
      const test = stmt.cases[i].test
      if (test !== undefined && (yield* evalExp(state, test)) === discriminant) {
        start = i
      }
    }
    if (start < 0) {
      start = stmt.cases.findIndex((c) => c.test === undefined)
    }
    if (start < 0) {
      return
    }
    try {
      for (const c of stmt.cases.slice(start)) {
        yield* execStatements(state, c.body)
      }
    } catch (e) {
      if (!(e instanceof KiteBreakSignal)) {
        throw e
      }
    }
  })
}

function* execTry(state: EvalState, stmt: Try): Eval<void> {
  try {
    try {
      yield* execStatement(state, stmt.block)
    } catch (e) {
      const handler = stmt.handler
      if (!(e instanceof KiteThrow) || handler === undefined) {
        throw e
      }
      const thrown = e.value
      yield* withScope(state, function* catchClause(scope) {
        if (stmt.param !== undefined) {
          yield* bindPattern(state, stmt.param, thrown, 'let')
        }
        declareLexical(state, handler.body, scope)
        yield* execStatements(state, handler.body)
      })
    }
  } finally {
    if (stmt.finalizer !== undefined) {
      yield* execStatement(state, stmt.finalizer)
    }
  }
}

export function* execStatements(state: EvalState, statements: Statement[]): Eval<void> {
  for (const stmt of statements) {
    yield* execStatement(state, stmt)
  }
}

export function* execStatement(state: EvalState, stmt: Statement): Eval<void> {
  const realm = state.realm
  if (stmt instanceof ExpStatement) {
    const value = yield* evalExp(state, stmt.exp)
    if (state.isProgram) {
      state.completion = value
    }
  } else if (stmt instanceof VarDecl) {
    yield* execVarDecl(state, stmt)
  } else if (stmt instanceof FunctionDecl || stmt instanceof Empty || stmt instanceof ExportNames) {
    // Hoisted, or nothing to do.
  } else if (stmt instanceof Import) {
    realm.at(stmt.loc)
    realm.linkImport(stmt, state.scope, state.file)
  } else if (stmt instanceof ClassDecl) {
    const cls = yield* evalClass(state, stmt.cls)
    state.scope.initialize(stmt.name, cls, 'class')
  } else if (stmt instanceof Block) {
    const body = stmt.body
    yield* withScope(state, function* block(scope) {
      declareLexical(state, body, scope)
      yield* execStatements(state, body)
    })
  } else if (stmt instanceof If) {
    if (truthy(yield* evalExp(state, stmt.test))) {
      yield* execStatement(state, stmt.consequent)
    } else if (stmt.alternate !== undefined) {
      yield* execStatement(state, stmt.alternate)
    }
  } else if (stmt instanceof While) {
    while (truthy(yield* evalExp(state, stmt.test))) {
      if (yield* loopBody(state, stmt.body)) {
        break
      }
    }
  } else if (stmt instanceof DoWhile) {
    do {
      if (yield* loopBody(state, stmt.body)) {
        break
      }
    } while (truthy(yield* evalExp(state, stmt.test)))
  } else if (stmt instanceof For) {
    yield* execFor(state, stmt)
  } else if (stmt instanceof ForOf) {
    const iterable = yield* evalExp(state, stmt.right)
    realm.at(stmt.loc)
    yield* forEachValue(state, stmt, realm.iterate(iterable, expName(stmt.right)))
  } else if (stmt instanceof ForIn) {
    const obj = yield* evalExp(state, stmt.right)
    yield* forEachValue(state, stmt, realm.forInKeys(obj).values())
  } else if (stmt instanceof Switch) {
    yield* execSwitch(state, stmt)
  } else if (stmt instanceof Try) {
    yield* execTry(state, stmt)
  } else if (stmt instanceof Return) {
    const value = stmt.argument === undefined ? undefined : yield* evalExp(state, stmt.argument)
    throw new KiteReturnSignal(value)
  } else if (stmt instanceof Break) {
    throw new KiteBreakSignal()
  } else if (stmt instanceof Continue) {
    throw new KiteContinueSignal()
  } else if (stmt instanceof Throw) {
    const value = yield* evalExp(state, stmt.argument)
    realm.at(stmt.loc)
    realm.throwValue(value)
  } else if (stmt instanceof ExportDecl) {
    yield* execStatement(state, stmt.declaration)
  } else if (stmt instanceof ExportDefault) {
    if (stmt.value instanceof Exp) {
      const value = yield* evalExp(state, stmt.value)
      state.scope.initialize(defaultExportName, value, 'const')
    } else {
      yield* execStatement(state, stmt.value)
    }
  } else {
    throw new KiteInternalError(`Unknown statement ${stmt.constructor.name}`)
  }
}

// Run a program or module body in `scope`, returning the value of its last
// top-level expression statement.
export function evaluateProgram(realm: Realm, program: Program, scope: Scope): KiteVal {
  const state = new EvalState(realm, scope, program.file, true)
  const savedFile = realm.file
  realm.file = program.file
  try {
    hoistDeclarations(state, program.body)
    drive(execStatements(state, program.body))
  } finally {
    realm.file = savedFile
  }
  return state.completion
}
