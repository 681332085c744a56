// Kite realm: intrinsics, property access and call dispatch shared by both
// evaluators.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import type {ClassExp, FunctionExp, Import, PropertyKind} from './ast.js'
import {installBuiltins} from './builtins.js'
import {
  BodyKind, FunctionBody, KiteAccessor, KiteArray, KiteBoundFunction, KiteClass, KiteClosure,
  KiteErrorObject, KiteFunction, KiteMap, KiteNamespace, KiteObject, KiteSet, KiteVal, NativeConstruct,
  NativeFn, NativeImpl, isArrayIndex, isConstructor, isObject, protoChain,
} from './data.js'
import {constructorName, display, inspect} from './display.js'
import {Binding, FunctionInfo, Scope} from './environment.js'
import {
  Diagnostic, KiteInternalError, KiteLoadError, KiteThrow, SourceLoc, StackEntry,
} from './error.js'
import type {KitePromise} from './promise.js'
import {Scheduler} from './scheduler.js'

export type RuntimeErrorKind = 'Error' | 'TypeError' | 'ReferenceError' | 'RangeError' | 'SyntaxError'

export interface Intrinsics {
  ObjectPrototype: KiteObject
  FunctionPrototype: KiteObject
  ArrayPrototype: KiteObject
  StringPrototype: KiteObject
  NumberPrototype: KiteObject
  BooleanPrototype: KiteObject
  PromisePrototype: KiteObject
  ErrorPrototype: KiteObject
}

// One active guest function invocation, with the position it was called from.
export interface CallEntry {
  name: string
  file: string
  callFile: string
  callLine: number
  callColumn: number
}

// Runs closures with one kind of body.
export interface Invoker {
  invoke(
    closure: KiteClosure,
    thisBinding: Binding,
    args: KiteVal[],
    newTarget: KiteObject | undefined,
    entry: CallEntry,
  ): KiteVal
}

export interface ClassMethod {
  key: string
  isStatic: boolean
  kind: PropertyKind
  fn: KiteClosure
}

export interface RealmOptions {
  maxCallDepth?: number
  maxTimerTicks?: number
  print?: (line: string) => void
  onDiagnostic?: (diagnostic: Diagnostic) => void
}

export const defaultMaxCallDepth = 250

// Host arrays are not allowed to grow by more than this in one write.
const maxArrayGrowth = 1e7

export class Realm {
  readonly intrinsics: Intrinsics

  readonly errorPrototypes = new Map<RuntimeErrorKind, KiteObject>()

  // Builtins live here; each program or module gets a child scope.
  readonly global = new Scope(undefined)

  readonly scheduler: Scheduler

  readonly maxCallDepth: number

  readonly print: (line: string) => void

  readonly diagnostics: Diagnostic[] = []

  callStack: CallEntry[] = []

  // Current source position, kept up to date by the evaluators.
  file = '<input>'

  line = 0

  column = 0

  invokers: Partial<Record<BodyKind, Invoker>> = {}

  // Compiled or bridged bodies chosen for function nodes; any other
  // function is interpreted.
  readonly bodies = new WeakMap<FunctionExp, FunctionBody>()

  // Loads and runs a module, returning its namespace.
  importModule?: (specifier: string, importer: string) => KiteNamespace

  private pendingRejections = new Set<KitePromise>()

  private onDiagnostic: (diagnostic: Diagnostic) => void

  constructor(options: RealmOptions = {}) {
    const ObjectPrototype = new KiteObject(null)
    const FunctionPrototype = new KiteObject(ObjectPrototype)
    const ErrorPrototype = new KiteObject(ObjectPrototype)
    this.intrinsics = {
      ObjectPrototype,
      FunctionPrototype,
      ArrayPrototype: new KiteArray(ObjectPrototype),
      StringPrototype: new KiteObject(ObjectPrototype),
      NumberPrototype: new KiteObject(ObjectPrototype),
      BooleanPrototype: new KiteObject(ObjectPrototype),
      PromisePrototype: new KiteObject(ObjectPrototype),
      ErrorPrototype,
    }
    this.errorPrototypes.set('Error', ErrorPrototype)
    for (const kind of ['TypeError', 'ReferenceError', 'RangeError', 'SyntaxError'] as const) {
      this.errorPrototypes.set(kind, new KiteObject(ErrorPrototype))
    }
    this.maxCallDepth = options.maxCallDepth ?? defaultMaxCallDepth
    this.print = options.print ?? ((line) => console.log(line))
    this.onDiagnostic = options.onDiagnostic ?? (() => {})
    this.scheduler = new Scheduler(options.maxTimerTicks, (d) => this.diagnostic(d))
    this.scheduler.onMicrotasksDrained = () => this.reportRejections()
    installBuiltins(this)
  }

  // Object creation.

  newObject(proto: KiteObject | null = this.intrinsics.ObjectPrototype) {
    return new KiteObject(proto)
  }

  newArray(elements: KiteVal[] = []) {
    return new KiteArray(this.intrinsics.ArrayPrototype, elements)
  }

  native(name: string, arity: number, impl: NativeImpl, construct?: NativeConstruct) {
    return new NativeFn(this.intrinsics.FunctionPrototype, name, arity, impl, construct)
  }

  // The prototype for an object created by `new newTarget`.
  prototypeFor(newTarget: KiteObject, fallback: KiteObject): KiteObject {
    const proto = this.getProperty(newTarget, 'prototype')
    return isObject(proto) ? proto : fallback
  }

  makeError(kind: RuntimeErrorKind, message: string, proto?: KiteObject): KiteErrorObject {
    const error = new KiteErrorObject(proto ?? this.errorPrototypes.get(kind) ?? this.intrinsics.ErrorPrototype)
    error.defineHidden('message', message)
    return error
  }

  // Errors and positions.

  at(loc: SourceLoc) {
    this.line = loc.line
    this.column = loc.column
  }

  throwError(kind: Exclude<RuntimeErrorKind, 'Error'>, message: string): never {
    throw new KiteThrow(this.makeError(kind, message), kind, this.snapshot())
  }

  throwValue(value: KiteVal): never {
    throw new KiteThrow(value, 'UserThrow', this.snapshot())
  }

  // The guest call stack, innermost first.
  snapshot(): StackEntry[] {
    const stack = this.callStack
    const nameAt = (index: number) => (index >= 0 ? stack[index].name : '<main>')
    const entries: StackEntry[] = [{
      name: nameAt(stack.length - 1), file: this.file, line: this.line, column: this.column,
    }]
    for (let i = stack.length - 1; i >= 0; i -= 1) {
      const entry = stack[i]
      entries.push({name: nameAt(i - 1), file: entry.callFile, line: entry.callLine, column: entry.callColumn})
    }
    return entries
  }

  diagnostic(diagnostic: Diagnostic) {
    this.diagnostics.push(diagnostic)
    this.onDiagnostic(diagnostic)
  }

  trackRejection(promise: KitePromise) {
    this.pendingRejections.add(promise)
  }

  untrackRejection(promise: KitePromise) {
    this.pendingRejections.delete(promise)
  }

  private reportRejections() {
    for (const promise of this.pendingRejections) {
      this.diagnostic({
        kind: 'UnhandledRejection',
        message: `Uncaught (in promise) ${display(promise.value)}`,
      })
    }
    this.pendingRejections.clear()
  }

  // Property access.

  getProperty(value: KiteVal, key: string): KiteVal {
    let obj: KiteObject
    if (value === undefined || value === null) {
      return this.throwError('TypeError', `Cannot read properties of ${String(value)} (reading '${key}')`)
    } else if (typeof value === 'string') {
      if (key === 'length') {
        return value.length
      } else if (isArrayIndex(key)) {
        return value[Number(key)]
      }
      obj = this.intrinsics.StringPrototype
    } else if (typeof value === 'number') {
      obj = this.intrinsics.NumberPrototype
    } else if (typeof value === 'boolean') {
      obj = this.intrinsics.BooleanPrototype
    } else {
      obj = value
    }
    for (const o of protoChain(obj)) {
      if (o.hasOwn(key)) {
        const accessor = o.getAccessor(key)
        if (accessor !== undefined) {
          return accessor.get === undefined ? undefined : this.call(accessor.get, value, [])
        }
        return o.getOwn(key)
      }
    }
    return undefined
  }

  // The accessor that an assignment to `key` on `target` runs, if any.
  private findAccessor(target: KiteObject, key: string): KiteAccessor | undefined {
    if (target instanceof KiteArray && isArrayIndex(key)) {
      return undefined
    }
    for (const o of protoChain(target)) {
      if (o.hasOwn(key)) {
        return o.getAccessor(key)
      }
    }
    return undefined
  }

  setProperty(target: KiteVal, key: string, value: KiteVal) {
    if (target === undefined || target === null) {
      this.throwError('TypeError', `Cannot set properties of ${String(target)} (setting '${key}')`)
    }
    if (!isObject(target)) {
      return
    }
    if (target instanceof KiteArray) {
      if (key === 'length') {
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value >= 2 ** 32
          || value > target.elements.length + maxArrayGrowth) {
          this.throwError('RangeError', 'Invalid array length')
        }
      } else if (isArrayIndex(key) && Number(key) > target.elements.length + maxArrayGrowth) {
        this.throwError('RangeError', 'Invalid array length')
      }
    }
    const accessor = this.findAccessor(target, key)
    if (accessor === undefined) {
      target.setOwn(key, value)
    } else if (accessor.set === undefined) {
      this.throwError('TypeError', `Cannot set property ${key} of #<${constructorName(target) ?? 'Object'}> which has only a getter`)
    } else {
      this.call(accessor.set, target, [value])
    }
  }

  deleteProperty(target: KiteVal, key: string): boolean {
    if (target === undefined || target === null) {
      return this.throwError('TypeError', 'Cannot convert undefined or null to object')
    }
    if (!isObject(target)) {
      return true
    }
    if (target instanceof KiteArray && key === 'length') {
      return false
    }
    target.deleteOwn(key)
    return true
  }

  // Calls.

  call(fn: KiteVal, thisVal: KiteVal, args: KiteVal[], desc?: string): KiteVal {
    if (fn instanceof NativeFn) {
      return fn.impl(this, thisVal, args)
    } else if (fn instanceof KiteClosure) {
      return this.invokeClosure(fn, new Binding('const', thisVal), args, undefined)
    } else if (fn instanceof KiteBoundFunction) {
      return this.call(fn.target, fn.boundThis, [...fn.boundArgs, ...args])
    } else if (fn instanceof KiteClass) {
      return this.throwError('TypeError', `Class constructor ${fn.name} cannot be invoked without 'new'`)
    }
    return this.throwError('TypeError', `${desc ?? inspect(fn)} is not a function`)
  }

  construct(fn: KiteVal, args: KiteVal[], newTarget?: KiteObject, desc?: string): KiteObject {
    if (!isConstructor(fn)) {
      return this.throwError('TypeError', `${desc ?? inspect(fn)} is not a constructor`)
    }
    const target = newTarget ?? fn
    if (fn instanceof KiteBoundFunction) {
      return this.construct(fn.target, [...fn.boundArgs, ...args], target === fn ? fn.target : target)
    } else if (fn instanceof NativeFn && fn.constructImpl !== undefined) {
      return fn.constructImpl(this, args, target)
    } else if (fn instanceof KiteClass) {
      return this.constructClass(fn, args, target)
    } else if (fn instanceof KiteClosure) {
      const obj = new KiteObject(this.prototypeFor(target, this.intrinsics.ObjectPrototype))
      const result = this.invokeClosure(fn, new Binding('const', obj), args, target)
      return isObject(result) ? result : obj
    }
    return this.throwError('TypeError', `${desc ?? inspect(fn)} is not a constructor`)
  }

  private constructClass(cls: KiteClass, args: KiteVal[], newTarget: KiteObject): KiteObject {
    if (cls.parent === undefined) {
      const obj = new KiteObject(this.prototypeFor(newTarget, this.intrinsics.ObjectPrototype))
      if (cls.ctor !== undefined) {
        const result = this.invokeClosure(cls.ctor, new Binding('const', obj), args, newTarget)
        if (isObject(result)) {
          return result
        }
      }
      return obj
    }
    if (cls.ctor === undefined) {
      if (cls.parent === null) {
        return this.throwError('TypeError', 'Super constructor null of anonymous class is not a constructor')
      }
      return this.construct(cls.parent, args, newTarget)
    }
    // `this` stays uninitialized until super() runs.
    const thisBinding = new Binding('const', undefined, false)
    const result = this.invokeClosure(cls.ctor, thisBinding, args, newTarget)
    if (isObject(result)) {
      return result
    }
    const obj = this.thisValue(thisBinding)
    if (!isObject(obj)) {
      throw new KiteInternalError('Derived constructor produced a non-object')
    }
    return obj
  }

  invokeClosure(closure: KiteClosure, thisBinding: Binding, args: KiteVal[], newTarget: KiteObject | undefined): KiteVal {
    const invoker = this.invokers[closure.body.kind]
    if (invoker === undefined) {
      throw new KiteInternalError(`No evaluator for ${closure.body.kind} functions`)
    }
    const entry = this.pushClosureCall(closure)
    try {
      return invoker.invoke(closure, thisBinding, args, newTarget, entry)
    } catch (e) {
      if (e instanceof RangeError && e.message.includes('call stack')) {
        this.throwError('RangeError', 'Maximum call stack size exceeded')
      }
      throw e
    } finally {
      this.popCall(entry)
    }
  }

  pushClosureCall(closure: KiteClosure) {
    return this.pushCall(closure.name === '' ? '<anonymous>' : closure.name, closure.file)
  }

  pushCall(name: string, file: string): CallEntry {
    if (this.callStack.length >= this.maxCallDepth) {
      this.throwError('RangeError', 'Maximum call stack size exceeded')
    }
    const entry: CallEntry = {
      name, file, callFile: this.file, callLine: this.line, callColumn: this.column,
    }
    this.callStack.push(entry)
    this.file = file
    return entry
  }

  // Push an entry again when a suspended async invocation resumes.
  resumeCall(entry: CallEntry) {
    entry.callFile = this.file
    entry.callLine = this.line
    entry.callColumn = this.column
    this.callStack.push(entry)
    this.file = entry.file
  }

  popCall(entry: CallEntry) {
    const index = this.callStack.lastIndexOf(entry)
    if (index < 0) {
      throw new KiteInternalError(`Call stack entry for ${entry.name} popped twice`)
    }
    this.callStack.length = index
    this.file = entry.callFile
    this.line = entry.callLine
    this.column = entry.callColumn
  }

  // Functions and classes.

  bodyFor(node: FunctionExp): FunctionBody {
    return this.bodies.get(node) ?? {kind: 'interpreted', node}
  }

  // A named function expression sees its own name in a scope of its own.
  makeClosure(node: FunctionExp, scope: Scope, file: string, bindOwnName = false): KiteClosure {
    let closureScope = scope
    if (bindOwnName && node.name !== undefined) {
      closureScope = new Scope(scope)
    }
    const fn = new KiteClosure(
      this.intrinsics.FunctionPrototype,
      node.name ?? node.inferredName ?? '',
      node,
      closureScope,
      this.bodyFor(node),
      file,
    )
    if (closureScope !== scope && node.name !== undefined) {
      closureScope.declare(node.name, 'const', fn)
    }
    if (fn.isConstructor) {
      const proto = this.newObject()
      proto.defineHidden('constructor', fn)
      fn.defineHidden('prototype', proto)
    }
    return fn
  }

  // Check the value of a class's `extends` clause.
  classParent(hasExtends: boolean, superClass: KiteVal): KiteFunction | null | undefined {
    if (!hasExtends) {
      return undefined
    } else if (superClass === null) {
      return null
    } else if (!isConstructor(superClass)) {
      return this.throwError('TypeError', `Class extends value ${inspect(superClass)} is not a constructor or null`)
    }
    return superClass
  }

  defineClass(
    node: ClassExp,
    parent: KiteFunction | null | undefined,
    ctor: KiteClosure | undefined,
    methods: ClassMethod[],
  ): KiteClass {
    let protoParent: KiteObject | null = this.intrinsics.ObjectPrototype
    let classProto = this.intrinsics.FunctionPrototype
    if (parent === null) {
      protoParent = null
    } else if (parent !== undefined) {
      const parentProto = this.getProperty(parent, 'prototype')
      if (parentProto !== null && !isObject(parentProto)) {
        this.throwError('TypeError', `Class extends value does not have valid prototype property ${inspect(parentProto)}`)
      }
      protoParent = parentProto
      classProto = parent
    }
    const cls = new KiteClass(classProto, node.name ?? node.inferredName ?? '', ctor, parent, node)
    const proto = new KiteObject(protoParent)
    proto.defineHidden('constructor', cls)
    cls.defineHidden('prototype', proto)
    if (ctor !== undefined) {
      ctor.name = cls.name
      ctor.homeObject = proto
      ctor.ownerClass = cls
    }
    for (const method of methods) {
      const home = method.isStatic ? cls : proto
      method.fn.homeObject = home
      if (method.kind === 'init') {
        home.defineHidden(method.key, method.fn)
      } else {
        home.defineAccessor(method.key, method.kind, method.fn, true)
      }
    }
    return cls
  }

  thisValue(binding: Binding | undefined): KiteVal {
    if (binding === undefined) {
      return undefined
    } else if (!binding.initialized) {
      return this.throwError(
        'ReferenceError',
        "Must call super constructor in derived class before accessing 'this' or returning from derived constructor",
      )
    }
    return binding.value
  }

  superCall(info: FunctionInfo | undefined, args: KiteVal[]): KiteVal {
    const cls = info?.closure?.ownerClass
    if (info === undefined || cls === undefined || cls.parent === undefined) {
      return this.throwError('SyntaxError', "'super' keyword unexpected here")
    } else if (cls.parent === null) {
      return this.throwError('TypeError', 'Super constructor null of anonymous class is not a constructor')
    }
    const obj = this.construct(cls.parent, args, info.newTarget ?? cls)
    if (info.thisBinding.initialized) {
      return this.throwError('ReferenceError', 'Super constructor may only be called once')
    }
    info.thisBinding.value = obj
    info.thisBinding.initialized = true
    return undefined
  }

  // `super[key]`: look up from the prototype of the method's home object.
  superProperty(info: FunctionInfo | undefined, key: string): KiteVal {
    const home = info?.closure?.homeObject
    if (home === undefined) {
      return this.throwError('SyntaxError', "'super' keyword unexpected here")
    }
    return this.getProperty(home.proto, key)
  }

  // Iteration for for-of, spread and array destructuring.
  iterate(value: KiteVal, desc?: string): Iterator<KiteVal> {
    if (value instanceof KiteArray) {
      return arrayValues(value)
    } else if (value instanceof KiteMap) {
      return this.mapEntries(value)
    } else if (value instanceof KiteSet) {
      return value.members.values()
    } else if (typeof value === 'string') {
      return value[Symbol.iterator]()
    }
    return this.throwError('TypeError', `${desc ?? inspect(value)} is not iterable`)
  }

  // [key, value] pairs, as `for...of` over a Map sees them.
  *mapEntries(map: KiteMap): Generator<KiteVal, void, undefined> {
    for (const [key, value] of map.entries) {
      yield this.newArray([key, value])
    }
  }

  // Bind the names an import declares, loading the module first.
  linkImport(stmt: Import, scope: Scope, importer: string) {
    let namespace: KiteNamespace
    try {
      if (this.importModule === undefined) {
        throw new KiteLoadError('file-not-found', stmt.source, `Cannot import '${stmt.source}': no module loader`)
      }
      namespace = this.importModule(stmt.source, importer)
    } catch (e) {
      // Report a load failure at the innermost import.
      if (e instanceof KiteLoadError && e.source === undefined) {
        e.source = stmt.loc
        e.file = importer
      }
      throw e
    }
    const bind = (name: string, value: KiteVal) => {
      const binding = scope.bindings.get(name) ?? scope.declare(name, 'import')
      binding.value = value
      binding.initialized = true
    }
    if (stmt.defaultName !== undefined) {
      bind(stmt.defaultName, namespace.getOwn('default'))
    }
    if (stmt.namespaceName !== undefined) {
      bind(stmt.namespaceName, namespace)
    }
    for (const spec of stmt.specifiers) {
      if (!namespace.hasOwn(spec.imported)) {
        this.throwError(
          'SyntaxError',
          `The requested module '${stmt.source}' does not provide an export named '${spec.imported}'`,
        )
      }
      bind(spec.local, namespace.getOwn(spec.imported))
    }
  }

  // Keys visited by for-in: enumerable keys along the prototype chain,
  // each once.
  forInKeys(value: KiteVal): string[] {
    if (typeof value === 'string') {
      return Array.from({length: value.length}, (_, index) => String(index))
    } else if (!isObject(value)) {
      return []
    }
    const keys: string[] = []
    const seen = new Set<string>()
    for (const o of protoChain(value)) {
      for (const key of o.ownKeys()) {
        if (!seen.has(key)) {
          seen.add(key)
          keys.push(key)
        }
      }
    }
    return keys
  }
}

// Array elements read live, so elements pushed during iteration are seen.
function* arrayValues(array: KiteArray): Generator<KiteVal, void, undefined> {
  for (let i = 0; i < array.elements.length; i += 1) {
    yield array.elements[i]
  }
}
