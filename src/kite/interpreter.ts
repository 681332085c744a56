// Kite bytecode interpreter.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {BinaryOp} from './ast.js'
import {
  Chunk, ClassTemplate, Constant, FunctionTemplate, ImportTemplate, Op, bindingKinds,
  operandCount,
} from './chunk.js'
import {
  KiteArray, KiteClosure, KiteObject, KiteVal, isObject,
} from './data.js'
import {Binding, BindingKind, FunctionInfo, Scope} from './environment.js'
import {KiteInternalError, KiteThrow} from './error.js'
import {
  binaryOp, toNumber, toPropertyKey, toStr, truthy, typeOf,
} from './operators.js'
import type {CallEntry, ClassMethod, Invoker, Realm, RuntimeErrorKind} from './realm.js'

const binaryOps = new Map<Op, BinaryOp>([
  [Op.ADD, '+'], [Op.SUB, '-'], [Op.MUL, '*'], [Op.DIV, '/'], [Op.MOD, '%'], [Op.POW, '**'],
  [Op.EQ, '=='], [Op.NE, '!='], [Op.STRICT_EQ, '==='], [Op.STRICT_NE, '!=='],
  [Op.LT, '<'], [Op.GT, '>'], [Op.LE, '<='], [Op.GE, '>='],
  [Op.INSTANCEOF, 'instanceof'], [Op.IN, 'in'],
])

interface Handler {
  target: number
  stackHeight: number
  scope: Scope
  iteratorCount: number
  isFinally: boolean
}

class CallFrame {
  ip = 0

  handlers: Handler[] = []

  iterators: Iterator<KiteVal>[] = []

  // Errors caught by `finally` handlers, waiting for RETHROW.
  pending: unknown[] = []

  completion: KiteVal = undefined

  constructor(
    readonly chunk: Chunk,
    public scope: Scope,
    // undefined for arrow functions and the main program.
    readonly info: FunctionInfo | undefined,
    readonly slots: Binding[],
    // Operand stack height on entry.
    readonly base: number,
    // Set for frames pushed by the VM itself rather than by an Invoker.
    readonly entry?: CallEntry,
    // The object being built by `new`.
    readonly constructed?: KiteObject,
  ) {}
}

export class KiteVM implements Invoker {
  private stack: KiteVal[] = []

  constructor(public readonly realm: Realm) {}

  invoke(
    closure: KiteClosure,
    thisBinding: Binding,
    args: KiteVal[],
    newTarget: KiteObject | undefined,
  ): KiteVal {
    return this.run(this.enterFrame(closure, thisBinding, args, newTarget))
  }

  // Run a compiled program in `scope`, returning its completion value.
  runProgram(chunk: Chunk, scope: Scope): KiteVal {
    const realm = this.realm
    const savedFile = realm.file
    realm.file = chunk.file
    try {
      return this.run(new CallFrame(chunk, scope, undefined, [], this.stack.length))
    } finally {
      realm.file = savedFile
    }
  }

  private enterFrame(
    closure: KiteClosure,
    thisBinding: Binding,
    args: KiteVal[],
    newTarget: KiteObject | undefined,
    entry?: CallEntry,
    constructed?: KiteObject,
  ): CallFrame {
    const body = closure.body
    if (body.kind !== 'compiled') {
      throw new KiteInternalError(`${closure.name} is not compiled`)
    }
    const chunk = body.chunk
    const info = closure.isArrow ? undefined : new FunctionInfo(thisBinding, closure, newTarget)
    const rest = chunk.restParam === undefined ? undefined : this.realm.newArray(args.slice(chunk.params.length))
    if (chunk.usesSlots) {
      const slots = chunk.slotKinds.map((kind) => new Binding(kind, undefined, kind === 'var' || kind === 'param'))
      chunk.params.forEach((_, i) => {
        slots[i].value = args[i]
      })
      if (rest !== undefined) {
        slots[chunk.params.length].value = rest
      }
      return new CallFrame(chunk, closure.scope, info, slots, this.stack.length, entry, constructed)
    }
    const scope = new Scope(closure.scope, info)
    chunk.params.forEach((name, i) => scope.declare(name, 'param', args[i]))
    if (chunk.restParam !== undefined) {
      scope.declare(chunk.restParam, 'param', rest)
    }
    return new CallFrame(chunk, scope, info, [], this.stack.length, entry, constructed)
  }

  private run(first: CallFrame): KiteVal {
    const frames = [first]
    for (;;) {
      try {
        return this.execute(frames)
      } catch (e) {
        if (!this.unwind(frames, e)) {
          throw e
        }
      }
    }
  }

  // Find a handler for `e`, popping frames that have none. Returns false
  // if the error leaves the first frame.
  private unwind(frames: CallFrame[], e: unknown): boolean {
    for (;;) {
      const frame = frames[frames.length - 1]
      for (let h = frame.handlers.pop(); h !== undefined; h = frame.handlers.pop()) {
        if (h.isFinally || e instanceof KiteThrow) {
          this.stack.length = h.stackHeight
          frame.scope = h.scope
          frame.iterators.length = h.iteratorCount
          if (h.isFinally) {
            frame.pending.push(e)
          }
          this.stack.push(e instanceof KiteThrow ? e.value : undefined)
          frame.ip = h.target
          return true
        }
      }
      this.stack.length = frame.base
      if (frames.length === 1) {
        return false
      }
      frames.pop()
      if (frame.entry !== undefined) {
        this.realm.popCall(frame.entry)
      }
    }
  }

  // A malformed chunk is reported as a guest error, so that it unwinds
  // through handlers like any other.
  private fault(kind: Exclude<RuntimeErrorKind, 'Error'>, message: string): never {
    return this.realm.throwError(kind, message)
  }

  private pop(): KiteVal {
    if (this.stack.length === 0) {
      this.fault('RangeError', 'Operand stack underflow')
    }
    return this.stack.pop()
  }

  private peek(): KiteVal {
    return this.stack[this.stack.length - 1]
  }

  private popKey(): string {
    const key = this.pop()
    if (typeof key !== 'string') {
      throw new KiteInternalError('Property key is not a string')
    }
    return key
  }

  private peekObject(): KiteObject {
    const obj = this.peek()
    if (!isObject(obj)) {
      throw new KiteInternalError('Expected an object on the stack')
    }
    return obj
  }

  private popArgs(count: number): KiteVal[] {
    if (count > this.stack.length) {
      this.fault('RangeError', 'Operand stack underflow')
    }
    return this.stack.splice(this.stack.length - count)
  }

  private popSpreadArgs(): KiteVal[] {
    const args = this.pop()
    if (!(args instanceof KiteArray)) {
      throw new KiteInternalError('Spread arguments are not an array')
    }
    return [...args.elements]
  }

  private slotName(frame: CallFrame, slot: number) {
    return frame.chunk.slotNames[slot]
  }

  private checkInitialized(binding: Binding, name: string) {
    if (!binding.initialized) {
      this.realm.throwError('ReferenceError', `Cannot access '${name}' before initialization`)
    }
  }

  private lookup(frame: CallFrame, name: string): Binding {
    const binding = frame.scope.lookup(name)
    if (binding === undefined) {
      return this.realm.throwError('ReferenceError', `${name} is not defined`)
    }
    this.checkInitialized(binding, name)
    return binding
  }

  private assign(binding: Binding, value: KiteVal) {
    if (binding.isConst) {
      this.realm.throwError('TypeError', 'Assignment to constant variable.')
    }
    binding.value = value
  }

  private constant(frame: CallFrame, index: number): Constant {
    if (index < 0 || index >= frame.chunk.constants.length) {
      this.fault('RangeError', `Bad constant index ${index}`)
    }
    return frame.chunk.constants[index]
  }

  private stringConstant(frame: CallFrame, index: number): string {
    const value = this.constant(frame, index)
    if (typeof value !== 'string') {
      throw new KiteInternalError(`Constant ${index} is not a string`)
    }
    return value
  }

  private desc(frame: CallFrame, index: number): string | undefined {
    return index < 0 ? undefined : this.stringConstant(frame, index)
  }

  private bindingKind(operand: number): BindingKind {
    const kind = bindingKinds[operand]
    if (kind === undefined) {
      throw new KiteInternalError(`Bad binding kind ${operand}`)
    }
    return kind
  }

  private slot(frame: CallFrame, index: number): Binding {
    const binding = frame.slots[index]
    if (binding === undefined) {
      throw new KiteInternalError(`Bad slot ${index}`)
    }
    return binding
  }

  // Call `fn`, pushing a frame for a compiled closure and otherwise
  // pushing the result.
  private callValue(frames: CallFrame[], fn: KiteVal, thisVal: KiteVal, args: KiteVal[], desc: string | undefined) {
    if (fn instanceof KiteClosure && fn.body.kind === 'compiled') {
      const entry = this.realm.pushClosureCall(fn)
      frames.push(this.enterFrame(fn, new Binding('const', thisVal), args, undefined, entry))
    } else {
      this.stack.push(this.realm.call(fn, thisVal, args, desc))
    }
  }

  private constructValue(frames: CallFrame[], fn: KiteVal, args: KiteVal[], desc: string | undefined) {
    const realm = this.realm
    if (fn instanceof KiteClosure && fn.body.kind === 'compiled' && fn.isConstructor) {
      const obj = new KiteObject(realm.prototypeFor(fn, realm.intrinsics.ObjectPrototype))
      const entry = realm.pushClosureCall(fn)
      frames.push(this.enterFrame(fn, new Binding('const', obj), args, fn, entry, obj))
    } else {
      this.stack.push(realm.construct(fn, args, undefined, desc))
    }
  }

  private defineClass(frame: CallFrame, template: ClassTemplate, hasSuper: boolean) {
    const realm = this.realm
    const node = template.node
    const superClass = hasSuper ? this.pop() : undefined
    const parent = realm.classParent(hasSuper, superClass)
    const file = frame.chunk.file
    const ctor = node.ctor === undefined ? undefined : realm.makeClosure(node.ctor, frame.scope, file)
    const methods: ClassMethod[] = template.members.map((member) => {
      const fn = realm.makeClosure(member.fn, frame.scope, file)
      if (fn.name === '') {
        fn.name = member.key
      }
      return {key: member.key, isStatic: member.isStatic, kind: member.kind, fn}
    })
    return realm.defineClass(node, parent, ctor, methods)
  }

  // Run until the first frame returns. Each instruction sets the realm's
  // source position before it runs.
  private execute(frames: CallFrame[]): KiteVal {
    const realm = this.realm
    const stack = this.stack
    let frame = frames[frames.length - 1]
    for (;;) {
      const chunk = frame.chunk
      const code = chunk.code
      if (frame.ip >= code.length) {
        this.fault('RangeError', `Ran off the end of ${chunk.name}`)
      }
      realm.line = chunk.lines[frame.ip]
      realm.column = chunk.columns[frame.ip]
      const op: Op = code[frame.ip]
      const a = code[frame.ip + 1]
      const b = code[frame.ip + 2]
      frame.ip += 1 + operandCount(op)
      const arith = binaryOps.get(op)
      if (arith !== undefined) {
        const right = this.pop()
        const left = this.pop()
        stack.push(binaryOp(realm, arith, left, right))
        continue
      }
      switch (op) {
        case Op.CONST: {
          const value = this.constant(frame, a)
          if (value instanceof FunctionTemplate || value instanceof ClassTemplate || value instanceof ImportTemplate) {
            throw new KiteInternalError(`Constant ${a} is not a value`)
          }
          stack.push(value)
          break
        }
        case Op.UNDEFINED:
          stack.push(undefined)
          break
        case Op.NULL:
          stack.push(null)
          break
        case Op.TRUE:
          stack.push(true)
          break
        case Op.FALSE:
          stack.push(false)
          break
        case Op.POP:
          this.pop()
          break
        case Op.DUP:
          stack.push(this.peek())
          break
        case Op.DUP2: {
          const top = this.pop()
          const second = this.peek()
          stack.push(top, second, top)
          break
        }
        case Op.SWAP: {
          const top = this.pop()
          const second = this.pop()
          stack.push(top, second)
          break
        }
        case Op.ROT3: {
          const [x, y, z] = this.popArgs(3)
          stack.push(y, z, x)
          break
        }
        case Op.ROT4: {
          const [w, x, y, z] = this.popArgs(4)
          stack.push(z, w, x, y)
          break
        }
        case Op.GET_LOCAL: {
          const binding = this.slot(frame, a)
          this.checkInitialized(binding, this.slotName(frame, a))
          stack.push(binding.value)
          break
        }
        case Op.SET_LOCAL: {
          const binding = this.slot(frame, a)
          this.checkInitialized(binding, this.slotName(frame, a))
          this.assign(binding, this.peek())
          break
        }
        case Op.INIT_LOCAL: {
          const binding = this.slot(frame, a)
          binding.value = this.pop()
          binding.initialized = true
          break
        }
        case Op.DECLARE_LOCAL: {
          const binding = this.slot(frame, a)
          binding.value = undefined
          binding.initialized = false
          break
        }
        case Op.GET_NAME:
          stack.push(this.lookup(frame, this.stringConstant(frame, a)).value)
          break
        case Op.SET_NAME:
          this.assign(this.lookup(frame, this.stringConstant(frame, a)), this.peek())
          break
        case Op.INIT_NAME:
          frame.scope.initialize(this.stringConstant(frame, a), this.pop(), this.bindingKind(b))
          break
        case Op.DECLARE_NAME: {
          const kind = this.bindingKind(b)
          frame.scope.declare(this.stringConstant(frame, a), kind, undefined, kind === 'var')
          break
        }
        case Op.DECLARE_FUNCTION: {
          const template = this.constant(frame, b)
          if (!(template instanceof FunctionTemplate)) {
            throw new KiteInternalError(`Constant ${b} is not a function`)
          }
          frame.scope.declare(
            this.stringConstant(frame, a),
            'function',
            realm.makeClosure(template.node, frame.scope, chunk.file),
          )
          break
        }
        case Op.TYPEOF_NAME: {
          const name = this.stringConstant(frame, a)
          const binding = frame.scope.lookup(name)
          if (binding === undefined) {
            stack.push('undefined')
          } else {
            this.checkInitialized(binding, name)
            stack.push(typeOf(binding.value))
          }
          break
        }
        case Op.PUSH_SCOPE:
          frame.scope = new Scope(frame.scope)
          break
        case Op.POP_SCOPE: {
          const parent = frame.scope.parent
          if (parent === undefined) {
            this.fault('RangeError', 'Scope stack underflow')
          }
          frame.scope = parent
          break
        }
        case Op.COPY_SCOPE:
          frame.scope = frame.scope.copy()
          break
        case Op.THIS:
          stack.push(realm.thisValue((frame.info ?? frame.scope.functionInfo())?.thisBinding))
          break
        case Op.GET_PROP: {
          const key = this.popKey()
          stack.push(realm.getProperty(this.pop(), key))
          break
        }
        case Op.SET_PROP: {
          const value = this.pop()
          const key = this.popKey()
          realm.setProperty(this.pop(), key, value)
          stack.push(value)
          break
        }
        case Op.DELETE_PROP: {
          const key = this.popKey()
          stack.push(realm.deleteProperty(this.pop(), key))
          break
        }
        case Op.TO_KEY:
          stack.push(toPropertyKey(realm, this.pop()))
          break
        case Op.NEW_OBJECT:
          stack.push(realm.newObject())
          break
        case Op.DEFINE_PROP: {
          const value = this.pop()
          const key = this.popKey()
          this.peekObject().setOwn(key, value)
          break
        }
        case Op.DEFINE_METHOD: {
          const method = this.pop()
          const key = this.popKey()
          const obj = this.peekObject()
          if (!(method instanceof KiteClosure)) {
            throw new KiteInternalError('Method is not a closure')
          }
          method.homeObject = obj
          if (method.name === '') {
            method.name = key
          }
          obj.setOwn(key, method)
          break
        }
        case Op.DEFINE_GETTER:
        case Op.DEFINE_SETTER: {
          const accessor = this.pop()
          const key = this.popKey()
          const obj = this.peekObject()
          if (!(accessor instanceof KiteClosure)) {
            throw new KiteInternalError('Accessor is not a closure')
          }
          accessor.homeObject = obj
          obj.defineAccessor(key, op === Op.DEFINE_GETTER ? 'get' : 'set', accessor)
          break
        }
        case Op.SPREAD_OBJECT: {
          const source = this.pop()
          const obj = this.peekObject()
          if (typeof source === 'string') {
            [...source].forEach((c, i) => obj.setOwn(String(i), c))
          } else if (isObject(source)) {
            for (const key of source.ownKeys()) {
              obj.setOwn(key, realm.getProperty(source, key))
            }
          }
          break
        }
        case Op.NEW_ARRAY:
          stack.push(realm.newArray(this.popArgs(a)))
          break
        case Op.ARRAY_PUSH: {
          const value = this.pop()
          const array = this.peek()
          if (!(array instanceof KiteArray)) {
            throw new KiteInternalError('Expected an array on the stack')
          }
          array.elements.push(value)
          break
        }
        case Op.ARRAY_SPREAD: {
          const iterable = this.pop()
          const array = this.peek()
          if (!(array instanceof KiteArray)) {
            throw new KiteInternalError('Expected an array on the stack')
          }
          const iterator = realm.iterate(iterable, this.desc(frame, a))
          for (let r = iterator.next(); !r.done; r = iterator.next()) {
            array.elements.push(r.value)
          }
          break
        }
        case Op.CLOSURE: {
          const template = this.constant(frame, a)
          if (!(template instanceof FunctionTemplate)) {
            throw new KiteInternalError(`Constant ${a} is not a function`)
          }
          stack.push(realm.makeClosure(template.node, frame.scope, chunk.file, b === 1))
          break
        }
        case Op.CLASS: {
          const template = this.constant(frame, a)
          if (!(template instanceof ClassTemplate)) {
            throw new KiteInternalError(`Constant ${a} is not a class`)
          }
          stack.push(this.defineClass(frame, template, b === 1))
          break
        }
        case Op.NOT:
          stack.push(!truthy(this.pop()))
          break
        case Op.NEG:
          stack.push(-toNumber(realm, this.pop()))
          break
        case Op.TO_NUMBER:
          stack.push(toNumber(realm, this.pop()))
          break
        case Op.TO_STRING:
          stack.push(toStr(realm, this.pop()))
          break
        case Op.TYPEOF:
          stack.push(typeOf(this.pop()))
          break
        case Op.JUMP:
          frame.ip = a
          break
        case Op.JUMP_IF_FALSE:
          if (!truthy(this.pop())) {
            frame.ip = a
          }
          break
        case Op.JUMP_IF_TRUE:
          if (truthy(this.pop())) {
            frame.ip = a
          }
          break
        case Op.JUMP_IF_FALSE_KEEP:
        case Op.JUMP_IF_TRUE_KEEP:
        case Op.JUMP_IF_NOT_NULLISH_KEEP: {
          const value = this.peek()
          const jump = op === Op.JUMP_IF_FALSE_KEEP ? !truthy(value)
            : op === Op.JUMP_IF_TRUE_KEEP ? truthy(value) : value !== undefined && value !== null
          if (jump) {
            frame.ip = a
          } else {
            this.pop()
          }
          break
        }
        case Op.JUMP_IF_NOT_UNDEFINED:
          if (this.pop() !== undefined) {
            frame.ip = a
          }
          break
        case Op.CALL: {
          const args = this.popArgs(a)
          const thisVal = this.pop()
          this.callValue(frames, this.pop(), thisVal, args, this.desc(frame, b))
          break
        }
        case Op.CALL_SPREAD: {
          const args = this.popSpreadArgs()
          const thisVal = this.pop()
          this.callValue(frames, this.pop(), thisVal, args, this.desc(frame, a))
          break
        }
        case Op.NEW: {
          const args = this.popArgs(a)
          this.constructValue(frames, this.pop(), args, this.desc(frame, b))
          break
        }
        case Op.NEW_SPREAD: {
          const args = this.popSpreadArgs()
          this.constructValue(frames, this.pop(), args, this.desc(frame, a))
          break
        }
        case Op.RETURN: {
          let result = this.pop()
          stack.length = frame.base
          if (frame.constructed !== undefined && !isObject(result)) {
            result = frame.constructed
          }
          if (frames.length === 1) {
            return result
          }
          frames.pop()
          if (frame.entry !== undefined) {
            realm.popCall(frame.entry)
          }
          stack.push(result)
          break
        }
        case Op.THROW:
          realm.throwValue(this.pop())
          break
        case Op.TRY:
        case Op.TRY_FINALLY:
          frame.handlers.push({
            target: a,
            stackHeight: stack.length,
            scope: frame.scope,
            iteratorCount: frame.iterators.length,
            isFinally: op === Op.TRY_FINALLY,
          })
          break
        case Op.END_TRY:
          frame.handlers.pop()
          break
        case Op.RETHROW: {
          this.pop()
          if (frame.pending.length === 0) {
            throw new KiteInternalError('RETHROW with nothing to rethrow')
          }
          throw frame.pending.pop()
        }
        case Op.ITER_START:
          frame.iterators.push(realm.iterate(this.pop(), this.desc(frame, a)))
          break
        case Op.ITER_KEYS:
          frame.iterators.push(realm.forInKeys(this.pop()).values())
          break
        case Op.ITER_NEXT: {
          const iterator = frame.iterators[frame.iterators.length - 1]
          if (iterator === undefined) {
            throw new KiteInternalError('No active iterator')
          }
          const r = iterator.next()
          if (r.done) {
            frame.ip = a
          } else {
            stack.push(r.value)
          }
          break
        }
        case Op.ITER_END:
          frame.iterators.pop()
          break
        case Op.IMPORT: {
          const template = this.constant(frame, a)
          if (!(template instanceof ImportTemplate)) {
            throw new KiteInternalError(`Constant ${a} is not an import`)
          }
          realm.linkImport(template.stmt, frame.scope, chunk.file)
          break
        }
        case Op.SET_COMPLETION:
          frame.completion = this.pop()
          break
        case Op.GET_COMPLETION:
          stack.push(frame.completion)
          break
        case Op.NOP:
          break
        default:
          this.fault('TypeError', `Unknown opcode ${op}`)
      }
      frame = frames[frames.length - 1]
    }
  }
}
