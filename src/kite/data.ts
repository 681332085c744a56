// Kite values.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import type {AccessorKind, ClassExp, FunctionExp} from './ast.js'
import type {Chunk} from './chunk.js'
import type {Scope} from './environment.js'
import type {Realm} from './realm.js'

export type KiteVal = undefined | null | boolean | number | string | KiteObject

export function isArrayIndex(key: string) {
  return /^(0|[1-9][0-9]*)$/.test(key) && Number(key) < 4294967295
}

export interface KiteAccessor {
  get?: KiteFunction
  set?: KiteFunction
}

export class KiteObject {
  properties = new Map<string, KiteVal>()

  // Getters and setters. An accessor's key is also in `properties`, holding
  // undefined, so that it keeps its place in key order.
  accessors?: Map<string, KiteAccessor>

  // Keys left out of enumeration (methods of builtin prototypes, class
  // methods, `prototype` and `constructor` links).
  hidden?: Set<string>

  constructor(public proto: KiteObject | null) {}

  hasOwn(key: string) {
    return this.properties.has(key)
  }

  getOwn(key: string): KiteVal {
    return this.properties.get(key)
  }

  getAccessor(key: string): KiteAccessor | undefined {
    return this.accessors?.get(key)
  }

  setOwn(key: string, value: KiteVal) {
    this.accessors?.delete(key)
    this.properties.set(key, value)
  }

  // Add a getter or setter, keeping the other half of an existing pair.
  defineAccessor(key: string, kind: AccessorKind, fn: KiteFunction, hidden = false) {
    if (this.accessors === undefined) {
      this.accessors = new Map()
    }
    const accessor = this.accessors.get(key) ?? {}
    accessor[kind] = fn
    this.accessors.set(key, accessor)
    if (!this.properties.has(key)) {
      this.properties.set(key, undefined)
    }
    if (hidden) {
      this.hide(key)
    }
  }

  deleteOwn(key: string) {
    this.hidden?.delete(key)
    this.accessors?.delete(key)
    return this.properties.delete(key)
  }

  hide(key: string) {
    if (this.hidden === undefined) {
      this.hidden = new Set()
    }
    this.hidden.add(key)
  }

  defineHidden(key: string, value: KiteVal) {
    this.setOwn(key, value)
    this.hide(key)
  }

  // Enumerable own keys, in insertion order.
  ownKeys(): string[] {
    const keys = [...this.properties.keys()]
    const hidden = this.hidden
    return hidden === undefined ? keys : keys.filter((key) => !hidden.has(key))
  }
}

// The objects on a prototype chain, starting with `obj`. Stops if the
// chain loops back on itself.
export function* protoChain(obj: KiteObject | null): Generator<KiteObject, void, undefined> {
  const seen = new Set<KiteObject>()
  for (let o = obj; o !== null && !seen.has(o); o = o.proto) {
    seen.add(o)
    yield o
  }
}

export class KiteArray extends KiteObject {
  constructor(proto: KiteObject | null, public elements: KiteVal[] = []) {
    super(proto)
  }

  hasOwn(key: string) {
    if (key === 'length') {
      return true
    }
    if (isArrayIndex(key)) {
      return Number(key) < this.elements.length
    }
    return super.hasOwn(key)
  }

  getOwn(key: string): KiteVal {
    if (key === 'length') {
      return this.elements.length
    }
    if (isArrayIndex(key)) {
      return this.elements[Number(key)]
    }
    return super.getOwn(key)
  }

  setOwn(key: string, value: KiteVal) {
    if (isArrayIndex(key)) {
      const index = Number(key)
      while (this.elements.length < index) {
        this.elements.push(undefined)
      }
      this.elements[index] = value
    } else if (key === 'length' && typeof value === 'number') {
      this.setLength(value)
    } else {
      super.setOwn(key, value)
    }
  }

  setLength(length: number) {
    if (length < this.elements.length) {
      this.elements.length = length
    }
    while (this.elements.length < length) {
      this.elements.push(undefined)
    }
  }

  // Deleting an element leaves undefined in its place.
  deleteOwn(key: string) {
    if (isArrayIndex(key)) {
      const index = Number(key)
      if (index < this.elements.length) {
        this.elements[index] = undefined
      }
      return true
    }
    if (key === 'length') {
      return false
    }
    return super.deleteOwn(key)
  }

  ownKeys(): string[] {
    return [...this.elements.keys()].map(String).concat(super.ownKeys())
  }
}

export abstract class KiteFunction extends KiteObject {
  constructor(proto: KiteObject | null, public name: string, public arity = 0) {
    super(proto)
  }

  hasOwn(key: string) {
    return key === 'name' || key === 'length' || super.hasOwn(key)
  }

  getOwn(key: string): KiteVal {
    if (!this.properties.has(key)) {
      if (key === 'name') {
        return this.name
      } else if (key === 'length') {
        return this.arity
      }
    }
    return super.getOwn(key)
  }
}

export type NativeImpl = (realm: Realm, thisVal: KiteVal, args: KiteVal[]) => KiteVal

export type NativeConstruct = (realm: Realm, args: KiteVal[], newTarget: KiteObject) => KiteObject

export class NativeFn extends KiteFunction {
  constructor(
    proto: KiteObject | null,
    name: string,
    arity: number,
    public impl: NativeImpl,
    // Present for natives that may be called with `new`.
    public constructImpl?: NativeConstruct,
  ) {
    super(proto, name, arity)
  }
}

export type FunctionBody =
  | {kind: 'interpreted', node: FunctionExp}
  | {kind: 'compiled', node: FunctionExp, chunk: Chunk}
  | {kind: 'bridged', node: FunctionExp, reason: string}

export type BodyKind = FunctionBody['kind']

export class KiteClosure extends KiteFunction {
  // The object whose prototype `super.x` starts from.
  homeObject?: KiteObject

  // Set on class constructors.
  ownerClass?: KiteClass

  constructor(
    proto: KiteObject | null,
    name: string,
    public node: FunctionExp,
    public scope: Scope,
    public body: FunctionBody,
    public file: string,
  ) {
    super(proto, name, node.params.filter((p) => p.init === undefined).length)
  }

  get isArrow() {
    return this.node.kind === 'arrow'
  }

  // Ordinary functions and class constructors can be used with `new`.
  get isConstructor() {
    return this.node.kind === 'normal' && !this.node.isAsync
  }
}

export class KiteClass extends KiteFunction {
  constructor(
    proto: KiteObject | null,
    name: string,
    public ctor: KiteClosure | undefined,
    // undefined for a base class; null for `extends null`.
    public parent: KiteFunction | null | undefined,
    public node: ClassExp,
  ) {
    super(proto, name, ctor?.arity ?? 0)
  }
}

export class KiteBoundFunction extends KiteFunction {
  constructor(
    proto: KiteObject | null,
    public target: KiteFunction,
    public boundThis: KiteVal,
    public boundArgs: KiteVal[],
  ) {
    super(proto, `bound ${target.name}`, Math.max(0, target.arity - boundArgs.length))
  }
}

// A module namespace: a read-only view of the module's exported bindings,
// which sees later assignments to them.
export class KiteNamespace extends KiteObject {
  constructor(
    public readonly path: string,
    private readonly scope: Scope,
    // Exported name to local binding name.
    public readonly exportNames: Map<string, string>,
  ) {
    super(null)
  }

  hasOwn(key: string) {
    return this.exportNames.has(key)
  }

  getOwn(key: string): KiteVal {
    const local = this.exportNames.get(key)
    const binding = local === undefined ? undefined : this.scope.bindings.get(local)
    return binding?.initialized ? binding.value : undefined
  }

  setOwn() {}

  deleteOwn() {
    return false
  }

  ownKeys(): string[] {
    return [...this.exportNames.keys()]
  }
}

// Instances created by the Error constructors.
export class KiteErrorObject extends KiteObject {}

// Map and Set contents are host collections, which compare keys by
// SameValueZero as the guest's do.
export class KiteMap extends KiteObject {
  readonly entries = new Map<KiteVal, KiteVal>()
}

export class KiteSet extends KiteObject {
  readonly members = new Set<KiteVal>()
}

export class KiteDate extends KiteObject {
  constructor(proto: KiteObject | null, public time: number) {
    super(proto)
  }
}

export function isObject(value: KiteVal): value is KiteObject {
  return value instanceof KiteObject
}

export function isCallable(value: KiteVal): value is KiteFunction {
  return value instanceof KiteFunction
}

export function isConstructor(value: KiteVal): value is KiteFunction {
  if (value instanceof KiteClass) {
    return true
  } else if (value instanceof KiteClosure) {
    return value.isConstructor
  } else if (value instanceof NativeFn) {
    return value.constructImpl !== undefined
  } else if (value instanceof KiteBoundFunction) {
    return isConstructor(value.target)
  }
  return false
}
