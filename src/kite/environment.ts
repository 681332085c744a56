// Kite environments: scopes and bindings.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import type {KiteClosure, KiteObject, KiteVal} from './data.js'

export type BindingKind = 'var' | 'let' | 'const' | 'function' | 'class' | 'param' | 'import'

export class Binding {
  constructor(
    public kind: BindingKind,
    public value: KiteVal = undefined,
    // False while in the temporal dead zone.
    public initialized = true,
  ) {}

  get isConst() {
    return this.kind === 'const' || this.kind === 'import'
  }
}

// Per-invocation state of a non-arrow function, found by walking out from
// the current scope; arrow functions have none and see their creator's.
export class FunctionInfo {
  constructor(
    public thisBinding: Binding,
    public closure: KiteClosure | undefined,
    public newTarget: KiteObject | undefined,
  ) {}
}

export class Scope {
  bindings = new Map<string, Binding>()

  constructor(
    public parent: Scope | undefined,
    public fnInfo?: FunctionInfo,
  ) {}

  lookup(name: string): Binding | undefined {
    for (let scope: Scope | undefined = this; scope !== undefined; scope = scope.parent) {
      const binding = scope.bindings.get(name)
      if (binding !== undefined) {
        return binding
      }
    }
    return undefined
  }

  declare(name: string, kind: BindingKind, value: KiteVal = undefined, initialized = true) {
    const existing = this.bindings.get(name)
    if (existing !== undefined && (kind === 'var' || kind === 'function')
      && (existing.kind === 'var' || existing.kind === 'function' || existing.kind === 'param')) {
      // Re-declaring a var keeps the binding; a function declaration replaces its value.
      if (kind === 'function') {
        existing.value = value
      }
      return existing
    }
    const binding = new Binding(kind, value, initialized)
    this.bindings.set(name, binding)
    return binding
  }

  // Initialize a declared name: a hoisted binding if there is one (found
  // along the chain for var), otherwise a new one here.
  initialize(name: string, value: KiteVal, kind: BindingKind) {
    const binding = kind === 'var' ? this.lookup(name) : this.bindings.get(name)
    if (binding === undefined || kind === 'param') {
      this.declare(name, kind, value)
    } else {
      binding.value = value
      binding.initialized = true
    }
  }

  functionInfo(): FunctionInfo | undefined {
    for (let scope: Scope | undefined = this; scope !== undefined; scope = scope.parent) {
      if (scope.fnInfo !== undefined) {
        return scope.fnInfo
      }
    }
    return undefined
  }

  // A fresh scope with the same parent and copies of the bindings, so that
  // closures created in one loop iteration keep that iteration's values.
  copy(): Scope {
    const scope = new Scope(this.parent, this.fnInfo)
    for (const [name, binding] of this.bindings) {
      scope.bindings.set(name, new Binding(binding.kind, binding.value, binding.initialized))
    }
    return scope
  }
}
