// Run bridged functions and programs with the tree-walk evaluator.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import type {Program} from './ast.js'
import {KiteClosure, KiteObject, KiteVal} from './data.js'
import {Binding, Scope} from './environment.js'
import {TreeWalker, evaluateProgram} from './eval.js'
import type {CallEntry, Invoker, Realm} from './realm.js'
import {trace} from './util.js'

export interface BridgeStats {
  // Invocations of bridged functions, plus one for a bridged main program.
  bridgedCalls: number
  // Names of the bridged functions that ran, in order of first call.
  bridgedNames: string[]
}

// Code the compiler cannot handle is handed over whole: a bridged function
// runs every time under the tree walker, and so do the functions it
// creates, unless they were compiled themselves.
export class KiteBridge implements Invoker {
  readonly stats: BridgeStats = {bridgedCalls: 0, bridgedNames: []}

  private readonly walker: TreeWalker

  constructor(public readonly realm: Realm) {
    this.walker = new TreeWalker(realm)
  }

  private count(name: string, reason: string) {
    this.stats.bridgedCalls += 1
    if (!this.stats.bridgedNames.includes(name)) {
      this.stats.bridgedNames.push(name)
      trace(`bridging ${name}`, reason)
    }
  }

  invoke(
    closure: KiteClosure,
    thisBinding: Binding,
    args: KiteVal[],
    newTarget: KiteObject | undefined,
    entry: CallEntry,
  ): KiteVal {
    const body = closure.body
    this.count(closure.name === '' ? '<anonymous>' : closure.name, body.kind === 'bridged' ? body.reason : body.kind)
    return this.walker.invoke(closure, thisBinding, args, newTarget, entry)
  }

  runProgram(program: Program, scope: Scope, reason: string): KiteVal {
    this.count('<main>', reason)
    return evaluateProgram(this.realm, program, scope)
  }
}
