// Kite promises and the async function driver.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {KiteThrow} from './error.js'
import {KiteObject, KiteVal, NativeFn, isCallable, isObject} from './data.js'
import type {CallEntry, Realm} from './realm.js'

export type PromiseState = 'pending' | 'fulfilled' | 'rejected'

export type Reaction = (value: KiteVal) => void

export class KitePromise extends KiteObject {
  state: PromiseState = 'pending'

  value: KiteVal = undefined

  fulfillReactions: Reaction[] = []

  rejectReactions: Reaction[] = []

  // Set once a reaction has been registered, so a rejection is not
  // reported as unhandled.
  handled = false
}

export function newPromise(realm: Realm) {
  return new KitePromise(realm.intrinsics.PromisePrototype)
}

function settle(realm: Realm, promise: KitePromise, state: 'fulfilled' | 'rejected', value: KiteVal) {
  if (promise.state !== 'pending') {
    return
  }
  const reactions = state === 'fulfilled' ? promise.fulfillReactions : promise.rejectReactions
  promise.state = state
  promise.value = value
  promise.fulfillReactions = []
  promise.rejectReactions = []
  if (state === 'rejected' && !promise.handled) {
    realm.trackRejection(promise)
  }
  for (const reaction of reactions) {
    realm.scheduler.queueMicrotask(() => reaction(value))
  }
}

export function fulfillPromise(realm: Realm, promise: KitePromise, value: KiteVal) {
  settle(realm, promise, 'fulfilled', value)
}

export function rejectPromise(realm: Realm, promise: KitePromise, reason: KiteVal) {
  settle(realm, promise, 'rejected', reason)
}

// Run `f`, turning a guest throw into a rejection of `promise`.
function rejectOnThrow(realm: Realm, promise: KitePromise, f: () => void) {
  try {
    f()
  } catch (e) {
    if (e instanceof KiteThrow) {
      rejectPromise(realm, promise, e.value)
    } else {
      throw e
    }
  }
}

// Resolve `promise` with `resolution`, adopting the state of a thenable.
export function resolvePromise(realm: Realm, promise: KitePromise, resolution: KiteVal) {
  if (resolution === promise) {
    rejectPromise(realm, promise, realm.makeError('TypeError', 'Chaining cycle detected for promise #<Promise>'))
    return
  }
  if (!isObject(resolution)) {
    fulfillPromise(realm, promise, resolution)
    return
  }
  let then: KiteVal
  try {
    then = realm.getProperty(resolution, 'then')
  } catch (e) {
    if (e instanceof KiteThrow) {
      rejectPromise(realm, promise, e.value)
      return
    }
    throw e
  }
  if (!isCallable(then)) {
    fulfillPromise(realm, promise, resolution)
    return
  }
  realm.scheduler.queueMicrotask(() => {
    const [resolve, reject] = resolvingFunctions(realm, promise)
    try {
      realm.call(then, resolution, [resolve, reject])
    } catch (e) {
      if (e instanceof KiteThrow) {
        realm.call(reject, undefined, [e.value])
      } else {
        throw e
      }
    }
  })
}

// A one-shot pair of resolve and reject functions for `promise`.
export function resolvingFunctions(realm: Realm, promise: KitePromise): [NativeFn, NativeFn] {
  let done = false
  const resolve = realm.native('', 1, (_realm, _this, args) => {
    if (!done) {
      done = true
      resolvePromise(realm, promise, args[0])
    }
    return undefined
  })
  const reject = realm.native('', 1, (_realm, _this, args) => {
    if (!done) {
      done = true
      rejectPromise(realm, promise, args[0])
    }
    return undefined
  })
  return [resolve, reject]
}

// Register host reactions on `promise`. Reactions on a settled promise are
// queued at once.
export function performThen(realm: Realm, promise: KitePromise, onFulfilled: Reaction, onRejected: Reaction) {
  if (promise.state === 'pending') {
    promise.fulfillReactions.push(onFulfilled)
    promise.rejectReactions.push(onRejected)
  } else if (promise.state === 'fulfilled') {
    const value = promise.value
    realm.scheduler.queueMicrotask(() => onFulfilled(value))
  } else {
    if (!promise.handled) {
      realm.untrackRejection(promise)
    }
    const reason = promise.value
    realm.scheduler.queueMicrotask(() => onRejected(reason))
  }
  promise.handled = true
}

// `promise.then(onFulfilled, onRejected)` with guest handlers.
export function then(realm: Realm, promise: KitePromise, onFulfilled: KiteVal, onRejected: KiteVal): KitePromise {
  const derived = newPromise(realm)
  const handler = (callback: KiteVal, state: 'fulfilled' | 'rejected') => (value: KiteVal) => {
    if (!isCallable(callback)) {
      if (state === 'fulfilled') {
        resolvePromise(realm, derived, value)
      } else {
        rejectPromise(realm, derived, value)
      }
      return
    }
    rejectOnThrow(realm, derived, () => resolvePromise(realm, derived, realm.call(callback, undefined, [value])))
  }
  performThen(realm, promise, handler(onFulfilled, 'fulfilled'), handler(onRejected, 'rejected'))
  return derived
}

// The promise `await` and `Promise.resolve` use for a value.
export function promiseResolve(realm: Realm, value: KiteVal): KitePromise {
  if (value instanceof KitePromise) {
    return value
  }
  const promise = newPromise(realm)
  resolvePromise(realm, promise, value)
  return promise
}

export function rejectedPromise(realm: Realm, reason: KiteVal) {
  const promise = newPromise(realm)
  rejectPromise(realm, promise, reason)
  return promise
}

// A suspended async function body. It yields each awaited value and is
// resumed with the settled value, or has the rejection thrown into it.
export type AsyncBody = Generator<KiteVal, KiteVal, KiteVal>

// Run an async function body to its first await, returning the promise of
// its result. `entry` is the call-stack entry of the invocation, pushed
// again each time the body resumes.
export function runAsync(realm: Realm, body: AsyncBody, entry: CallEntry | undefined): KitePromise {
  const result = newPromise(realm)
  const step = (resume: () => IteratorResult<KiteVal, KiteVal>, resumed: boolean) => {
    if (resumed && entry !== undefined) {
      realm.resumeCall(entry)
    }
    let next: IteratorResult<KiteVal, KiteVal>
    try {
      next = resume()
    } catch (e) {
      if (e instanceof KiteThrow) {
        rejectPromise(realm, result, e.value)
        return
      }
      throw e
    } finally {
      if (resumed && entry !== undefined) {
        realm.popCall(entry)
      }
    }
    if (next.done) {
      resolvePromise(realm, result, next.value)
      return
    }
    performThen(
      realm,
      promiseResolve(realm, next.value),
      (value) => step(() => body.next(value), true),
      (reason) => step(() => body.throw(new KiteThrow(reason, 'UserThrow', realm.snapshot())), true),
    )
  }
  step(() => body.next(undefined), false)
  return result
}
