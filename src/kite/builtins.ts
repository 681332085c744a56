// Kite builtin library: global functions, constructors and prototypes.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {
  KiteArray, KiteBoundFunction, KiteDate, KiteErrorObject, KiteFunction, KiteMap,
  KiteObject, KiteSet, KiteVal, NativeFn, isCallable, isObject, protoChain,
} from './data.js'
import {dateString, display, inspect} from './display.js'
import {KiteThrow} from './error.js'
import {
  numberToString, toNumber, toPrimitive, toPropertyKey, toStr, truthy,
} from './operators.js'
import {
  KitePromise, newPromise, performThen, promiseResolve, rejectPromise,
  rejectedPromise, resolvePromise, resolvingFunctions, then,
} from './promise.js'
import type {Realm, RuntimeErrorKind} from './realm.js'

type Impl = (thisVal: KiteVal, args: KiteVal[]) => KiteVal

function sameValueZero(a: KiteVal, b: KiteVal) {
  return a === b || (Number.isNaN(a) && Number.isNaN(b))
}

function toInteger(realm: Realm, value: KiteVal, dflt: number) {
  if (value === undefined) {
    return dflt
  }
  const n = Math.trunc(toNumber(realm, value))
  return Number.isNaN(n) ? 0 : n
}

// Map keys and Set members: -0 is stored as 0.
function normalizeKey(key: KiteVal) {
  return Object.is(key, -0) ? 0 : key
}

// Dates outside +/-8.64e15 ms of the epoch are invalid.
function timeClip(time: number) {
  return Math.abs(time) > 8.64e15 ? NaN : Math.trunc(time) + 0
}

// Resolve a relative index as slice() does.
function relativeIndex(index: number, length: number) {
  return index < 0 ? Math.max(length + index, 0) : Math.min(index, length)
}

export function installBuiltins(realm: Realm) {
  const {
    ObjectPrototype, FunctionPrototype, ArrayPrototype, StringPrototype,
    NumberPrototype, BooleanPrototype, PromisePrototype, ErrorPrototype,
  } = realm.intrinsics

  const fn = (name: string, arity: number, impl: Impl) => realm.native(
    name,
    arity,
    (_realm, thisVal, args) => impl(thisVal, args),
  )

  const install = (target: KiteObject, members: Map<string, KiteVal>) => {
    for (const [name, value] of members) {
      target.defineHidden(name, value)
    }
  }

  const defineGlobal = (name: string, value: KiteVal) => {
    realm.global.declare(name, 'var', value)
  }

  const link = (ctor: KiteFunction, proto: KiteObject) => {
    ctor.defineHidden('prototype', proto)
    proto.defineHidden('constructor', ctor)
  }

  const callable = (value: KiteVal): KiteFunction => {
    if (!isCallable(value)) {
      return realm.throwError('TypeError', `${inspect(value)} is not a function`)
    }
    return value
  }

  const thisArray = (thisVal: KiteVal, name: string): KiteArray => {
    if (!(thisVal instanceof KiteArray)) {
      return realm.throwError('TypeError', `Array.prototype.${name} called on non-array`)
    }
    return thisVal
  }

  const thisString = (thisVal: KiteVal, name: string): string => {
    if (thisVal === undefined || thisVal === null) {
      return realm.throwError('TypeError', `String.prototype.${name} called on null or undefined`)
    }
    return toStr(realm, thisVal)
  }

  const thisNumber = (thisVal: KiteVal, name: string): number => {
    if (typeof thisVal !== 'number') {
      return realm.throwError('TypeError', `Number.prototype.${name} requires that 'this' be a Number`)
    }
    return thisVal
  }

  const thisPromise = (thisVal: KiteVal, name: string): KitePromise => {
    if (!(thisVal instanceof KitePromise)) {
      return realm.throwError('TypeError', `Method Promise.prototype.${name} called on incompatible receiver ${inspect(thisVal)}`)
    }
    return thisVal
  }

  const toArray = (value: KiteVal): KiteVal[] => {
    const iterator = realm.iterate(value)
    const elements: KiteVal[] = []
    for (let r = iterator.next(); !r.done; r = iterator.next()) {
      elements.push(r.value)
    }
    return elements
  }

  const output = (name: string) => fn(name, 0, (_this, args) => {
    realm.print(args.map((arg) => display(arg)).join(' '))
    return undefined
  })

  // Globals.

  defineGlobal('undefined', undefined)
  defineGlobal('NaN', NaN)
  defineGlobal('Infinity', Infinity)
  defineGlobal('print', output('print'))
  const console = realm.newObject()
  install(console, new Map<string, KiteVal>(
    ['log', 'info', 'warn', 'error', 'debug'].map((name): [string, KiteVal] => [name, output(name)]),
  ))
  defineGlobal('console', console)

  const timer = (name: string, repeat: boolean) => fn(name, 1, (_this, [callback, delay, ...rest]) => {
    const f = callable(callback)
    return realm.scheduler.setTimer(toNumber(realm, delay ?? 0), () => {
      realm.call(f, undefined, rest)
    }, repeat)
  })
  const clearTimer = (name: string) => fn(name, 1, (_this, [id]) => {
    if (typeof id === 'number') {
      realm.scheduler.clearTimer(id)
    }
    return undefined
  })
  defineGlobal('setTimeout', timer('setTimeout', false))
  defineGlobal('setInterval', timer('setInterval', true))
  defineGlobal('clearTimeout', clearTimer('clearTimeout'))
  defineGlobal('clearInterval', clearTimer('clearInterval'))
  defineGlobal('queueMicrotask', fn('queueMicrotask', 1, (_this, [callback]) => {
    const f = callable(callback)
    realm.scheduler.queueMicrotask(() => {
      realm.call(f, undefined, [])
    })
    return undefined
  }))

  const parseIntFn = fn('parseInt', 2, (_this, [s, radix]) => parseInt(toStr(realm, s), radix === undefined ? undefined : toNumber(realm, radix)))
  const parseFloatFn = fn('parseFloat', 1, (_this, [s]) => parseFloat(toStr(realm, s)))
  defineGlobal('parseInt', parseIntFn)
  defineGlobal('parseFloat', parseFloatFn)
  defineGlobal('isNaN', fn('isNaN', 1, (_this, [x]) => Number.isNaN(toNumber(realm, x))))
  defineGlobal('isFinite', fn('isFinite', 1, (_this, [x]) => Number.isFinite(toNumber(realm, x))))

  // Object.

  const ObjectCtor = realm.native(
    'Object',
    1,
    (_realm, _this, [value]) => (isObject(value) ? value : realm.newObject()),
    (_realm, _args, newTarget) => realm.newObject(realm.prototypeFor(newTarget, ObjectPrototype)),
  )
  link(ObjectCtor, ObjectPrototype)
  const toObject = (value: KiteVal, name: string): KiteObject => {
    if (!isObject(value)) {
      if (value === undefined || value === null) {
        return realm.throwError('TypeError', `Object.${name} called on non-object`)
      }
      return realm.newObject()
    }
    return value
  }
  const ownEntries = (value: KiteVal, name: string): [string, KiteVal][] => {
    if (typeof value === 'string') {
      return [...value].map((c, i) => [String(i), c])
    }
    const obj = toObject(value, name)
    return obj.ownKeys().map((key) => [key, realm.getProperty(obj, key)])
  }
  install(ObjectCtor, new Map<string, KiteVal>([
    ['keys', fn('keys', 1, (_this, [o]) => realm.newArray(ownEntries(o, 'keys').map(([k]) => k)))],
    ['values', fn('values', 1, (_this, [o]) => realm.newArray(ownEntries(o, 'values').map(([, v]) => v)))],
    ['entries', fn('entries', 1, (_this, [o]) => realm.newArray(
      ownEntries(o, 'entries').map(([k, v]) => realm.newArray([k, v])),
    ))],
    ['assign', fn('assign', 2, (_this, [target, ...sources]) => {
      const obj = toObject(target, 'assign')
      for (const source of sources) {
        if (source !== undefined && source !== null) {
          for (const [key, value] of ownEntries(source, 'assign')) {
            realm.setProperty(obj, key, value)
          }
        }
      }
      return obj
    })],
    ['fromEntries', fn('fromEntries', 1, (_this, [entries]) => {
      const obj = realm.newObject()
      for (const entry of toArray(entries)) {
        realm.setProperty(obj, toPropertyKey(realm, realm.getProperty(entry, '0')), realm.getProperty(entry, '1'))
      }
      return obj
    })],
    ['create', fn('create', 1, (_this, [proto]) => {
      if (proto !== null && !isObject(proto)) {
        return realm.throwError('TypeError', `Object prototype may only be an Object or null: ${inspect(proto)}`)
      }
      return realm.newObject(proto)
    })],
    ['getPrototypeOf', fn('getPrototypeOf', 1, (_this, [o]) => {
      if (typeof o === 'string') {
        return StringPrototype
      } else if (typeof o === 'number') {
        return NumberPrototype
      } else if (typeof o === 'boolean') {
        return BooleanPrototype
      }
      return toObject(o, 'getPrototypeOf').proto
    })],
    ['setPrototypeOf', fn('setPrototypeOf', 2, (_this, [o, proto]) => {
      if (proto !== null && !isObject(proto)) {
        return realm.throwError('TypeError', `Object prototype may only be an Object or null: ${inspect(proto)}`)
      }
      if (!isObject(o)) {
        return o
      }
      for (const p of protoChain(proto)) {
        if (p === o) {
          return realm.throwError('TypeError', 'Cyclic __proto__ value')
        }
      }
      o.proto = proto
      return o
    })],
  ]))
  install(ObjectPrototype, new Map<string, KiteVal>([
    ['hasOwnProperty', fn('hasOwnProperty', 1, (thisVal, [key]) => isObject(thisVal) && thisVal.hasOwn(toPropertyKey(realm, key)))],
    ['toString', fn('toString', 0, (thisVal) => {
      if (thisVal === undefined) {
        return '[object Undefined]'
      } else if (thisVal === null) {
        return '[object Null]'
      }
      return '[object Object]'
    })],
    ['valueOf', fn('valueOf', 0, (thisVal) => thisVal)],
  ]))
  defineGlobal('Object', ObjectCtor)

  // Function.

  const FunctionCtor = fn('Function', 1, () => realm.throwError('TypeError', 'Function constructor is not supported'))
  link(FunctionCtor, FunctionPrototype)
  install(FunctionPrototype, new Map<string, KiteVal>([
    ['call', fn('call', 1, (thisVal, [thisArg, ...args]) => realm.call(thisVal, thisArg, args))],
    ['apply', fn('apply', 2, (thisVal, [thisArg, args]) => realm.call(
      thisVal,
      thisArg,
      args === undefined || args === null ? [] : toArray(args),
    ))],
    ['bind', fn('bind', 1, (thisVal, [thisArg, ...args]) => new KiteBoundFunction(
      FunctionPrototype,
      callable(thisVal),
      thisArg,
      args,
    ))],
    ['toString', fn('toString', 0, (thisVal) => `function ${callable(thisVal).name}() { [native code] }`)],
  ]))
  defineGlobal('Function', FunctionCtor)

  // Array.

  const ArrayCtor = realm.native('Array', 1, (_realm, _this, args) => makeArray(args), (_realm, args) => makeArray(args))
  function makeArray(args: KiteVal[]) {
    if (args.length === 1 && typeof args[0] === 'number') {
      const length = args[0]
      if (!Number.isInteger(length) || length < 0 || length >= 2 ** 32) {
        return realm.throwError('RangeError', 'Invalid array length')
      }
      const array = realm.newArray()
      realm.setProperty(array, 'length', length)
      return array
    }
    return realm.newArray([...args])
  }
  link(ArrayCtor, ArrayPrototype)
  install(ArrayCtor, new Map<string, KiteVal>([
    ['isArray', fn('isArray', 1, (_this, [a]) => a instanceof KiteArray)],
    ['of', fn('of', 0, (_this, args) => realm.newArray([...args]))],
    ['from', fn('from', 1, (_this, [source, mapFn]) => {
      let elements: KiteVal[]
      if (source instanceof KiteArray || typeof source === 'string') {
        elements = toArray(source)
      } else if (isObject(source)) {
        const length = toInteger(realm, realm.getProperty(source, 'length'), 0)
        elements = Array.from({length}, (_, i) => realm.getProperty(source, String(i)))
      } else {
        elements = []
      }
      if (mapFn !== undefined) {
        const f = callable(mapFn)
        elements = elements.map((e, i) => realm.call(f, undefined, [e, i]))
      }
      return realm.newArray(elements)
    })],
  ]))

  const iterateWith = (name: string, impl: (array: KiteArray, f: KiteFunction, thisArg: KiteVal) => KiteVal) => fn(
    name,
    1,
    (thisVal, [callback, thisArg]) => impl(thisArray(thisVal, name), callable(callback), thisArg),
  )
  const visit = (array: KiteArray, f: KiteFunction, thisArg: KiteVal, i: number) => realm.call(
    f,
    thisArg,
    [array.elements[i], i, array],
  )
  const join = (array: KiteArray, separator: string) => array.elements.map(
    (e) => (e === undefined || e === null ? '' : toStr(realm, e)),
  ).join(separator)
  const flatten = (elements: KiteVal[], depth: number): KiteVal[] => elements.flatMap(
    (e) => (e instanceof KiteArray && depth > 0 ? flatten(e.elements, depth - 1) : [e]),
  )
  const defaultCompare = (a: KiteVal, b: KiteVal) => {
    if (a === undefined) {
      return b === undefined ? 0 : 1
    } else if (b === undefined) {
      return -1
    }
    const x = toStr(realm, a)
    const y = toStr(realm, b)
    if (x < y) {
      return -1
    }
    return x > y ? 1 : 0
  }
  const reduce = (name: string, fromRight: boolean) => fn(name, 1, (thisVal, args) => {
    const array = thisArray(thisVal, name)
    const f = callable(args[0])
    const indices = [...array.elements.keys()]
    if (fromRight) {
      indices.reverse()
    }
    let acc: KiteVal
    if (args.length >= 2) {
      acc = args[1]
    } else {
      const first = indices.shift()
      if (first === undefined) {
        return realm.throwError('TypeError', 'Reduce of empty array with no initial value')
      }
      acc = array.elements[first]
    }
    for (const i of indices) {
      if (i < array.elements.length) {
        acc = realm.call(f, undefined, [acc, array.elements[i], i, array])
      }
    }
    return acc
  })
  install(ArrayPrototype, new Map<string, KiteVal>([
    ['push', fn('push', 1, (thisVal, args) => {
      const array = thisArray(thisVal, 'push')
      array.elements.push(...args)
      return array.elements.length
    })],
    ['pop', fn('pop', 0, (thisVal) => thisArray(thisVal, 'pop').elements.pop())],
    ['shift', fn('shift', 0, (thisVal) => thisArray(thisVal, 'shift').elements.shift())],
    ['unshift', fn('unshift', 1, (thisVal, args) => {
      const array = thisArray(thisVal, 'unshift')
      array.elements.unshift(...args)
      return array.elements.length
    })],
    ['slice', fn('slice', 2, (thisVal, [start, end]) => {
      const array = thisArray(thisVal, 'slice')
      const length = array.elements.length
      return realm.newArray(array.elements.slice(
        relativeIndex(toInteger(realm, start, 0), length),
        relativeIndex(toInteger(realm, end, length), length),
      ))
    })],
    ['splice', fn('splice', 2, (thisVal, [start, deleteCount, ...items]) => {
      const array = thisArray(thisVal, 'splice')
      const length = array.elements.length
      const from = relativeIndex(toInteger(realm, start, 0), length)
      const count = deleteCount === undefined
        ? length - from
        : Math.min(Math.max(toInteger(realm, deleteCount, 0), 0), length - from)
      return realm.newArray(array.elements.splice(from, count, ...items))
    })],
    ['concat', fn('concat', 1, (thisVal, args) => {
      const array = thisArray(thisVal, 'concat')
      const elements = [...array.elements]
      for (const arg of args) {
        if (arg instanceof KiteArray) {
          elements.push(...arg.elements)
        } else {
          elements.push(arg)
        }
      }
      return realm.newArray(elements)
    })],
    ['join', fn('join', 1, (thisVal, [separator]) => join(
      thisArray(thisVal, 'join'),
      separator === undefined ? ',' : toStr(realm, separator),
    ))],
    ['toString', fn('toString', 0, (thisVal) => join(thisArray(thisVal, 'toString'), ','))],
    ['indexOf', fn('indexOf', 1, (thisVal, [value]) => thisArray(thisVal, 'indexOf').elements.indexOf(value))],
    ['lastIndexOf', fn('lastIndexOf', 1, (thisVal, [value]) => thisArray(thisVal, 'lastIndexOf').elements.lastIndexOf(value))],
    ['includes', fn('includes', 1, (thisVal, [value]) => thisArray(thisVal, 'includes').elements.some(
      (e) => sameValueZero(e, value),
    ))],
    ['at', fn('at', 1, (thisVal, [index]) => {
      const array = thisArray(thisVal, 'at')
      const i = toInteger(realm, index, 0)
      return array.elements[i < 0 ? array.elements.length + i : i]
    })],
    ['forEach', iterateWith('forEach', (array, f, thisArg) => {
      for (let i = 0; i < array.elements.length; i += 1) {
        visit(array, f, thisArg, i)
      }
      return undefined
    })],
    ['map', iterateWith('map', (array, f, thisArg) => realm.newArray(
      array.elements.map((_, i) => visit(array, f, thisArg, i)),
    ))],
    ['filter', iterateWith('filter', (array, f, thisArg) => realm.newArray(
      array.elements.filter((_, i) => truthy(visit(array, f, thisArg, i))),
    ))],
    ['find', iterateWith('find', (array, f, thisArg) => {
      for (let i = 0; i < array.elements.length; i += 1) {
        if (truthy(visit(array, f, thisArg, i))) {
          return array.elements[i]
        }
      }
      return undefined
    })],
    ['findIndex', iterateWith('findIndex', (array, f, thisArg) => {
      for (let i = 0; i < array.elements.length; i += 1) {
        if (truthy(visit(array, f, thisArg, i))) {
          return i
        }
      }
      return -1
    })],
    ['some', iterateWith('some', (array, f, thisArg) => {
      for (let i = 0; i < array.elements.length; i += 1) {
        if (truthy(visit(array, f, thisArg, i))) {
          return true
        }
      }
      return false
    })],
    ['every', iterateWith('every', (array, f, thisArg) => {
      for (let i = 0; i < array.elements.length; i += 1) {
        if (!truthy(visit(array, f, thisArg, i))) {
          return false
        }
      }
      return true
    })],
    ['reduce', reduce('reduce', false)],
    ['reduceRight', reduce('reduceRight', true)],
    ['reverse', fn('reverse', 0, (thisVal) => {
      const array = thisArray(thisVal, 'reverse')
      array.elements.reverse()
      return array
    })],
    ['sort', fn('sort', 1, (thisVal, [compare]) => {
      const array = thisArray(thisVal, 'sort')
      if (compare === undefined) {
        array.elements.sort(defaultCompare)
      } else {
        const f = callable(compare)
        array.elements.sort((a, b) => {
          if (a === undefined || b === undefined) {
            return defaultCompare(a, b)
          }
          const result = toNumber(realm, realm.call(f, undefined, [a, b]))
          return Number.isNaN(result) ? 0 : result
        })
      }
      return array
    })],
    ['fill', fn('fill', 1, (thisVal, [value, start, end]) => {
      const array = thisArray(thisVal, 'fill')
      const length = array.elements.length
      array.elements.fill(
        value,
        relativeIndex(toInteger(realm, start, 0), length),
        relativeIndex(toInteger(realm, end, length), length),
      )
      return array
    })],
    ['flat', fn('flat', 0, (thisVal, [depth]) => realm.newArray(
      flatten(thisArray(thisVal, 'flat').elements, toInteger(realm, depth, 1)),
    ))],
    ['flatMap', iterateWith('flatMap', (array, f, thisArg) => realm.newArray(
      flatten(array.elements.map((_, i) => visit(array, f, thisArg, i)), 1),
    ))],
  ]))
  defineGlobal('Array', ArrayCtor)

  // String.

  const StringCtor = fn('String', 1, (_this, args) => (args.length === 0 ? '' : toStr(realm, args[0])))
  link(StringCtor, StringPrototype)
  install(StringCtor, new Map<string, KiteVal>([
    ['fromCharCode', fn('fromCharCode', 1, (_this, args) => String.fromCharCode(...args.map((a) => toNumber(realm, a))))],
  ]))
  const stringMethod = (name: string, arity: number, impl: (s: string, args: KiteVal[]) => KiteVal) => fn(
    name,
    arity,
    (thisVal, args) => impl(thisString(thisVal, name), args),
  )
  const replacer = (replacement: KiteVal) => {
    if (isCallable(replacement)) {
      return (match: string) => toStr(realm, realm.call(replacement, undefined, [match]))
    }
    const text = toStr(realm, replacement)
    return () => text
  }
  install(StringPrototype, new Map<string, KiteVal>([
    ['charAt', stringMethod('charAt', 1, (s, [i]) => s.charAt(toInteger(realm, i, 0)))],
    ['charCodeAt', stringMethod('charCodeAt', 1, (s, [i]) => s.charCodeAt(toInteger(realm, i, 0)))],
    ['at', stringMethod('at', 1, (s, [i]) => s.at(toInteger(realm, i, 0)))],
    ['indexOf', stringMethod('indexOf', 1, (s, [search, from]) => s.indexOf(toStr(realm, search), toInteger(realm, from, 0)))],
    ['lastIndexOf', stringMethod('lastIndexOf', 1, (s, [search]) => s.lastIndexOf(toStr(realm, search)))],
    ['includes', stringMethod('includes', 1, (s, [search]) => s.includes(toStr(realm, search)))],
    ['startsWith', stringMethod('startsWith', 1, (s, [search]) => s.startsWith(toStr(realm, search)))],
    ['endsWith', stringMethod('endsWith', 1, (s, [search]) => s.endsWith(toStr(realm, search)))],
    ['slice', stringMethod('slice', 2, (s, [start, end]) => s.slice(
      toInteger(realm, start, 0),
      toInteger(realm, end, s.length),
    ))],
    ['substring', stringMethod('substring', 2, (s, [start, end]) => s.substring(
      toInteger(realm, start, 0),
      toInteger(realm, end, s.length),
    ))],
    ['toUpperCase', stringMethod('toUpperCase', 0, (s) => s.toUpperCase())],
    ['toLowerCase', stringMethod('toLowerCase', 0, (s) => s.toLowerCase())],
    ['trim', stringMethod('trim', 0, (s) => s.trim())],
    ['trimStart', stringMethod('trimStart', 0, (s) => s.trimStart())],
    ['trimEnd', stringMethod('trimEnd', 0, (s) => s.trimEnd())],
    ['padStart', stringMethod('padStart', 2, (s, [length, pad]) => s.padStart(
      toInteger(realm, length, 0),
      pad === undefined ? ' ' : toStr(realm, pad),
    ))],
    ['padEnd', stringMethod('padEnd', 2, (s, [length, pad]) => s.padEnd(
      toInteger(realm, length, 0),
      pad === undefined ? ' ' : toStr(realm, pad),
    ))],
    ['repeat', stringMethod('repeat', 1, (s, [count]) => {
      const n = toInteger(realm, count, 0)
      if (n < 0 || n === Infinity) {
        return realm.throwError('RangeError', `Invalid count value: ${numberToString(n)}`)
      }
      return s.repeat(n)
    })],
    ['split', stringMethod('split', 2, (s, [separator, limit]) => realm.newArray(
      separator === undefined
        ? [s]
        : s.split(toStr(realm, separator), limit === undefined ? undefined : toInteger(realm, limit, 0)),
    ))],
    ['concat', stringMethod('concat', 1, (s, args) => s + args.map((a) => toStr(realm, a)).join(''))],
    ['replace', stringMethod('replace', 2, (s, [pattern, replacement]) => s.replace(
      toStr(realm, pattern),
      replacer(replacement),
    ))],
    ['replaceAll', stringMethod('replaceAll', 2, (s, [pattern, replacement]) => s.replaceAll(
      toStr(realm, pattern),
      replacer(replacement),
    ))],
    ['toString', stringMethod('toString', 0, (s) => s)],
    ['valueOf', stringMethod('valueOf', 0, (s) => s)],
  ]))
  defineGlobal('String', StringCtor)

  // Number and Boolean.

  const NumberCtor = fn('Number', 1, (_this, args) => (args.length === 0 ? 0 : toNumber(realm, args[0])))
  link(NumberCtor, NumberPrototype)
  install(NumberCtor, new Map<string, KiteVal>([
    ['isInteger', fn('isInteger', 1, (_this, [x]) => Number.isInteger(x))],
    ['isFinite', fn('isFinite', 1, (_this, [x]) => Number.isFinite(x))],
    ['isNaN', fn('isNaN', 1, (_this, [x]) => Number.isNaN(x))],
    ['isSafeInteger', fn('isSafeInteger', 1, (_this, [x]) => Number.isSafeInteger(x))],
    ['parseInt', parseIntFn],
    ['parseFloat', parseFloatFn],
    ['MAX_SAFE_INTEGER', Number.MAX_SAFE_INTEGER],
    ['MIN_SAFE_INTEGER', Number.MIN_SAFE_INTEGER],
    ['EPSILON', Number.EPSILON],
    ['MAX_VALUE', Number.MAX_VALUE],
    ['MIN_VALUE', Number.MIN_VALUE],
    ['POSITIVE_INFINITY', Infinity],
    ['NEGATIVE_INFINITY', -Infinity],
    ['NaN', NaN],
  ]))
  install(NumberPrototype, new Map<string, KiteVal>([
    ['toString', fn('toString', 1, (thisVal, [radix]) => {
      const n = thisNumber(thisVal, 'toString')
      const r = toInteger(realm, radix, 10)
      if (r < 2 || r > 36) {
        return realm.throwError('RangeError', 'toString() radix must be between 2 and 36')
      }
      return r === 10 ? numberToString(n) : n.toString(r)
    })],
    ['toFixed', fn('toFixed', 1, (thisVal, [digits]) => {
      const n = thisNumber(thisVal, 'toFixed')
      const d = toInteger(realm, digits, 0)
      if (d < 0 || d > 100) {
        return realm.throwError('RangeError', 'toFixed() digits argument must be between 0 and 100')
      }
      return n.toFixed(d)
    })],
    ['valueOf', fn('valueOf', 0, (thisVal) => thisNumber(thisVal, 'valueOf'))],
  ]))
  defineGlobal('Number', NumberCtor)

  const BooleanCtor = fn('Boolean', 1, (_this, [value]) => truthy(value))
  link(BooleanCtor, BooleanPrototype)
  install(BooleanPrototype, new Map<string, KiteVal>([
    ['toString', fn('toString', 0, (thisVal) => String(thisVal === true))],
    ['valueOf', fn('valueOf', 0, (thisVal) => thisVal === true)],
  ]))
  defineGlobal('Boolean', BooleanCtor)

  // Errors.

  const makeErrorCtor = (kind: RuntimeErrorKind, proto: KiteObject) => {
    const create = (args: KiteVal[], errorProto: KiteObject) => {
      const error = new KiteErrorObject(errorProto)
      if (args[0] !== undefined) {
        error.defineHidden('message', toStr(realm, args[0]))
      }
      return error
    }
    const ctor = realm.native(
      kind,
      1,
      (_realm, _this, args) => create(args, proto),
      (_realm, args, newTarget) => create(args, realm.prototypeFor(newTarget, proto)),
    )
    link(ctor, proto)
    proto.defineHidden('name', kind)
    proto.defineHidden('message', '')
    defineGlobal(kind, ctor)
    return ctor
  }
  const ErrorCtor = makeErrorCtor('Error', ErrorPrototype)
  ErrorPrototype.defineHidden('toString', fn('toString', 0, (thisVal) => {
    const name = realm.getProperty(thisVal, 'name')
    const message = realm.getProperty(thisVal, 'message')
    const nameStr = name === undefined ? 'Error' : toStr(realm, name)
    const messageStr = message === undefined ? '' : toStr(realm, message)
    if (messageStr === '') {
      return nameStr
    }
    return nameStr === '' ? messageStr : `${nameStr}: ${messageStr}`
  }))
  for (const [kind, proto] of realm.errorPrototypes) {
    if (kind !== 'Error') {
      makeErrorCtor(kind, proto).proto = ErrorCtor
    }
  }

  // Math.

  const math = realm.newObject()
  const unary: [string, (x: number) => number][] = [
    ['abs', Math.abs], ['floor', Math.floor], ['ceil', Math.ceil], ['round', Math.round],
    ['trunc', Math.trunc], ['sign', Math.sign], ['sqrt', Math.sqrt], ['cbrt', Math.cbrt],
    ['log', Math.log], ['log2', Math.log2], ['log10', Math.log10], ['exp', Math.exp],
    ['sin', Math.sin], ['cos', Math.cos], ['tan', Math.tan], ['atan', Math.atan],
  ]
  const variadic: [string, (...xs: number[]) => number][] = [
    ['max', Math.max], ['min', Math.min], ['hypot', Math.hypot],
  ]
  install(math, new Map<string, KiteVal>([
    ...unary.map(([name, f]): [string, KiteVal] => [name, fn(name, 1, (_this, [x]) => f(toNumber(realm, x)))]),
    ...variadic.map(([name, f]): [string, KiteVal] => [
      name,
      fn(name, 2, (_this, args) => f(...args.map((x) => toNumber(realm, x)))),
    ]),
    ['pow', fn('pow', 2, (_this, [x, y]) => toNumber(realm, x) ** toNumber(realm, y))],
    ['atan2', fn('atan2', 2, (_this, [y, x]) => Math.atan2(toNumber(realm, y), toNumber(realm, x)))],
    ['random', fn('random', 0, () => Math.random())],
    ['PI', Math.PI],
    ['E', Math.E],
    ['LN2', Math.LN2],
    ['LN10', Math.LN10],
    ['SQRT2', Math.SQRT2],
  ]))
  defineGlobal('Math', math)

  // JSON.

  const fromJson = (value: unknown): KiteVal => {
    if (Array.isArray(value)) {
      return realm.newArray(value.map(fromJson))
    } else if (typeof value === 'object' && value !== null) {
      const obj = realm.newObject()
      for (const [key, v] of Object.entries(value)) {
        obj.setOwn(key, fromJson(v))
      }
      return obj
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return value
    }
    return null
  }
  const stringify = (value: KiteVal, indent: string, currentIndent: string, seen: KiteObject[]): string | undefined => {
    if (value === null || typeof value === 'boolean') {
      return String(value)
    } else if (typeof value === 'number') {
      return Number.isFinite(value) ? numberToString(value) : 'null'
    } else if (typeof value === 'string') {
      return JSON.stringify(value)
    } else if (value === undefined || value instanceof KiteFunction) {
      return undefined
    } else if (value instanceof KiteDate) {
      return Number.isNaN(value.time) ? 'null' : JSON.stringify(dateString(value.time))
    }
    if (seen.includes(value)) {
      return realm.throwError('TypeError', 'Converting circular structure to JSON')
    }
    const inner = currentIndent + indent
    const open = indent === '' ? '' : `\n${inner}`
    const close = indent === '' ? '' : `\n${currentIndent}`
    const separator = indent === '' ? ',' : `,\n${inner}`
    seen.push(value)
    try {
      if (value instanceof KiteArray) {
        if (value.elements.length === 0) {
          return '[]'
        }
        const items = value.elements.map((e) => stringify(e, indent, inner, seen) ?? 'null')
        return `[${open}${items.join(separator)}${close}]`
      }
      const items: string[] = []
      for (const key of value.ownKeys()) {
        const item = stringify(realm.getProperty(value, key), indent, inner, seen)
        if (item !== undefined) {
          items.push(`${JSON.stringify(key)}:${indent === '' ? '' : ' '}${item}`)
        }
      }
      if (items.length === 0) {
        return '{}'
      }
      return `{${open}${items.join(separator)}${close}}`
    } finally {
      seen.pop()
    }
  }
  const json = realm.newObject()
  install(json, new Map<string, KiteVal>([
    ['parse', fn('parse', 1, (_this, [text]) => {
      let parsed: unknown
      try {
        parsed = JSON.parse(toStr(realm, text))
      } catch (e) {
        if (e instanceof SyntaxError) {
          return realm.throwError('SyntaxError', e.message)
        }
        throw e
      }
      return fromJson(parsed)
    })],
    ['stringify', fn('stringify', 3, (_this, [value, _replacer, space]) => {
      let indent = ''
      if (typeof space === 'number') {
        indent = ' '.repeat(Math.min(Math.max(Math.trunc(space), 0), 10))
      } else if (typeof space === 'string') {
        indent = space.slice(0, 10)
      }
      return stringify(value, indent, '', [])
    })],
  ]))
  defineGlobal('JSON', json)

  // Map and Set. keys(), values() and entries() return arrays.

  const incompatible = (type: string, name: string, thisVal: KiteVal) => realm.throwError(
    'TypeError',
    `Method ${type}.prototype.${name} called on incompatible receiver ${inspect(thisVal)}`,
  )
  const thisMap = (thisVal: KiteVal, name: string): KiteMap => (
    thisVal instanceof KiteMap ? thisVal : incompatible('Map', name, thisVal)
  )
  const thisSet = (thisVal: KiteVal, name: string): KiteSet => (
    thisVal instanceof KiteSet ? thisVal : incompatible('Set', name, thisVal)
  )

  const MapPrototype = realm.newObject()
  const MapCtor = realm.native(
    'Map',
    0,
    () => realm.throwError('TypeError', "Constructor Map requires 'new'"),
    (_realm, [iterable], newTarget) => {
      const map = new KiteMap(realm.prototypeFor(newTarget, MapPrototype))
      if (iterable !== undefined && iterable !== null) {
        for (const entry of toArray(iterable)) {
          if (!isObject(entry)) {
            return realm.throwError('TypeError', `Iterator value ${inspect(entry)} is not an entry object`)
          }
          map.entries.set(normalizeKey(realm.getProperty(entry, '0')), realm.getProperty(entry, '1'))
        }
      }
      return map
    },
  )
  link(MapCtor, MapPrototype)
  install(MapPrototype, new Map<string, KiteVal>([
    ['get', fn('get', 1, (thisVal, [key]) => thisMap(thisVal, 'get').entries.get(normalizeKey(key)))],
    ['set', fn('set', 2, (thisVal, [key, value]) => {
      const map = thisMap(thisVal, 'set')
      map.entries.set(normalizeKey(key), value)
      return map
    })],
    ['has', fn('has', 1, (thisVal, [key]) => thisMap(thisVal, 'has').entries.has(normalizeKey(key)))],
    ['delete', fn('delete', 1, (thisVal, [key]) => thisMap(thisVal, 'delete').entries.delete(normalizeKey(key)))],
    ['clear', fn('clear', 0, (thisVal) => {
      thisMap(thisVal, 'clear').entries.clear()
      return undefined
    })],
    ['forEach', fn('forEach', 1, (thisVal, [callback, thisArg]) => {
      const map = thisMap(thisVal, 'forEach')
      const f = callable(callback)
      for (const [key, value] of map.entries) {
        realm.call(f, thisArg, [value, key, map])
      }
      return undefined
    })],
    ['keys', fn('keys', 0, (thisVal) => realm.newArray([...thisMap(thisVal, 'keys').entries.keys()]))],
    ['values', fn('values', 0, (thisVal) => realm.newArray([...thisMap(thisVal, 'values').entries.values()]))],
    ['entries', fn('entries', 0, (thisVal) => realm.newArray([...realm.mapEntries(thisMap(thisVal, 'entries'))]))],
  ]))
  MapPrototype.defineAccessor('size', 'get', fn('get size', 0, (thisVal) => thisMap(thisVal, 'size').entries.size), true)
  defineGlobal('Map', MapCtor)

  const SetPrototype = realm.newObject()
  const SetCtor = realm.native(
    'Set',
    0,
    () => realm.throwError('TypeError', "Constructor Set requires 'new'"),
    (_realm, [iterable], newTarget) => {
      const set = new KiteSet(realm.prototypeFor(newTarget, SetPrototype))
      if (iterable !== undefined && iterable !== null) {
        for (const member of toArray(iterable)) {
          set.members.add(normalizeKey(member))
        }
      }
      return set
    },
  )
  link(SetCtor, SetPrototype)
  const setValues = fn('values', 0, (thisVal) => realm.newArray([...thisSet(thisVal, 'values').members]))
  install(SetPrototype, new Map<string, KiteVal>([
    ['add', fn('add', 1, (thisVal, [value]) => {
      const set = thisSet(thisVal, 'add')
      set.members.add(normalizeKey(value))
      return set
    })],
    ['has', fn('has', 1, (thisVal, [value]) => thisSet(thisVal, 'has').members.has(normalizeKey(value)))],
    ['delete', fn('delete', 1, (thisVal, [value]) => thisSet(thisVal, 'delete').members.delete(normalizeKey(value)))],
    ['clear', fn('clear', 0, (thisVal) => {
      thisSet(thisVal, 'clear').members.clear()
      return undefined
    })],
    ['forEach', fn('forEach', 1, (thisVal, [callback, thisArg]) => {
      const set = thisSet(thisVal, 'forEach')
      const f = callable(callback)
      for (const member of set.members) {
        realm.call(f, thisArg, [member, member, set])
      }
      return undefined
    })],
    ['values', setValues],
    ['keys', setValues],
    ['entries', fn('entries', 0, (thisVal) => realm.newArray(
      [...thisSet(thisVal, 'entries').members].map((m) => realm.newArray([m, m])),
    ))],
  ]))
  SetPrototype.defineAccessor('size', 'get', fn('get size', 0, (thisVal) => thisSet(thisVal, 'size').members.size), true)
  defineGlobal('Set', SetCtor)

  // Date. The clock is the scheduler's, which starts at the epoch and
  // moves only when a timer fires. The local time zone is UTC.

  const utc = (args: KiteVal[]) => {
    const [year, month = 0, day = 1, hours = 0, minutes = 0, seconds = 0, ms = 0] = args.map((a) => toNumber(realm, a))
    return Date.UTC(year, month, day, hours, minutes, seconds, ms)
  }
  const DatePrototype = realm.newObject()
  const DateCtor = realm.native(
    'Date',
    7,
    () => new Date(realm.scheduler.now).toUTCString(),
    (_realm, args, newTarget) => {
      let time = realm.scheduler.now
      if (args.length === 1) {
        const [value] = args
        if (value instanceof KiteDate) {
          time = value.time
        } else {
          const primitive = toPrimitive(realm, value)
          time = typeof primitive === 'string' ? Date.parse(primitive) : toNumber(realm, primitive)
        }
      } else if (args.length > 1) {
        time = utc(args)
      }
      return new KiteDate(realm.prototypeFor(newTarget, DatePrototype), timeClip(time))
    },
  )
  link(DateCtor, DatePrototype)
  install(DateCtor, new Map<string, KiteVal>([
    ['now', fn('now', 0, () => realm.scheduler.now)],
    ['parse', fn('parse', 1, (_this, [s]) => timeClip(Date.parse(toStr(realm, s))))],
    ['UTC', fn('UTC', 7, (_this, args) => timeClip(utc(args)))],
  ]))
  const thisTime = (thisVal: KiteVal, name: string): number => {
    if (!(thisVal instanceof KiteDate)) {
      return realm.throwError('TypeError', `Date.prototype.${name} called on incompatible receiver ${inspect(thisVal)}`)
    }
    return thisVal.time
  }
  const dateField = (name: string, get: (date: Date) => number): [string, KiteVal] => [
    name,
    fn(name, 0, (thisVal) => get(new Date(thisTime(thisVal, name)))),
  ]
  const fields: [string, (date: Date) => number][] = [
    ['FullYear', (d) => d.getUTCFullYear()],
    ['Month', (d) => d.getUTCMonth()],
    ['Date', (d) => d.getUTCDate()],
    ['Day', (d) => d.getUTCDay()],
    ['Hours', (d) => d.getUTCHours()],
    ['Minutes', (d) => d.getUTCMinutes()],
    ['Seconds', (d) => d.getUTCSeconds()],
    ['Milliseconds', (d) => d.getUTCMilliseconds()],
  ]
  install(DatePrototype, new Map<string, KiteVal>([
    ['getTime', fn('getTime', 0, (thisVal) => thisTime(thisVal, 'getTime'))],
    ['valueOf', fn('valueOf', 0, (thisVal) => thisTime(thisVal, 'valueOf'))],
    ['toISOString', fn('toISOString', 0, (thisVal) => {
      const time = thisTime(thisVal, 'toISOString')
      return Number.isNaN(time) ? realm.throwError('RangeError', 'Invalid time value') : dateString(time)
    })],
    ['toJSON', fn('toJSON', 1, (thisVal) => {
      const time = thisTime(thisVal, 'toJSON')
      return Number.isNaN(time) ? null : dateString(time)
    })],
    ['toString', fn('toString', 0, (thisVal) => new Date(thisTime(thisVal, 'toString')).toUTCString())],
    ...fields.flatMap(([field, get]) => [dateField(`get${field}`, get), dateField(`getUTC${field}`, get)]),
  ]))
  defineGlobal('Date', DateCtor)
  const performance = realm.newObject()
  install(performance, new Map<string, KiteVal>([
    ['now', fn('now', 0, () => realm.scheduler.now)],
  ]))
  defineGlobal('performance', performance)

  // Promise.

  const PromiseCtor = realm.native(
    'Promise',
    1,
    () => realm.throwError('TypeError', "Promise constructor cannot be invoked without 'new'"),
    (_realm, [executor], newTarget) => {
      if (!isCallable(executor)) {
        return realm.throwError('TypeError', `Promise resolver ${inspect(executor)} is not a function`)
      }
      const promise = new KitePromise(realm.prototypeFor(newTarget, PromisePrototype))
      const [resolve, reject] = resolvingFunctions(realm, promise)
      try {
        realm.call(executor, undefined, [resolve, reject])
      } catch (e) {
        if (e instanceof KiteThrow) {
          realm.call(reject, undefined, [e.value])
        } else {
          throw e
        }
      }
      return promise
    },
  )
  link(PromiseCtor, PromisePrototype)

  // Settle `result` from each of `items` once they all settle, as
  // Promise.all and Promise.allSettled do.
  const combine = (
    items: KiteVal[],
    onFulfilled: (value: KiteVal) => KiteVal,
    onRejected: ((reason: KiteVal) => KiteVal) | undefined,
  ) => {
    const result = newPromise(realm)
    const values: KiteVal[] = new Array<KiteVal>(items.length).fill(undefined)
    let remaining = items.length
    if (remaining === 0) {
      resolvePromise(realm, result, realm.newArray([]))
    }
    items.forEach((item, index) => {
      const settled = (value: KiteVal) => {
        values[index] = value
        remaining -= 1
        if (remaining === 0) {
          resolvePromise(realm, result, realm.newArray(values))
        }
      }
      performThen(
        realm,
        promiseResolve(realm, item),
        (value) => settled(onFulfilled(value)),
        (reason) => {
          if (onRejected === undefined) {
            rejectPromise(realm, result, reason)
          } else {
            settled(onRejected(reason))
          }
        },
      )
    })
    return result
  }
  const outcome = (status: string, key: string, value: KiteVal) => {
    const obj = realm.newObject()
    obj.setOwn('status', status)
    obj.setOwn(key, value)
    return obj
  }
  install(PromiseCtor, new Map<string, KiteVal>([
    ['resolve', fn('resolve', 1, (_this, [value]) => promiseResolve(realm, value))],
    ['reject', fn('reject', 1, (_this, [reason]) => rejectedPromise(realm, reason))],
    ['all', fn('all', 1, (_this, [iterable]) => combine(toArray(iterable), (value) => value, undefined))],
    ['allSettled', fn('allSettled', 1, (_this, [iterable]) => combine(
      toArray(iterable),
      (value) => outcome('fulfilled', 'value', value),
      (reason) => outcome('rejected', 'reason', reason),
    ))],
    ['race', fn('race', 1, (_this, [iterable]) => {
      const result = newPromise(realm)
      for (const item of toArray(iterable)) {
        performThen(
          realm,
          promiseResolve(realm, item),
          (value) => resolvePromise(realm, result, value),
          (reason) => rejectPromise(realm, result, reason),
        )
      }
      return result
    })],
  ]))
  install(PromisePrototype, new Map<string, KiteVal>([
    ['then', fn('then', 2, (thisVal, [onFulfilled, onRejected]) => then(
      realm,
      thisPromise(thisVal, 'then'),
      onFulfilled,
      onRejected,
    ))],
    ['catch', fn('catch', 1, (thisVal, [onRejected]) => then(
      realm,
      thisPromise(thisVal, 'catch'),
      undefined,
      onRejected,
    ))],
    ['finally', fn('finally', 1, (thisVal, [onFinally]) => {
      const promise = thisPromise(thisVal, 'finally')
      if (!isCallable(onFinally)) {
        return then(realm, promise, onFinally, onFinally)
      }
      const runFinally = (after: NativeFn) => then(
        realm,
        promiseResolve(realm, realm.call(onFinally, undefined, [])),
        after,
        undefined,
      )
      return then(
        realm,
        promise,
        fn('', 1, (_this, [value]) => runFinally(fn('', 0, () => value))),
        fn('', 1, (_this, [reason]) => runFinally(fn('', 0, () => realm.throwValue(reason)))),
      )
    })],
  ]))
  defineGlobal('Promise', PromiseCtor)
}
