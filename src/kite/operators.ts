// Kite operators and type coercions, shared by both evaluators.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import type {BinaryOp} from './ast.js'
import {
  KiteBoundFunction, KiteDate, KiteFunction, KiteVal, isCallable, isObject, protoChain,
} from './data.js'
import type {Realm} from './realm.js'

export function truthy(value: KiteVal): boolean {
  if (isObject(value)) {
    return true
  }
  return Boolean(value)
}

export function typeOf(value: KiteVal): string {
  if (value === null) {
    return 'object'
  } else if (value instanceof KiteFunction) {
    return 'function'
  } else if (isObject(value)) {
    return 'object'
  }
  return typeof value
}

export function numberToString(n: number) {
  return String(n)
}

export function toPrimitive(realm: Realm, value: KiteVal, hint: 'number' | 'string' | 'default' = 'default'): KiteVal {
  if (!isObject(value)) {
    return value
  }
  // Dates convert as strings unless a number is asked for.
  const stringFirst = hint === 'string' || (hint === 'default' && value instanceof KiteDate)
  const methods = stringFirst ? ['toString', 'valueOf'] : ['valueOf', 'toString']
  for (const name of methods) {
    const method = realm.getProperty(value, name)
    if (isCallable(method)) {
      const result = realm.call(method, value, [])
      if (!isObject(result)) {
        return result
      }
    }
  }
  return realm.throwError('TypeError', 'Cannot convert object to primitive value')
}

export function toNumber(realm: Realm, value: KiteVal): number {
  if (value === undefined) {
    return NaN
  } else if (value === null) {
    return 0
  } else if (typeof value === 'boolean') {
    return value ? 1 : 0
  } else if (typeof value === 'number') {
    return value
  } else if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed === '' ? 0 : Number(trimmed)
  }
  return toNumber(realm, toPrimitive(realm, value, 'number'))
}

export function toStr(realm: Realm, value: KiteVal): string {
  if (typeof value === 'string') {
    return value
  } else if (typeof value === 'number') {
    return numberToString(value)
  } else if (isObject(value)) {
    return toStr(realm, toPrimitive(realm, value, 'string'))
  }
  return String(value)
}

export function toPropertyKey(realm: Realm, value: KiteVal): string {
  return toStr(realm, value)
}

export function add(realm: Realm, left: KiteVal, right: KiteVal): KiteVal {
  const l = toPrimitive(realm, left)
  const r = toPrimitive(realm, right)
  if (typeof l === 'string' || typeof r === 'string') {
    return toStr(realm, l) + toStr(realm, r)
  }
  return toNumber(realm, l) + toNumber(realm, r)
}

export function strictEquals(left: KiteVal, right: KiteVal) {
  return left === right
}

export function looseEquals(realm: Realm, left: KiteVal, right: KiteVal): boolean {
  if (left === null || left === undefined) {
    return right === null || right === undefined
  } else if (right === null || right === undefined) {
    return false
  } else if (typeof left === typeof right) {
    return left === right
  } else if (typeof left === 'boolean') {
    return looseEquals(realm, toNumber(realm, left), right)
  } else if (typeof right === 'boolean') {
    return looseEquals(realm, left, toNumber(realm, right))
  } else if (typeof left === 'number' && typeof right === 'string') {
    return left === toNumber(realm, right)
  } else if (typeof left === 'string' && typeof right === 'number') {
    return toNumber(realm, left) === right
  } else if (isObject(left) && !isObject(right)) {
    return looseEquals(realm, toPrimitive(realm, left), right)
  } else if (isObject(right) && !isObject(left)) {
    return looseEquals(realm, left, toPrimitive(realm, right))
  }
  return false
}

function compare(realm: Realm, op: '<' | '>' | '<=' | '>=', left: KiteVal, right: KiteVal): boolean {
  const l = toPrimitive(realm, left, 'number')
  const r = toPrimitive(realm, right, 'number')
  if (typeof l === 'string' && typeof r === 'string') {
    switch (op) {
      case '<': return l < r
      case '>': return l > r
      case '<=': return l <= r
      default: return l >= r
    }
  }
  const a = toNumber(realm, l)
  const b = toNumber(realm, r)
  switch (op) {
    case '<': return a < b
    case '>': return a > b
    case '<=': return a <= b
    default: return a >= b
  }
}

export function instanceOf(realm: Realm, value: KiteVal, target: KiteVal): boolean {
  if (!isCallable(target)) {
    return realm.throwError('TypeError', "Right-hand side of 'instanceof' is not callable")
  }
  const fn = target instanceof KiteBoundFunction ? target.target : target
  if (!isObject(value)) {
    return false
  }
  const proto = realm.getProperty(fn, 'prototype')
  if (!isObject(proto)) {
    return realm.throwError('TypeError', "Function has non-object prototype 'undefined' in instanceof check")
  }
  for (const o of protoChain(value.proto)) {
    if (o === proto) {
      return true
    }
  }
  return false
}

export function hasProperty(realm: Realm, key: KiteVal, target: KiteVal): boolean {
  const name = toPropertyKey(realm, key)
  if (!isObject(target)) {
    return realm.throwError('TypeError', `Cannot use 'in' operator to search for '${name}' in ${toStr(realm, target)}`)
  }
  for (const o of protoChain(target)) {
    if (o.hasOwn(name)) {
      return true
    }
  }
  return false
}

export function binaryOp(realm: Realm, op: BinaryOp, left: KiteVal, right: KiteVal): KiteVal {
  switch (op) {
    case '+':
      return add(realm, left, right)
    case '-':
      return toNumber(realm, left) - toNumber(realm, right)
    case '*':
      return toNumber(realm, left) * toNumber(realm, right)
    case '/':
      return toNumber(realm, left) / toNumber(realm, right)
    case '%':
      return toNumber(realm, left) % toNumber(realm, right)
    case '**':
      return toNumber(realm, left) ** toNumber(realm, right)
    case '==':
      return looseEquals(realm, left, right)
    case '!=':
      return !looseEquals(realm, left, right)
    case '===':
      return strictEquals(left, right)
    case '!==':
      return !strictEquals(left, right)
    case '<':
    case '>':
    case '<=':
    case '>=':
      return compare(realm, op, left, right)
    case 'instanceof':
      return instanceOf(realm, left, right)
    case 'in':
      return hasProperty(realm, left, right)
    default:
      return realm.throwError('TypeError', `Unknown operator ${String(op)}`)
  }
}

// Numeric literal arithmetic without a realm, for constant folding. Returns
// undefined when the operation is not foldable.
export function foldNumbers(op: BinaryOp, left: number, right: number): number | undefined {
  switch (op) {
    case '+': return left + right
    case '-': return left - right
    case '*': return left * right
    case '/': return left / right
    case '%': return left % right
    case '**': return left ** right
    default: return undefined
  }
}
