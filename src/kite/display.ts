// Render Kite values for print and console output.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {
  KiteArray, KiteBoundFunction, KiteClass, KiteClosure, KiteDate, KiteErrorObject,
  KiteFunction, KiteMap, KiteNamespace, KiteObject, KiteSet, KiteVal, protoChain,
} from './data.js'
import {numberToString} from './operators.js'
import {KitePromise} from './promise.js'

// Objects nested deeper than this are abbreviated.
const maxDepth = 2

const identifierRegExp = /^[A-Za-z_$][\w$]*$/

const namedEscapes = new Map([
  ['\n', '\\n'], ['\t', '\\t'], ['\r', '\\r'], ['\b', '\\b'], ['\f', '\\f'], ['\v', '\\v'], ['\\', '\\\\'],
])

export function quote(s: string): string {
  let q = "'"
  if (s.includes("'")) {
    if (!s.includes('"')) {
      q = '"'
    } else if (!s.includes('`')) {
      q = '`'
    }
  }
  let body = ''
  for (const c of s) {
    const named = namedEscapes.get(c)
    if (named !== undefined) {
      body += named
    } else if (c === q) {
      body += `\\${c}`
    } else if (c < ' ') {
      body += `\\x${c.charCodeAt(0).toString(16).padStart(2, '0').toUpperCase()}`
    } else {
      body += c
    }
  }
  return `${q}${body}${q}`
}

function formatKey(key: string) {
  return identifierRegExp.test(key) ? key : quote(key)
}

// Look up a property without running any guest code.
function peek(obj: KiteObject, key: string): KiteVal {
  for (const o of protoChain(obj)) {
    if (o.hasOwn(key)) {
      return o.getOwn(key)
    }
  }
  return undefined
}

export function constructorName(obj: KiteObject): string | undefined {
  const ctor = obj.proto === null ? undefined : peek(obj.proto, 'constructor')
  return ctor instanceof KiteFunction ? ctor.name : undefined
}

export function dateString(time: number) {
  return Number.isNaN(time) ? 'Invalid Date' : new Date(time).toISOString()
}

function errorSummary(obj: KiteObject) {
  const name = peek(obj, 'name')
  const message = peek(obj, 'message')
  const nameStr = typeof name === 'string' ? name : 'Error'
  return typeof message === 'string' && message !== '' ? `${nameStr}: ${message}` : nameStr
}

function functionSummary(fn: KiteFunction) {
  if (fn instanceof KiteClass) {
    const name = fn.name === '' ? '(anonymous)' : fn.name
    return fn.parent instanceof KiteFunction ? `[class ${name} extends ${fn.parent.name}]` : `[class ${name}]`
  }
  const label = fn instanceof KiteClosure && fn.node.isAsync ? 'AsyncFunction' : 'Function'
  if (fn instanceof KiteBoundFunction || fn.name !== '') {
    return `[${label}: ${fn.name}]`
  }
  return `[${label} (anonymous)]`
}

class Formatter {
  private seen: KiteObject[] = []

  format(value: KiteVal, depth: number): string {
    if (value === undefined) {
      return 'undefined'
    } else if (value === null) {
      return 'null'
    } else if (typeof value === 'string') {
      return quote(value)
    } else if (typeof value === 'number') {
      return Object.is(value, -0) ? '-0' : numberToString(value)
    } else if (typeof value === 'boolean') {
      return String(value)
    }
    if (this.seen.includes(value)) {
      return '[Circular]'
    }
    this.seen.push(value)
    try {
      return this.formatObject(value, depth)
    } finally {
      this.seen.pop()
    }
  }

  private entries(obj: KiteObject, keys: string[], depth: number) {
    return keys.map((key) => `${formatKey(key)}: ${this.property(obj, key, depth)}`)
  }

  // Accessors are shown without calling them.
  private property(obj: KiteObject, key: string, depth: number) {
    const accessor = obj.getAccessor(key)
    if (accessor === undefined) {
      return this.format(obj.getOwn(key), depth + 1)
    } else if (accessor.get === undefined) {
      return '[Setter]'
    }
    return accessor.set === undefined ? '[Getter]' : '[Getter/Setter]'
  }

  private braces(prefix: string, items: string[]) {
    const body = items.length === 0 ? '{}' : `{ ${items.join(', ')} }`
    return prefix === '' ? body : `${prefix} ${body}`
  }

  private formatObject(obj: KiteObject, depth: number): string {
    if (obj instanceof KiteFunction) {
      const summary = functionSummary(obj)
      const keys = obj.ownKeys()
      if (keys.length === 0 || depth > maxDepth) {
        return summary
      }
      return this.braces(summary, this.entries(obj, keys, depth))
    } else if (obj instanceof KiteErrorObject) {
      const summary = errorSummary(obj)
      return depth === 0 ? summary : `[${summary}]`
    } else if (obj instanceof KitePromise) {
      let state: string
      if (obj.state === 'pending') {
        state = '<pending>'
      } else if (obj.state === 'rejected') {
        state = `<rejected> ${this.format(obj.value, depth + 1)}`
      } else {
        state = this.format(obj.value, depth + 1)
      }
      return `Promise { ${state} }`
    } else if (obj instanceof KiteDate) {
      return dateString(obj.time)
    } else if (obj instanceof KiteMap || obj instanceof KiteSet) {
      const label = obj instanceof KiteMap ? 'Map' : 'Set'
      if (depth > maxDepth) {
        return `[${label}]`
      }
      const items = obj instanceof KiteMap
        ? [...obj.entries].map(([k, v]) => `${this.format(k, depth + 1)} => ${this.format(v, depth + 1)}`)
        : [...obj.members].map((m) => this.format(m, depth + 1))
      const size = obj instanceof KiteMap ? obj.entries.size : obj.members.size
      return this.braces(`${label}(${size})`, items)
    } else if (obj instanceof KiteArray) {
      if (depth > maxDepth) {
        return '[Array]'
      }
      const items = obj.elements.map((e) => this.format(e, depth + 1))
      const extra = obj.ownKeys().slice(obj.elements.length)
      items.push(...this.entries(obj, extra, depth))
      return items.length === 0 ? '[]' : `[ ${items.join(', ')} ]`
    }
    let prefix = ''
    if (obj instanceof KiteNamespace) {
      prefix = '[Module: null prototype]'
    } else if (obj.proto === null) {
      prefix = '[Object: null prototype]'
    } else {
      const name = constructorName(obj)
      if (name !== undefined && name !== '' && name !== 'Object') {
        prefix = name
      }
    }
    if (depth > maxDepth) {
      return prefix === '' || obj.proto === null ? '[Object]' : `[${prefix}]`
    }
    return this.braces(prefix, this.entries(obj, obj.ownKeys(), depth))
  }
}

// Format a value as print and console.log show it: strings at top level
// appear without quotes.
export function display(value: KiteVal): string {
  if (typeof value === 'string') {
    return value
  }
  return new Formatter().format(value, 0)
}

// Format a value as it appears nested inside another.
export function inspect(value: KiteVal): string {
  return new Formatter().format(value, 0)
}
