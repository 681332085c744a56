import test from 'ava'

import {display, inspect, quote} from './display.js'
import {testGroup} from '../testutil.js'

test('quote picks a quote character not in the string', (t) => {
  t.is(quote('plain'), "'plain'")
  t.is(quote("it's"), '"it\'s"')
  t.is(quote('it\'s "so"'), '`it\'s "so"`')
  t.is(quote('a\nb\\'), "'a\\nb\\\\'")
  t.is(quote('\u0001'), "'\\x01'")
})

test('Top-level strings are shown bare', (t) => {
  t.is(display('hi'), 'hi')
  t.is(inspect('hi'), "'hi'")
  t.is(display(-0), '-0')
  t.is(display(1e21), '1e+21')
  t.is(display(undefined), 'undefined')
  t.is(display(null), 'null')
})

testGroup('Objects and arrays', [
  ['({})', '{}'],
  ['[]', '[]'],
  ['({a: 1, "b c": "d"})', "{ a: 1, 'b c': 'd' }"],
  ['({a: {b: {c: {d: 1}}}})', '{ a: { b: { c: [Object] } } }'],
  ['[1, [2, [3, [4]]]]', '[ 1, [ 2, [ 3, [Array] ] ] ]'],
  ['const o = {}; o.self = o; o', '{ self: [Circular] }'],
  ['const a = [1]; a.extra = true; a', '[ 1, extra: true ]'],
  ['Object.create(null)', '[Object: null prototype] {}'],
  ['class P { constructor() { this.x = 1 } } new P()', 'P { x: 1 }'],
])

testGroup('Functions and classes', [
  ['function f() {} f', '[Function: f]'],
  ['(() => 1)', '[Function (anonymous)]'],
  ['const g = () => 1; g', '[Function: g]'],
  ['async function h() {} h', '[AsyncFunction: h]'],
  ['class A {} A', '[class A]'],
  ['class A {} class B extends A {} B', '[class B extends A]'],
  ['function f() {} f.tag = 1; f', '[Function: f] { tag: 1 }'],
])

testGroup('Errors and promises', [
  ['new TypeError("bad")', 'TypeError: bad'],
  ['[new RangeError("far")]', '[ [RangeError: far] ]'],
  ['new Error()', 'Error'],
  ['new Promise(() => {})', 'Promise { <pending> }'],
  ['Promise.resolve(3)', 'Promise { 3 }'],
])

testGroup('Accessors, collections and dates', [
  ['({get x() { return 1 }})', '{ x: [Getter] }'],
  ['({set x(v) {}})', '{ x: [Setter] }'],
  ['({a: 1, get x() { return 1 }, set x(v) {}})', '{ a: 1, x: [Getter/Setter] }'],
  ['new Map([[1, {a: "b"}]])', "Map(1) { 1 => { a: 'b' } }"],
  ['[new Set(["x"]), new Date(86400000)]', "[ Set(1) { 'x' }, 1970-01-02T00:00:00.000Z ]"],
])
