import {testErrorGroup, testGroup, testOutputGroup} from '../testutil.js'

testGroup('Array methods', [
  ['[3, 1, 2].sort()', '[ 1, 2, 3 ]'],
  ['[10, 9, 1].sort()', '[ 1, 10, 9 ]'],
  ['[10, 9, 1].sort((a, b) => a - b)', '[ 1, 9, 10 ]'],
  ['[1, 2, 3, 4].filter((x) => x % 2 === 0).map((x) => x * x)', '[ 4, 16 ]'],
  ['[1, 2, 3].reduce((acc, x) => acc + x, 10)', '16'],
  ['["a", "b"].reduceRight((acc, x) => acc + x)', 'ba'],
  ['[1, 2, 3].find((x) => x > 1)', '2'],
  ['[1, 2, 3].findIndex((x) => x > 5)', '-1'],
  ['[1, 2, 3].some((x) => x > 2) && [1, 2, 3].every((x) => x > 0)', 'true'],
  ['[1, [2, [3, [4]]]].flat(2)', '[ 1, 2, 3, [ 4 ] ]'],
  ['[1, 2].flatMap((x) => [x, x])', '[ 1, 1, 2, 2 ]'],
  ['const a = [1, 2, 3, 4, 5]; const removed = a.splice(1, 2, "x"); [a.join(), removed.join()].join(" ")', '1,x,4,5 2,3'],
  ['[1, 2, 3].slice(-2)', '[ 2, 3 ]'],
  ['[1, 2].concat([3], 4)', '[ 1, 2, 3, 4 ]'],
  ['[NaN].includes(NaN)', 'true'],
  ['[1, 2, 3].at(-1)', '3'],
  ['Array.from("ab", (c, i) => c + i)', "[ 'a0', 'b1' ]"],
  ['Array.isArray([]) && !Array.isArray({})', 'true'],
  ['new Array(3).fill(0)', '[ 0, 0, 0 ]'],
  ['const a = [1, 2]; a.push(3, 4); a.unshift(0); [a.shift(), a.pop(), a.length].join()', '0,4,3'],
  ['[1, 2, 3].reverse().indexOf(1)', '2'],
  ['const out = []; [5, 6].forEach((x, i) => out.push(i + ":" + x)); out.join()', '0:5,1:6'],
])

testGroup('String methods', [
  ['"Hello".toUpperCase() + "World".toLowerCase()', 'HELLOworld'],
  ['"  pad  ".trim().length', '3'],
  ['"a,b,,c".split(",")', "[ 'a', 'b', '', 'c' ]"],
  ['"abcdef".slice(1, -1)', 'bcde'],
  ['"abcdef".substring(4, 1)', 'bcd'],
  ['"5".padStart(3, "0")', '005'],
  ['"ab".repeat(3)', 'ababab'],
  ['"a-b-c".replace("-", "+")', 'a+b-c'],
  ['"a-b-c".replaceAll("-", (m) => m + m)', 'a--b--c'],
  ['"kite".includes("it") && "kite".startsWith("ki") && "kite".endsWith("te")', 'true'],
  ['"kite".indexOf("t")', '2'],
  ['"abc"[1] + "abc".charAt(2) + "abc".at(-3)', 'bca'],
  ['"A".charCodeAt(0)', '65'],
  ['String.fromCharCode(72, 105)', 'Hi'],
  ['String(null) + String([1, 2])', 'null1,2'],
])

testGroup('Numbers and Math', [
  ['(255).toString(16)', 'ff'],
  ['(1.005).toFixed(1)', '1.0'],
  ['Number("12.5") + Number("")', '12.5'],
  ['Number("x")', 'NaN'],
  ['parseInt("42px") + parseFloat("1.5e1")', '57'],
  ['parseInt("ff", 16)', '255'],
  ['Number.isInteger(5) && !Number.isInteger(5.5)', 'true'],
  ['isNaN("abc")', 'true'],
  ['Math.max() === -Infinity', 'true'],
  ['Math.floor(-1.5) + Math.round(2.5) + Math.abs(-3)', '4'],
  ['Math.pow(2, 8) === 2 ** 8', 'true'],
  ['Math.PI > 3.14', 'true'],
  ['1e21', '1e+21'],
  ['0.000001', '0.000001'],
  ['1e-7', '1e-7'],
])

testGroup('Object functions', [
  ['Object.keys({a: 1, b: 2})', "[ 'a', 'b' ]"],
  ['Object.values({a: 1, b: 2})', '[ 1, 2 ]'],
  ['Object.entries({a: 1})', "[ [ 'a', 1 ] ]"],
  ['Object.assign({a: 1}, {b: 2}, null, {a: 3})', '{ a: 3, b: 2 }'],
  ['Object.fromEntries([["x", 1], ["y", 2]])', '{ x: 1, y: 2 }'],
  ['const p = {}; Object.getPrototypeOf(Object.create(p)) === p', 'true'],
  ['const o = Object.setPrototypeOf({}, {inherited: 1}); o.inherited', '1'],
  ['String({})', '[object Object]'],
  ['Object.keys("hi")', "[ '0', '1' ]"],
])

testGroup('JSON', [
  ['JSON.stringify({a: [1, "two", null], b: undefined, c: true})', '{"a":[1,"two",null],"c":true}'],
  ['JSON.stringify([undefined, () => 1, NaN])', '[null,null,null]'],
  ['JSON.stringify({a: 1, b: [2]}, null, 2)', '{\n  "a": 1,\n  "b": [\n    2\n  ]\n}'],
  ['JSON.stringify("q\\"")', '"q\\""'],
  ['JSON.stringify(undefined)', 'undefined'],
  ['JSON.parse("{\\"a\\": [1, {\\"b\\": null}]}")', '{ a: [ 1, { b: null } ] }'],
  ['JSON.parse("3") + 1', '4'],
])

testGroup('Functions', [
  ['function f(a, b) { return a + b } f.call(null, 1, 2) + f.apply(null, [3, 4])', '10'],
  ['function f(a, b = 2, ...c) {} f.length', '1'],
  ['const g = function () {}; g.name', 'g'],
  ['(function named() {}).name', 'named'],
  ['const o = {m() {}}; o.m.name', 'm'],
  ['function f() { return this.v } const b = f.bind({v: 7}); b.name + " " + b()', 'bound f 7'],
])

testGroup('Map and Set', [
  ['const m = new Map([["a", 1]]); m.set("b", 2).set("a", 3); m', "Map(2) { 'a' => 3, 'b' => 2 }"],
  ['new Map()', 'Map(0) {}'],
  ['const m = new Map(); m.set(NaN, "n").set(-0, "z"); [m.get(NaN), m.get(0), m.size].join()', 'n,z,2'],
  ['const m = new Map([[1, "x"]]); [m.has(1), m.delete(1), m.has(1), m.delete(1)].join()', 'true,true,false,false'],
  ['const out = []; new Map([["k", "v"]]).forEach((v, k) => out.push(k + "=" + v)); out.join()', 'k=v'],
  ['const m = new Map([["a", 1], ["b", 2]]); [...m.keys(), ...m.values()]', "[ 'a', 'b', 1, 2 ]"],
  ['let s = 0; for (const [k, v] of new Map([[1, 2], [3, 4]])) s += k * v; s', '14'],
  ['new Set([1, 2, 2, 3])', 'Set(3) { 1, 2, 3 }'],
  ['const s = new Set(); s.add(1).add(1).add("1"); s.size', '2'],
  ['[...new Set("hello")].join("")', 'helo'],
  ['const s = new Set([1]); s.clear(); [s.size, s.has(1)].join()', '0,false'],
  ['new Set([1]).entries()', '[ [ 1, 1 ] ]'],
  ['({m: new Map([[{}, [1]]])})', '{ m: Map(1) { {} => [ 1 ] } }'],
  ['({a: {b: {c: new Set()}}})', '{ a: { b: { c: [Set] } } }'],
])

testGroup('Date', [
  ['Date.now()', '0'],
  ['performance.now()', '0'],
  ['new Date(0)', '1970-01-01T00:00:00.000Z'],
  ['new Date(Date.UTC(2024, 1, 29, 12)).toISOString()', '2024-02-29T12:00:00.000Z'],
  ['const d = new Date(2024, 0, 31); [d.getFullYear(), d.getMonth(), d.getDate(), d.getDay()].join()', '2024,0,31,3'],
  ['new Date("1970-01-02T00:00:00.000Z").getTime()', '86400000'],
  ['new Date(NaN)', 'Invalid Date'],
  ['new Date(5) - new Date(2)', '3'],
  ['JSON.stringify({at: new Date(1000)})', '{"at":"1970-01-01T00:00:01.000Z"}'],
  ['typeof Date()', 'string'],
  ['String(new Date(0))', 'Thu, 01 Jan 1970 00:00:00 GMT'],
])

testOutputGroup('The clock moves with the timers', [
  ['setTimeout(() => print(Date.now()), 10); setTimeout(() => print(new Date().getTime()), 25)', '10\n25'],
])

testGroup('Prototype chains stay acyclic', [
  [`const a = {};
const b = Object.create(a);
try { Object.setPrototypeOf(a, b) } catch (e) {}
[b instanceof Object, b.missing, Object.getPrototypeOf(a) === Object.prototype].join()`, 'true,,true'],
])

testErrorGroup('Builtin errors', [
  ['[].reduce((a, b) => a + b)', 'TypeError: Reduce of empty array with no initial value'],
  ['JSON.stringify((() => { const o = {}; o.o = o; return o })())', 'TypeError: Converting circular structure to JSON'],
  ['(1).toString(1)', 'RangeError: toString() radix must be between 2 and 36'],
  ['Object.create(1)', 'TypeError: Object prototype may only be an Object or null: 1'],
  ['Object.keys(null)', 'TypeError: Object.keys called on non-object'],
  ['new Promise(1)', 'TypeError: Promise resolver 1 is not a function'],
  ['Promise()', "TypeError: Promise constructor cannot be invoked without 'new'"],
  ['[].map(5)', 'TypeError: 5 is not a function'],
  ['const a = {}; const b = Object.create(a); Object.setPrototypeOf(a, b)', 'TypeError: Cyclic __proto__ value'],
  ['const a = {}; Object.setPrototypeOf(a, a)', 'TypeError: Cyclic __proto__ value'],
  ['new Date(NaN).toISOString()', 'RangeError: Invalid time value'],
  ['Map()', "TypeError: Constructor Map requires 'new'"],
  ['new Map([1])', 'TypeError: Iterator value 1 is not an entry object'],
  ['new Map().size = 1', 'TypeError: Cannot set property size of #<Map> which has only a getter'],
  ['Map.prototype.get.call({}, 1)', 'TypeError: Method Map.prototype.get called on incompatible receiver {}'],
])
