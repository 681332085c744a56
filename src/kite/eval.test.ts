import {testErrorGroup, testGroup, testOutputGroup} from '../testutil.js'

testGroup('Arithmetic and conversions', [
  ['1 + 2 * 3', '7'],
  ['(1 + 2) * 3', '9'],
  ['2 ** 10', '1024'],
  ['7 % 3', '1'],
  ['0.1 + 0.2', '0.30000000000000004'],
  ['1 / 0', 'Infinity'],
  ['0 / 0', 'NaN'],
  ['-0', '-0'],
  ['"a" + 1', 'a1'],
  ['"5" * "2"', '10'],
  ['"5" - 2', '3'],
  ['1 + true', '2'],
  ['`a${1 + 1}b`', 'a2b'],
])

testGroup('Comparison and logic', [
  ['1 < 2 && 2 < 3', 'true'],
  ['"b" > "a"', 'true'],
  ['1 == "1"', 'true'],
  ['1 === "1"', 'false'],
  ['null == undefined', 'true'],
  ['null === undefined', 'false'],
  ['NaN === NaN', 'false'],
  ['null ?? "d"', 'd'],
  ['0 ?? "d"', '0'],
  ['0 || "x"', 'x'],
  ['"" && "x"', ''],
  ['!!"0"', 'true'],
  ['1 ? "yes" : "no"', 'yes'],
])

testGroup('typeof', [
  ['typeof undeclared', 'undefined'],
  ['typeof null', 'object'],
  ['typeof 1', 'number'],
  ['typeof ""', 'string'],
  ['typeof (() => 1)', 'function'],
  ['typeof class {}', 'function'],
  ['typeof []', 'object'],
])

testGroup('Variables and scopes', [
  ['let x = 1; { let x = 2 } x', '1'],
  ['var v = 1; { var v = 2 } v', '2'],
  ['let a = 1; a += 2; a *= 3; a', '9'],
  ['let i = 0; i++; ++i; i', '2'],
  ['let i = 5; const j = i--; j * 10 + i', '54'],
  ['function f() { return g() } function g() { return 3 } f()', '3'],
  ['let s = "x"; s += 1; s', 'x1'],
])

testGroup('Closures', [
  [`function counter() {
  let n = 0
  return [() => { n += 1; return n }, () => n]
}
const pair = counter();
pair[0]();
pair[0]();
pair[1]()`, '2'],
  ['const fs = []; for (let i = 0; i < 3; i++) { fs.push(() => i) } fs.map((f) => f()).join(",")', '0,1,2'],
  ['const add = (a) => (b) => a + b; add(2)(3)', '5'],
  ['const fact = function f(n) { return n <= 1 ? 1 : n * f(n - 1) }; fact(5)', '120'],
])

testGroup('Objects and prototypes', [
  [`const base = {greet: "hi", n: 1};
const child = Object.create(base);
child.n = 2;
[child.greet, child.n, base.n, child.hasOwnProperty("greet")].join(" ")`, 'hi 2 1 false'],
  ['const o = {a: 1}; o.b = 2; delete o.a; Object.keys(o).join()', 'b'],
  ['const k = "x"; ({[k + 1]: 2})', '{ x1: 2 }'],
  ['({...{a: 1}, b: 2})', '{ a: 1, b: 2 }'],
  ['"a" in {a: undefined}', 'true'],
  ['const o = {x: 1, get() { return this.x }}; o.get()', '1'],
  ['function f() { return this } f()', 'undefined'],
  ['const o = {x: 2, f() { return (() => this.x)() }}; o.f()', '2'],
  ['const o = {x: 4}; function f(y) { return this.x + y } f.bind(o, 1)()', '5'],
  ['function F() { this.a = 1; return {b: 2} } (new F()).b', '2'],
  ['function P(x) { this.x = x } P.prototype.double = function () { return this.x * 2 }; (new P(4)).double()', '8'],
])

testGroup('Arrays', [
  ['[1, 2, 3].length', '3'],
  ['const a = [1]; a[3] = 4; a.length', '4'],
  ['const a = [1, 2, 3]; delete a[1]; [a.length, a[1]].join()', '3,'],
  ['[...[1, 2], 3]', '[ 1, 2, 3 ]'],
  ['Math.max(...[1, 5, 3])', '5'],
  ['function f(...xs) { return xs.length } f(1, 2, 3)', '3'],
  ['function f(a, b = a * 2) { return a + b } f(3)', '9'],
])

testGroup('Destructuring', [
  [`const {name, age: years = 0, ...rest} = {name: "Alice", age: 30, city: "Paris"};
[name, years, JSON.stringify(rest)].join(" ")`, 'Alice 30 {"city":"Paris"}'],
  ['const {name, age: years = 0, ...rest} = {name: "Alice", age: 30, city: "Paris"}; rest', "{ city: 'Paris' }"],
  ['const [a, , b = 5, ...c] = [1, 2, undefined, 4, 5]; [a, b, c.length].join()', '1,5,2'],
  ['let x = 1, y = 2; [x, y] = [y, x]; x * 10 + y', '21'],
  ['function f({a, b: [c]}) { return a + c } f({a: 1, b: [2]})', '3'],
  ['let sum = 0; for (const [a, b] of [[1, 2], [3, 4]]) sum += a * b; sum', '14'],
])

testGroup('Control flow', [
  ['let t = 0; for (let i = 0; i < 5; i++) { if (i === 3) continue; t += i } t', '7'],
  ['let n = 0; while (true) { n++; if (n > 4) break } n', '5'],
  ['let k = 0; do { k += 2 } while (k < 5); k', '6'],
  ['let s = ""; for (const c of "abc") s = c + s; s', 'cba'],
  ['const keys = []; for (const k in {a: 1, b: 2}) keys.push(k); keys.join()', 'a,b'],
  [`function kind(x) {
  switch (x) {
    case 1: return "one"
    case 2:
    case 3: return "few"
    default: return "many"
  }
}
[kind(1), kind(3), kind(9)].join(" ")`, 'one few many'],
  ['let s = ""; switch (2) { case 1: s += "a"; case 2: s += "b"; case 3: s += "c"; break; case 4: s += "d" } s', 'bc'],
  ['let r = 0; if (r) { r = 1 } else if (!r) { r = 2 } else { r = 3 } r', '2'],
])

testGroup('Exceptions', [
  ['let m; try { null.x } catch (e) { m = e.message } m', "Cannot read properties of null (reading 'x')"],
  ['let ok; try { undefinedName } catch (e) { ok = e instanceof ReferenceError } ok', 'true'],
  ['let v; try { throw {code: 7} } catch ({code}) { v = code } v', '7'],
  [`const log = [];
function f() { try { log.push("try"); return "r" } finally { log.push("finally") } }
log.push(f());
log.join()`, 'try,finally,r'],
  ['function g() { try { throw 1 } finally { return 2 } } g()', '2'],
  [`const log = [];
try {
  try { throw new Error("inner") } finally { log.push("cleanup") }
} catch (e) {
  log.push(e.message)
}
log.join()`, 'cleanup,inner'],
  [`let n = 0;
for (let i = 0; i < 3; i++) {
  try { if (i === 1) continue; n += 10 } finally { n += 1 }
}
n`, '23'],
  ['let s; try { throw new TypeError("bad") } catch (e) { s = String(e) } s', 'TypeError: bad'],
])

testGroup('Classes', [
  [`class A {
  constructor(x) { this.x = x }
  describe() { return "A" + this.x }
}
class B extends A {
  constructor(x) { super(x * 2) }
  describe() { return "B" + super.describe() }
}
(new B(2)).describe()`, 'BA4'],
  ['class C { static make() { return new C() } } C.make() instanceof C', 'true'],
  ['class P { constructor() { this.x = 1 } } new P()', 'P { x: 1 }'],
  ['class Q {} class R extends Q {} Object.getPrototypeOf(R.prototype) === Q.prototype', 'true'],
])

testGroup('Getters and setters', [
  [`class Temperature {
  constructor() { this.c = 0 }
  get f() { return this.c * 9 / 5 + 32 }
  set f(v) { this.c = (v - 32) * 5 / 9 }
}
const t = new Temperature();
t.f = 212;
[t.c, t.f].join()`, '100,212'],
  ['const o = {n: 1, get next() { return ++this.n }}; o.next; o.next', '3'],
  ['const log = []; const o = {set x(v) { log.push(v) }}; o.x = 1; o.x = 2; [log.join(), String(o.x)].join(" ")', '1,2 undefined'],
  ['class C { static get tag() { return "c" } } C.tag', 'c'],
  ['class A { get label() { return "A:" + this.id } } class B extends A { constructor() { super(); this.id = 7 } } new B().label', 'A:7'],
  ['class P { get x() { return 1 } } Object.keys(new P()).length', '0'],
  ['Object.keys({get a() { return 1 }, b: 2})', "[ 'a', 'b' ]"],
  ['const {a} = {get a() { return 6 }}; a', '6'],
  ['({...{get a() { return 5 }}})', '{ a: 5 }'],
  ['({get: 1, set: 2}).get + ({get() { return 3 }}).get()', '4'],
])

testErrorGroup('Accessor errors', [
  ['const o = {get x() { return 1 }}; o.x = 5', 'TypeError: Cannot set property x of #<Object> which has only a getter'],
  ['class Box { get v() { return 1 } } new Box().v = 2', 'TypeError: Cannot set property v of #<Box> which has only a getter'],
  ['({get x(a) { return a }})', 'ParseError: Getter must not have any formal parameters.'],
  ['class S { set y() {} }', 'ParseError: Setter must have exactly one formal parameter.'],
  ['class S { get constructor() {} }', 'ParseError: Class constructor may not be an accessor'],
])

testGroup('Comma operator', [
  ['let x = (1, 2); x', '2'],
  ['let n = 0; const r = (n++, n++, n); [r, n].join()', '2,2'],
  ['let s = ""; for (let i = 0, j = 3; i < j; i++, j--) s += i + ":" + j + " "; s', '0:3 1:2 '],
])

testOutputGroup('Printing', [
  ['function fib(n){ if (n<=1) return n; return fib(n-1)+fib(n-2); } console.log(fib(10));', '55'],
  [
    'class Animal{speak(){return "noise";}} class Dog extends Animal{speak(){return "bark";}} const d=new Dog(); console.log(d.speak(), d instanceof Animal);',
    'bark true',
  ],
  ['print("a", 1, [1, "b"], {c: null})', "a 1 [ 1, 'b' ] { c: null }"],
  ['console.error("to the same output"); console.info(undefined)', 'to the same output\nundefined'],
])

testErrorGroup('Runtime errors', [
  ['const o = null; o.x', "TypeError: Cannot read properties of null (reading 'x')"],
  ['x', 'ReferenceError: x is not defined'],
  ['y = 1', 'ReferenceError: y is not defined'],
  ['const c = 1; c = 2', 'TypeError: Assignment to constant variable.'],
  ['z; let z = 1', "ReferenceError: Cannot access 'z' before initialization"],
  ['const n = 1; n()', 'TypeError: n is not a function'],
  ['class K {} K()', "TypeError: Class constructor K cannot be invoked without 'new'"],
  ['throw new Error("boom")', 'UserThrow: Error: boom'],
  ['throw "plain"', 'UserThrow: plain'],
  ['"ab".repeat(-1)', 'RangeError: Invalid count value: -1'],
])
