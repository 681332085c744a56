import test from 'ava'

import {runBoth, testOutputGroup} from '../testutil.js'

testOutputGroup('Async functions', [
  [`async function f() { print("f start"); await null; print("f resumed"); return 7 }
f().then((v) => print("got " + v));
print("sync")`, 'f start\nsync\nf resumed\ngot 7'],
  [`async function a() { print("a1"); await 0; print("a2"); await 0; print("a3") }
async function b() { print("b1"); await 0; print("b2") }
a();
b()`, 'a1\nb1\na2\nb2\na3'],
  [`async function g() {
  try { await Promise.reject(new Error("nope")) } catch (e) { return "caught " + e.message }
}
g().then(print)`, 'caught nope'],
  [`const sleep = (ms, v) => new Promise((resolve) => setTimeout(() => resolve(v), ms));
async function main() {
  const x = await sleep(20, "slow");
  const y = await sleep(10, "fast");
  print(x + " " + y);
}
main()`, 'slow fast'],
  ['const h = async (x) => x * 2; h(4).then(print)', '8'],
])

testOutputGroup('Promise combinators', [
  [
    'Promise.all([1, Promise.resolve(2), new Promise((r) => setTimeout(() => r(3), 5))]).then((xs) => print(xs.join("+")))',
    '1+2+3',
  ],
  [
    'Promise.allSettled([Promise.resolve(1), Promise.reject("x")]).then((rs) => print(rs.map((r) => r.status).join()))',
    'fulfilled,rejected',
  ],
  ['Promise.all([Promise.reject("first"), 2]).catch((e) => print("rejected with " + e))', 'rejected with first'],
  [`const later = (ms, v) => new Promise((r) => setTimeout(() => r(v), ms));
Promise.race([later(20, "slow"), later(5, "quick")]).then(print)`, 'quick'],
  ['Promise.all([]).then((xs) => print(xs.length))', '0'],
])

testOutputGroup('Promise chains', [
  ['Promise.resolve(1).then((x) => x + 1).then((x) => print(x))', '2'],
  ['Promise.resolve(1).then(() => { throw new Error("in then") }).catch((e) => print(e.message))', 'in then'],
  ['Promise.reject(5).finally(() => print("finally")).catch((e) => print("still " + e))', 'finally\nstill 5'],
  ['Promise.resolve(Promise.resolve("nested")).then(print)', 'nested'],
  ['new Promise((resolve, reject) => { resolve(1); reject(2); resolve(3) }).then(print)', '1'],
  ['new Promise(() => { throw "from executor" }).catch(print)', 'from executor'],
])

test('Unhandled rejections are reported once the microtasks drain', (t) => {
  const result = runBoth(t, 'Promise.reject(new Error("lost")); print("after")')
  t.deepEqual(result.output, ['after'])
  t.deepEqual(result.diagnostics, [{kind: 'UnhandledRejection', message: 'Uncaught (in promise) Error: lost'}])
  t.is(result.error, undefined)
})

test('A rejection from an async function is unhandled without a catch', (t) => {
  const result = runBoth(t, 'async function boom() { throw new Error("async boom") }\nboom()')
  t.deepEqual(result.diagnostics, [{kind: 'UnhandledRejection', message: 'Uncaught (in promise) Error: async boom'}])
})

test('A rejection handled in the same turn is not reported', (t) => {
  const result = runBoth(t, 'const p = Promise.reject(1); p.catch(() => print("handled"))')
  t.deepEqual(result.output, ['handled'])
  t.deepEqual(result.diagnostics, [])
})

test('A rejection handled only in a later timer is still reported', (t) => {
  const result = runBoth(t, 'const p = Promise.reject("late"); setTimeout(() => p.catch(() => print("too late")), 0)')
  t.deepEqual(result.diagnostics, [{kind: 'UnhandledRejection', message: 'Uncaught (in promise) late'}])
  t.deepEqual(result.output, ['too late'])
})
