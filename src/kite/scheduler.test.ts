import test from 'ava'

import {Diagnostic} from './error.js'
import {Scheduler} from './scheduler.js'
import {testOutputGroup} from '../testutil.js'

test('Microtasks run before timers', (t) => {
  const scheduler = new Scheduler()
  const log: string[] = []
  scheduler.setTimer(0, () => log.push('timer'))
  scheduler.queueMicrotask(() => {
    log.push('micro 1')
    scheduler.queueMicrotask(() => log.push('micro 2'))
  })
  scheduler.runUntilIdle()
  t.deepEqual(log, ['micro 1', 'micro 2', 'timer'])
})

test('Timers run in order of due time, then of registration', (t) => {
  const scheduler = new Scheduler()
  const log: string[] = []
  scheduler.setTimer(10, () => log.push('10'))
  scheduler.setTimer(0, () => log.push('0a'))
  scheduler.setTimer(1, () => log.push('1'))
  scheduler.setTimer(-5, () => log.push('0b'))
  scheduler.runUntilIdle()
  t.deepEqual(log, ['0a', '1', '0b', '10'])
  t.is(scheduler.now, 10)
})

test('Microtasks queued by a timer run before the next timer', (t) => {
  const scheduler = new Scheduler()
  const log: string[] = []
  scheduler.setTimer(5, () => {
    log.push('first')
    scheduler.queueMicrotask(() => log.push('micro'))
  })
  scheduler.setTimer(5, () => log.push('second'))
  scheduler.runUntilIdle()
  t.deepEqual(log, ['first', 'micro', 'second'])
})

test('Cleared timers do not run', (t) => {
  const scheduler = new Scheduler()
  const log: number[] = []
  const id = scheduler.setTimer(1, () => log.push(1))
  scheduler.setTimer(2, () => log.push(2))
  scheduler.clearTimer(id)
  t.is(scheduler.pendingTimers, 1)
  scheduler.runUntilIdle()
  t.deepEqual(log, [2])
})

test('Intervals repeat until cleared', (t) => {
  const scheduler = new Scheduler()
  const times: number[] = []
  const id = scheduler.setTimer(3, () => {
    times.push(scheduler.now)
    if (times.length === 3) {
      scheduler.clearTimer(id)
    }
  }, true)
  scheduler.runUntilIdle()
  t.deepEqual(times, [3, 6, 9])
  t.is(scheduler.pendingTimers, 0)
})

test('The timer limit drops the remaining timers', (t) => {
  const diagnostics: Diagnostic[] = []
  const scheduler = new Scheduler(2, (d) => diagnostics.push(d))
  let runs = 0
  scheduler.setTimer(1, () => {
    runs += 1
  }, true)
  scheduler.runUntilIdle()
  t.is(runs, 2)
  t.deepEqual(diagnostics, [{
    kind: 'TimerLimit',
    message: 'Timer limit of 2 callbacks reached; 1 pending timer(s) dropped',
  }])
})

test('Draining the microtask queue is signalled', (t) => {
  const scheduler = new Scheduler()
  let drained = 0
  scheduler.onMicrotasksDrained = () => {
    drained += 1
  }
  scheduler.queueMicrotask(() => {})
  scheduler.runMicrotasks()
  t.is(drained, 1)
  t.is(scheduler.pendingMicrotasks, 0)
})

testOutputGroup('Guest scheduling order', [
  [`setTimeout(() => console.log("timeout"), 0);
Promise.resolve().then(() => console.log("then"));
queueMicrotask(() => console.log("microtask"));
console.log("sync")`, 'sync\nthen\nmicrotask\ntimeout'],
  [`setTimeout(() => print("c"), 30);
setTimeout(() => print("a"), 10);
setTimeout(() => print("b"), 20)`, 'a\nb\nc'],
  [`setTimeout(() => {
  print("outer");
  Promise.resolve().then(() => print("inner microtask"));
}, 0);
setTimeout(() => print("second timer"), 0)`, 'outer\ninner microtask\nsecond timer'],
  [`let n = 0;
const id = setInterval(() => {
  n += 1;
  print("tick " + n);
  if (n === 3) clearInterval(id);
}, 5)`, 'tick 1\ntick 2\ntick 3'],
  ['const id = setTimeout(() => print("never"), 1); clearTimeout(id); print("done")', 'done'],
  ['setTimeout((a, b) => print(a + b), 1, 2, 3)', '5'],
])
