// Kite event loop: microtasks and timers on a virtual clock.
// © Reuben Thomas 2023-2025
// Released under the MIT license.

import {Diagnostic} from './error.js'
import {trace} from './util.js'

export type Job = () => void

class Timer {
  cleared = false

  constructor(
    public id: number,
    public due: number,
    public seq: number,
    public callback: Job,
    public interval: number | undefined,
  ) {}
}

export class Scheduler {
  // Virtual time in milliseconds; advances only when a timer is released.
  now = 0

  private microtasks: Job[] = []

  private timers: Timer[] = []

  private nextId = 1

  private nextSeq = 0

  private timerTicks = 0

  private running?: Timer

  // Run each time the microtask queue becomes empty.
  onMicrotasksDrained?: () => void

  constructor(
    public maxTimerTicks = 100000,
    private onDiagnostic: (diagnostic: Diagnostic) => void = () => {},
  ) {}

  queueMicrotask(job: Job) {
    this.microtasks.push(job)
  }

  get pendingMicrotasks() {
    return this.microtasks.length
  }

  get pendingTimers() {
    return this.timers.length
  }

  // Delays below 1ms count as 1ms.
  setTimer(delay: number, callback: Job, repeat = false): number {
    const ms = Number.isFinite(delay) && delay >= 1 ? Math.floor(delay) : 1
    const timer = new Timer(this.nextId, this.now + ms, this.nextSeq, callback, repeat ? ms : undefined)
    this.nextId += 1
    this.nextSeq += 1
    this.insert(timer)
    return timer.id
  }

  clearTimer(id: number) {
    const index = this.timers.findIndex((t) => t.id === id)
    if (index >= 0) {
      this.timers[index].cleared = true
      this.timers.splice(index, 1)
    }
    if (this.running?.id === id) {
      this.running.cleared = true
    }
  }

  // Keep timers ordered by (due time, registration order).
  private insert(timer: Timer) {
    let index = this.timers.length
    while (index > 0) {
      const prev = this.timers[index - 1]
      if (prev.due < timer.due || (prev.due === timer.due && prev.seq < timer.seq)) {
        break
      }
      index -= 1
    }
    this.timers.splice(index, 0, timer)
  }

  runMicrotasks() {
    do {
      while (this.microtasks.length > 0) {
        const job = this.microtasks.shift()
        if (job !== undefined) {
          job()
        }
      }
      this.onMicrotasksDrained?.()
    } while (this.microtasks.length > 0)
  }

  // Run jobs until both queues are empty. A host exception thrown by a job
  // (such as an uncaught guest throw in a timer callback) propagates, and
  // the remaining jobs stay queued.
  runUntilIdle() {
    for (;;) {
      this.runMicrotasks()
      const timer = this.timers.shift()
      if (timer === undefined) {
        return
      }
      if (this.timerTicks >= this.maxTimerTicks) {
        const pending = this.timers.length + 1
        this.timers = []
        this.onDiagnostic({
          kind: 'TimerLimit',
          message: `Timer limit of ${this.maxTimerTicks} callbacks reached; ${pending} pending timer(s) dropped`,
        })
        return
      }
      this.timerTicks += 1
      this.now = Math.max(this.now, timer.due)
      trace(`timer ${timer.id} at ${this.now}`, timer)
      this.running = timer
      try {
        timer.callback()
      } finally {
        this.running = undefined
        if (timer.interval !== undefined && !timer.cleared) {
          timer.due = this.now + timer.interval
          timer.seq = this.nextSeq
          this.nextSeq += 1
          this.insert(timer)
        }
      }
    }
  }
}
