export type Cancel = () => void

/**
 * The host's turn structure as the loader sees it. Presentation steps run on
 * microtasks; transition phases wait for a frame and then for their duration.
 */
export interface HostScheduler {
  readonly nowMs: () => number
  readonly scheduleMicrotask: (cb: () => void) => void
  readonly scheduleMacrotask: (cb: () => void) => Cancel
  /** Next frame; Node has no frame clock, so this is the next macrotask turn. */
  readonly scheduleAnimationFrame: (cb: () => void) => Cancel
  readonly scheduleTimeout: (ms: number, cb: () => void) => Cancel
}

const nextTurn = (cb: () => void): Cancel => {
  const handle = setImmediate(cb)
  return () => clearImmediate(handle)
}

export const makeNodeHostScheduler = (): HostScheduler => ({
  nowMs: () => performance.now(),
  scheduleMicrotask: (cb) => queueMicrotask(cb),
  scheduleMacrotask: nextTurn,
  scheduleAnimationFrame: nextTurn,
  scheduleTimeout: (ms, cb) => {
    const handle = setTimeout(cb, ms)
    return () => clearTimeout(handle)
  },
})

let sharedHostScheduler: HostScheduler | undefined

export const getGlobalHostScheduler = (): HostScheduler => {
  sharedHostScheduler ??= makeNodeHostScheduler()
  return sharedHostScheduler
}

export interface DeterministicHostScheduler extends HostScheduler {
  /** Runs queued microtasks, including ones queued meanwhile; returns how many ran. */
  readonly flushMicrotasks: (limit?: number) => number
  /** Takes one macrotask turn; false when none was queued. */
  readonly flushOneMacrotask: () => boolean
  /** Alternates microtask drains and macrotask turns until both queues are empty. */
  readonly flushAll: (maxTurns?: number) => { readonly turns: number; readonly ran: number }
  readonly queued: () => { readonly microtasks: number; readonly macrotasks: number }
}

interface MacroTask {
  readonly run: () => void
  cancelled: boolean
}

const MAX_STEPS = 10_000

/**
 * Nothing runs until the test flushes. Frames, timeouts and macrotasks share
 * one FIFO turn queue (timeout delays are ignored); the clock counts turns.
 */
export const makeDeterministicHostScheduler = (): DeterministicHostScheduler => {
  const micro: Array<() => void> = []
  const macro: MacroTask[] = []
  let turn = 0

  const enqueue = (run: () => void): Cancel => {
    const task: MacroTask = { run, cancelled: false }
    macro.push(task)
    return () => {
      task.cancelled = true
    }
  }

  const flushMicrotasks = (limit = MAX_STEPS): number => {
    let ran = 0
    while (ran < limit && micro.length > 0) {
      const next = micro.shift()
      ran += 1
      next?.()
    }
    return ran
  }

  const flushOneMacrotask = (): boolean => {
    const task = macro.shift()
    if (task === undefined) return false
    turn += 1
    if (!task.cancelled) task.run()
    return true
  }

  const flushAll = (maxTurns = MAX_STEPS) => {
    let turns = 0
    let ran = flushMicrotasks()
    while (turns < maxTurns && flushOneMacrotask()) {
      turns += 1
      ran += flushMicrotasks()
    }
    return { turns, ran }
  }

  return {
    nowMs: () => turn,
    scheduleMicrotask: (cb) => {
      micro.push(cb)
    },
    scheduleMacrotask: enqueue,
    scheduleAnimationFrame: enqueue,
    scheduleTimeout: (_ms, cb) => enqueue(cb),
    flushMicrotasks,
    flushOneMacrotask,
    flushAll,
    queued: () => ({ microtasks: micro.length, macrotasks: macro.length }),
  }
}
