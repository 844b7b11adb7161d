import { Effect } from 'effect'
import { getGlobalHostScheduler, type HostScheduler } from './HostScheduler.js'

/**
 * Serialized FIFO dispatcher. Every presentation-affecting step of a request
 * runs on one of these; a task queued while the queue is draining runs in the
 * same drain, after everything queued before it.
 */
export interface CallbackQueue {
  readonly name: string
  readonly async: (task: () => void) => void
  readonly pending: () => number
}

export interface CallbackQueueOptions {
  readonly name: string
  readonly hostScheduler?: HostScheduler
  /** Called with whatever a task threw; the drain goes on with the next task. */
  readonly onError?: (cause: unknown, queueName: string) => void
}

const logTaskFailure = (cause: unknown, queueName: string): void => {
  Effect.runSync(Effect.logError(`[CallbackQueue:${queueName}] task failed`, cause))
}

export const makeCallbackQueue = (options: CallbackQueueOptions): CallbackQueue => {
  const hostScheduler = options.hostScheduler ?? getGlobalHostScheduler()
  const onError = options.onError ?? logTaskFailure
  const tasks: Array<() => void> = []
  let scheduled = false

  const drain = (): void => {
    try {
      let task = tasks.shift()
      while (task) {
        try {
          task()
        } catch (cause) {
          onError(cause, options.name)
        }
        task = tasks.shift()
      }
    } finally {
      scheduled = false
    }
  }

  return {
    name: options.name,
    async: (task) => {
      tasks.push(task)
      if (scheduled) return
      scheduled = true
      hostScheduler.scheduleMicrotask(drain)
    },
    pending: () => tasks.length,
  }
}

let homeQueue: CallbackQueue | undefined

export const getHomeCallbackQueue = (): CallbackQueue => {
  homeQueue ??= makeCallbackQueue({ name: 'home' })
  return homeQueue
}
