export {
  getHomeCallbackQueue,
  makeCallbackQueue,
  type CallbackQueue,
  type CallbackQueueOptions,
} from './internal/runtime/CallbackQueue.js'

export {
  getGlobalHostScheduler,
  makeDeterministicHostScheduler,
  type Cancel,
  type DeterministicHostScheduler,
  type HostScheduler,
} from './internal/runtime/HostScheduler.js'
