export {
  ConsoleDebugLayer,
  DebugSinkTag,
  NoopDebugSinkLayer,
  isVerboseEvent,
  record,
  type DebugSink,
  type LoadDebugEvent,
  type StaleStep,
} from './internal/debug/DebugSink.js'

export {
  toSerializableErrorSummary,
  type DowngradeReason,
  type SerializableErrorSummary,
} from './internal/errorSummary.js'
