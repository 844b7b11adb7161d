// Public barrel for @viewload/core
// Recommended usage:
//   import * as ViewLoad from "@viewload/core"
// Then ViewLoad exposes ViewLoader / Surfaces / Debug / Config / Scheduling namespaces
// plus the Manager-facing types at the top level.

export * as ViewLoader from './ViewLoader.js'
export type * from './ViewLoader.js'

export { Buttons, ImageViews, buttonBackgroundImageKey, buttonImageKey, HIGHLIGHTED_IMAGE_KEY } from './Surfaces.js'
export type { SlotLoadArgs } from './Surfaces.js'

export { makeLoadOrchestrator, normalizeTarget, shouldUseTransition } from './internal/orchestrator/LoadOrchestrator.js'
export type { LoadOrchestrator, LoadOrchestratorDeps } from './internal/orchestrator/LoadOrchestrator.js'

export { isAuthoritativeToken } from './internal/orchestrator/supersession.js'
export type { SupersessionToken } from './internal/orchestrator/supersession.js'

export { ANONYMOUS_OWNER_KEY, defaultOperationKey, resolveOperationKey } from './internal/operation/OperationKeyResolver.js'
export { progressRatio } from './internal/progress/ProgressBridge.js'
export { PROGRESS_UNIT_COUNT_UNKNOWN, Progress } from './internal/state/Progress.js'
export type { LoadState } from './internal/state/LoadStateStore.js'

export { noopCancelHandle } from './Manager.js'
export type * from './Manager.js'
export { toDownstreamContext } from './Options.js'
export type * from './Options.js'
export { isButtonSurface, isImageSurface } from './Surface.js'
export type * from './Surface.js'
export { fade, timingOf } from './Transition.js'
export type * from './Transition.js'
export type * from './Indicator.js'
export * from './errors.js'

export * as Debug from './Debug.js'
export * as Config from './Config.js'
export * as Scheduling from './Scheduling.js'
