/**
 * Optional progress widget attached to an owner. All calls arrive on the
 * request's callback queue.
 */
export interface Indicator {
  readonly startAnimating: () => void
  readonly stopAnimating: () => void
  /** Normalized progress in [0, 1]. */
  readonly updateProgress?: (ratio: number) => void
  /** Called when the indicator is installed on an owner. */
  readonly attach?: (owner: object) => void
  /** Called when the indicator is replaced or removed. */
  readonly detach?: (owner: object) => void
}
