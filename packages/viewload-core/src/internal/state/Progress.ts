/**
 * Unit count written to both fields when a request finished without ever
 * reporting byte counts. Distinct from 0 so "never started" and "done without
 * granular progress" can be told apart.
 */
export const PROGRESS_UNIT_COUNT_UNKNOWN = 1

/**
 * Mutable progress entity for one (owner, key) slot. The same instance is
 * reset and reused across requests on that slot so observers holding it keep
 * observing the slot.
 */
export class Progress {
  totalUnitCount = 0
  completedUnitCount = 0

  get fractionCompleted(): number {
    if (this.totalUnitCount <= 0) return 0
    return Math.min(Math.max(this.completedUnitCount / this.totalUnitCount, 0), 1)
  }

  /** True until the first sample (or the unknown-complete mark) lands. */
  get isPristine(): boolean {
    return this.totalUnitCount === 0 && this.completedUnitCount === 0
  }

  reset(): void {
    this.totalUnitCount = 0
    this.completedUnitCount = 0
  }

  markUnknownComplete(): void {
    this.totalUnitCount = PROGRESS_UNIT_COUNT_UNKNOWN
    this.completedUnitCount = PROGRESS_UNIT_COUNT_UNKNOWN
  }
}
