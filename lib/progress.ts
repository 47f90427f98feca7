/**
 * @fileoverview Progress reporting for playbook jobs
 *
 * A {@link ProgressReporter} is a sink for `(percent, message)` updates.
 * Call sites are responsible for keeping percentages non-decreasing; the
 * sink records whatever it is given. Sub-stages receive a scoped reporter
 * that maps their own 0-100 range onto a slice of the parent's.
 *
 * @module lib/progress
 */

export interface ProgressReporter {
  report(percent: number, message: string): Promise<void>
}

/**
 * Job-level progress allocation. Chunk analysis owns the span between
 * `extracted` and `analyzed`.
 */
export const PROGRESS = {
  uploaded: 0,
  parsing: 5,
  extracted: 10,
  analyzed: 80,
  merging: 85,
  rendering: 90,
  complete: 100,
} as const

/** Clamp to an integer in [0, 100]. */
export function clampPercent(percent: number): number {
  return Math.max(0, Math.min(100, Math.round(percent)))
}

/**
 * Maps a child's 0-100 progress onto `[start, end]` of the parent.
 *
 * @example
 * const analysisProgress = scopeProgress(jobProgress, 10, 80)
 * await analysisProgress.report(50, "Analyzing section 2 of 4...") // parent sees 45
 */
export function scopeProgress(
  parent: ProgressReporter,
  start: number,
  end: number
): ProgressReporter {
  return {
    report(percent, message) {
      const fraction = clampPercent(percent) / 100
      return parent.report(Math.round(start + (end - start) * fraction), message)
    },
  }
}
