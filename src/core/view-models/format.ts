/**
 * Display formatting shared by the view models.
 *
 * @module View Models
 */

/** `65_000` → `"1m 5s"`, `42_000` → `"42s"`. */
export function formatDuration(ms: number): string {
  const secs = Math.floor(ms / 1000)
  return secs >= 60 ? `${Math.floor(secs / 60)}m ${secs % 60}s` : `${secs}s`
}

/** `" (3 errors)"`, or an empty string for zero. */
export function formatErrorCount(count: number): string {
  if (count === 0) {
    return ''
  }
  return count === 1 ? ' (1 error)' : ` (${count} errors)`
}

/** Remaining time until `deadline`, never negative. */
export function formatCountdown(deadline: number, now: number): string {
  return formatDuration(Math.max(0, deadline - now))
}

/** Window bounds `[start, end)` of a scrolled list. */
export function windowOf(
  scrollOffset: number,
  viewportHeight: number,
): { start: number; end: number } {
  return { start: scrollOffset, end: scrollOffset + viewportHeight }
}
