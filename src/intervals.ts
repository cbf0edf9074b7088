/**
 * Interval Set
 *
 * Busy ranges inside a day window. Ranges are half-open: a range ending at
 * 09:30 does not collide with one starting at 09:30.
 */

import type { LocalDateTime } from './time-date'
import { addMinutes } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type Interval = {
  start: LocalDateTime
  end: LocalDateTime
}

/** Unavailable time appended after every placed task. */
export const FORCED_BREAK_MINUTES = 5

// ============================================================================
// Queries
// ============================================================================

export function overlaps(a: Interval, b: Interval): boolean {
  return !(a.end <= b.start || a.start >= b.end)
}

export function fits(
  start: LocalDateTime,
  end: LocalDateTime,
  occupied: readonly Interval[],
  windowStart: LocalDateTime,
  windowEnd: LocalDateTime
): boolean {
  if (start < windowStart || end > windowEnd || start >= end) return false
  const candidate = { start, end }
  return occupied.every((busy) => !overlaps(candidate, busy))
}

/**
 * True when the forced break that would follow a task ending at `end` is free.
 * The break may run past the window end; only occupied ranges block it.
 */
export function breakIsFree(end: LocalDateTime, occupied: readonly Interval[]): boolean {
  const pause = { start: end, end: addMinutes(end, FORCED_BREAK_MINUTES) }
  return occupied.every((busy) => !overlaps(pause, busy))
}

// ============================================================================
// Mutation & Canonical Form
// ============================================================================

export function addWithBreak(occupied: Interval[], start: LocalDateTime, end: LocalDateTime): void {
  occupied.push({ start, end })
  occupied.push({ start: end, end: addMinutes(end, FORCED_BREAK_MINUTES) })
}

/** Sorted by start, pairwise disjoint, touching ranges fused. Input is not modified. */
export function mergeIntervals(occupied: readonly Interval[]): Interval[] {
  const sorted = [...occupied].sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0))
  const merged: Interval[] = []

  for (const next of sorted) {
    const last = merged[merged.length - 1]
    if (last && next.start <= last.end) {
      if (next.end > last.end) last.end = next.end
    } else {
      merged.push({ ...next })
    }
  }

  return merged
}
