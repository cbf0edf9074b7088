/**
 * Slot Placement
 *
 * Bounded quarter-hour scans over a canonical (merged) occupied set.
 *
 * Backward fill starts at the deadline and walks toward the window start, so a
 * deadline task lands as close to its due time as the occupied set allows.
 * Forward fill starts at a cursor and walks toward the window end.
 *
 * A candidate is accepted only when its trailing forced break is also free of
 * occupied time, so no placed task ever runs into another task's break.
 */

import type { LocalDateTime } from './time-date'
import { addMinutes, maxDateTime } from './time-date'
import { roundDownToGrid, roundUpToGrid } from './grid'
import { type Interval, breakIsFree, fits } from './intervals'

export type Slot = Interval

export const SEARCH_STEP_MINUTES = 15

/** Twelve hours of quarter-hour steps, plus the starting candidate */
export const MAX_SEARCH_STEPS = 12 * 4 + 1

export function findBackwardSlot(
  deadline: LocalDateTime,
  durationMinutes: number,
  occupied: readonly Interval[],
  windowStart: LocalDateTime
): Slot | null {
  let end = roundDownToGrid(deadline)

  for (let step = 0; step < MAX_SEARCH_STEPS; step++) {
    const start = roundUpToGrid(addMinutes(end, -durationMinutes))
    end = addMinutes(start, durationMinutes)

    if (fits(start, end, occupied, windowStart, deadline) && breakIsFree(end, occupied)) {
      return { start, end }
    }

    end = addMinutes(end, -SEARCH_STEP_MINUTES)
    if (end <= windowStart) break
  }

  return null
}

export function findForwardSlot(
  cursor: LocalDateTime,
  durationMinutes: number,
  occupied: readonly Interval[],
  windowStart: LocalDateTime,
  windowEnd: LocalDateTime
): Slot | null {
  let start = roundUpToGrid(maxDateTime(cursor, windowStart))

  for (let step = 0; step < MAX_SEARCH_STEPS; step++) {
    const end = addMinutes(start, durationMinutes)

    if (fits(start, end, occupied, windowStart, windowEnd) && breakIsFree(end, occupied)) {
      return { start, end }
    }

    start = addMinutes(start, SEARCH_STEP_MINUTES)
    if (addMinutes(start, durationMinutes) > windowEnd) break
  }

  return null
}
