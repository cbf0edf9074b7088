/**
 * Shared timeline assertions for every test that packs a day.
 */
import { expect } from 'vitest'
import type { DayWindow, PackResult } from '../../src/scheduler'
import { FORCED_BREAK_MINUTES } from '../../src/intervals'
import { isOnGrid } from '../../src/grid'
import { addMinutes, minutesBetween } from '../../src/time-date'

const DT_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/

/**
 * Asserts on a packed day:
 * 1. Well-formed datetimes on the quarter-hour grid
 * 2. Exact task durations inside the window, ending by any deadline
 * 3. Chronological order with a free forced break after every placement
 */
export function assertTimelineInvariants(result: PackResult, window: DayWindow): void {
  for (const p of result.placements) {
    expect(p.start).toMatch(DT_REGEX)
    expect(p.end).toMatch(DT_REGEX)
    expect(isOnGrid(p.start)).toBe(true)

    expect(minutesBetween(p.start, p.end)).toBe(p.task.duration)
    expect(p.start >= window.startFrom).toBe(true)
    expect(p.end <= window.end).toBe(true)
    if (p.deadline !== null) expect(p.end <= p.deadline).toBe(true)
  }

  for (let i = 1; i < result.placements.length; i++) {
    const prev = result.placements[i - 1]
    const next = result.placements[i]
    if (!prev || !next) continue
    expect(addMinutes(prev.end, FORCED_BREAK_MINUTES) <= next.start).toBe(true)
  }
}
