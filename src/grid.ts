/**
 * Grid Quantizer
 *
 * Every slot boundary sits on a quarter-hour mark. Seconds are dropped before
 * the minute is compared, so 09:00:30 rounds up to 09:00, not 09:15.
 */

import type { LocalDateTime } from './time-date'
import { addMinutes, dateOf, hourOf, makeDateTime, makeTime, minuteOf, timeOf } from './time-date'

export const GRID_MINUTES: readonly number[] = [0, 15, 30, 45]

function topOfHour(dt: LocalDateTime): LocalDateTime {
  return makeDateTime(dateOf(dt), makeTime(hourOf(timeOf(dt)), 0, 0))
}

export function roundUpToGrid(dt: LocalDateTime): LocalDateTime {
  const minute = minuteOf(timeOf(dt))
  const hour = topOfHour(dt)
  for (const mark of GRID_MINUTES) {
    if (minute <= mark) return addMinutes(hour, mark)
  }
  return addMinutes(hour, 60 + (GRID_MINUTES[0] ?? 0))
}

export function roundDownToGrid(dt: LocalDateTime): LocalDateTime {
  const minute = minuteOf(timeOf(dt))
  const hour = topOfHour(dt)
  const below = GRID_MINUTES.filter((mark) => mark <= minute)
  if (below.length > 0) return addMinutes(hour, Math.max(...below))
  return addMinutes(hour, Math.max(...GRID_MINUTES) - 60)
}

export function isOnGrid(dt: LocalDateTime): boolean {
  const time = timeOf(dt)
  return time.endsWith(':00') && GRID_MINUTES.includes(minuteOf(time))
}
