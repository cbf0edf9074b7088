/**
 * Deadline Extraction
 *
 * A task's due time comes from its structured `deadline` field when that holds
 * a valid 24-hour HH:MM, otherwise from a "before/by <time>" phrase in its
 * description. The accepted phrase shapes are listed in DEADLINE_PHRASE_SHAPES;
 * nothing outside that table is recognized.
 */

import type { LocalDate, LocalDateTime, LocalTime } from './time-date'
import { makeDateTime, makeTime, minDateTime, parseTime } from './time-date'
import type { Task } from './task-input'

// ============================================================================
// Phrase Shapes
// ============================================================================

export type DeadlinePhraseShape = {
  name: string
  example: string
  /** Global, case-insensitive. Groups: hour, optional minute, meridiem. */
  pattern: RegExp
}

export const DEADLINE_PHRASE_SHAPES: readonly DeadlinePhraseShape[] = [
  {
    name: 'before-hour',
    example: 'before 9 pm',
    pattern: /\bbefore\s*(\d{1,2})()\s*(am|pm)\b/gi,
  },
  {
    name: 'before-hour-minute',
    example: 'before 8:30 pm',
    pattern: /\bbefore\s*(\d{1,2})\s*:\s*(\d{2})\s*(am|pm)\b/gi,
  },
  {
    name: 'by-hour',
    example: 'by 5 pm',
    pattern: /\bby\s*(\d{1,2})()\s*(am|pm)\b/gi,
  },
  {
    name: 'by-hour-minute',
    example: 'by 11:15 am',
    pattern: /\bby\s*(\d{1,2})\s*:\s*(\d{2})\s*(am|pm)\b/gi,
  },
]

export type DeadlinePhrase = {
  shape: string
  index: number
  time: LocalTime
}

function toTwentyFourHour(hour: number, meridiem: string): number {
  const base = hour === 12 ? 0 : hour
  return meridiem.toLowerCase() === 'pm' ? base + 12 : base
}

/**
 * Earliest phrase in the text that names a real clock time. Hours outside 1..12
 * and minutes outside 0..59 are not deadlines.
 */
export function findDeadlinePhrase(text: string): DeadlinePhrase | null {
  let best: DeadlinePhrase | null = null

  for (const shape of DEADLINE_PHRASE_SHAPES) {
    for (const match of text.matchAll(shape.pattern)) {
      const hour = parseInt(match[1] ?? '', 10)
      const minute = match[2] ? parseInt(match[2], 10) : 0
      const meridiem = match[3] ?? ''
      const index = match.index ?? 0

      if (hour < 1 || hour > 12 || minute > 59) continue
      if (best && best.index <= index) break

      best = { shape: shape.name, index, time: makeTime(toTwentyFourHour(hour, meridiem), minute) }
      break
    }
  }

  return best
}

// ============================================================================
// Resolution
// ============================================================================

export function structuredDeadline(value: string | null): LocalTime | null {
  if (value === null || !/^\d{2}:\d{2}$/.test(value)) return null
  const parsed = parseTime(value)
  return parsed.ok ? parsed.value : null
}

/**
 * Absolute due time for a task on `date`, clipped to `windowEnd`, or null when
 * the task has no deadline.
 */
export function resolveDeadline(
  task: Task,
  date: LocalDate,
  windowEnd: LocalDateTime
): LocalDateTime | null {
  const time = structuredDeadline(task.deadline) ?? findDeadlinePhrase(task.description)?.time ?? null
  if (time === null) return null
  return minDateTime(makeDateTime(date, time), windowEnd)
}
