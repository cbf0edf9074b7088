/**
 * Task Normalization
 *
 * Upstream parsers and the reorder service both hand over loosely typed task
 * records. Everything is re-validated here before it reaches the packer:
 * enums fall back to 'medium', durations are coerced and clamped, malformed
 * deadlines are dropped, and records without a description are discarded.
 */

import { z } from 'zod'

// ============================================================================
// Types
// ============================================================================

export const LEVELS = ['low', 'medium', 'high'] as const

export type Level = (typeof LEVELS)[number]

export type Task = {
  description: string
  priority: Level
  energy: Level
  /** Whole minutes in [MIN_DURATION, MAX_DURATION] */
  duration: number
  /** 24-hour HH:MM the task must finish by */
  deadline: string | null
}

/** Shape accepted from upstream callers before normalization */
export type TaskInput = {
  description: string
  priority?: string
  energy?: string
  duration?: number | string
  deadline?: string | null
}

export const MIN_DURATION = 5
export const MAX_DURATION = 240
export const DEFAULT_DURATION = 30

export const DURATION_LABELS: Readonly<Record<string, number>> = {
  short: 15,
  medium: 30,
  long: 60,
}

// ============================================================================
// Coercion
// ============================================================================

export function isLevel(value: string): value is Level {
  return (LEVELS as readonly string[]).includes(value)
}

export function coerceLevel(value: unknown): Level {
  const s = String(value ?? 'medium').trim().toLowerCase()
  return isLevel(s) ? s : 'medium'
}

function rawMinutes(value: unknown): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : DEFAULT_DURATION
  }
  if (typeof value !== 'string') return DEFAULT_DURATION

  const s = value.trim().toLowerCase()
  const labelled = DURATION_LABELS[s]
  if (labelled !== undefined) return labelled
  if (/^[+-]?\d+$/.test(s)) return parseInt(s, 10)
  return DEFAULT_DURATION
}

export function coerceDuration(value: unknown): number {
  return Math.max(MIN_DURATION, Math.min(rawMinutes(value), MAX_DURATION))
}

export function coerceDeadline(value: unknown): string | null {
  if (typeof value !== 'string') return null
  const s = value.trim()
  return /^\d{2}:\d{2}$/.test(s) ? s : null
}

function coerceDescription(value: unknown): string {
  if (value === undefined || value === null) return ''
  return String(value).trim()
}

// ============================================================================
// Schema
// ============================================================================

export const taskSchema = z.object({
  description: z.unknown().transform(coerceDescription),
  priority: z.unknown().transform(coerceLevel),
  energy: z.unknown().transform(coerceLevel),
  duration: z.unknown().transform(coerceDuration),
  deadline: z.unknown().transform(coerceDeadline),
})

/** Normalized task, or null when the record is not an object or has no description. */
export function normalizeTask(input: unknown): Task | null {
  const parsed = taskSchema.safeParse(input)
  if (!parsed.success || parsed.data.description === '') return null
  return parsed.data
}

export function normalizeTasks(inputs: readonly unknown[]): Task[] {
  const tasks: Task[] = []
  for (const input of inputs) {
    const task = normalizeTask(input)
    if (task) tasks.push(task)
  }
  return tasks
}
