/**
 * Schedule Orchestrator
 *
 * Turns one day's task list into a conflict-free timeline.
 *
 * `packDay()` is the pure core: partition by deadline, place deadline tasks
 * backward in earliest-deadline-first order, then fill the rest forward from
 * the start of the window. `planDay()` wraps it with window resolution and the
 * optional reorder round trip; `scheduleTasks()` returns only the display form.
 *
 * Nothing here throws for scheduling reasons. Tasks that cannot be placed are
 * reported in `skipped` and left out of the timeline.
 */

import type { LocalDate, LocalDateTime } from './time-date'
import {
  addMinutes, compareDateTimes, dateOf, formatClockTime,
  makeDateTime, makeTime, parseTime,
} from './time-date'
import { type Result, Err } from './result'
import { ReorderError } from './errors'
import { roundUpToGrid } from './grid'
import { type Interval, FORCED_BREAK_MINUTES, addWithBreak, mergeIntervals } from './intervals'
import { findBackwardSlot, findForwardSlot } from './placement'
import { resolveDeadline } from './deadlines'
import { type Task, type TaskInput, normalizeTasks } from './task-input'
import type { Profile } from './profile'
import type { Reorderer, ReorderRequest, ScheduleCategory } from './reorder'
import { type Logger, nullLogger } from './logger'

// ============================================================================
// Types
// ============================================================================

export type DayWindow = {
  /** Calendar date deadlines and the workday end are read against */
  date: LocalDate
  startFrom: LocalDateTime
  end: LocalDateTime
}

export type Placement = {
  task: Task
  start: LocalDateTime
  end: LocalDateTime
  /** Window-clipped due time, when the task had one */
  deadline: LocalDateTime | null
}

export type SkipReason = 'noWindow' | 'noSlotBeforeDeadline' | 'windowExhausted'

export type SkippedTask = {
  task: Task
  reason: SkipReason
}

export type PackResult = {
  placements: Placement[]
  skipped: SkippedTask[]
}

export type DayPlan = PackResult & {
  window: DayWindow | null
  reordered: boolean
}

/** Display form: 12-hour clock strings */
export type PlacedTask = {
  description: string
  startTime: string
  endTime: string
}

export type PlanOptions = {
  now: LocalDateTime
  category: ScheduleCategory
  reorderer?: Reorderer
  /** Bound on the reorder round trip; a timeout counts as a reorder failure */
  reorderTimeoutMs?: number
  logger?: Logger
}

export const PERSONAL_WINDOW_HOURS = 6

// ============================================================================
// Window
// ============================================================================

/**
 * Feasible region for one call. Null for a workday whose configured end is not
 * after the quantized current time.
 */
export function resolveWindow(
  now: LocalDateTime,
  category: ScheduleCategory,
  profile: Profile
): DayWindow | null {
  const date = dateOf(now)
  const startFrom = roundUpToGrid(now)

  if (category === 'personal') {
    return { date, startFrom, end: addMinutes(startFrom, PERSONAL_WINDOW_HOURS * 60) }
  }

  const workEnd = parseTime(profile.workHours.end)
  const end = makeDateTime(date, workEnd.ok ? workEnd.value : makeTime(17, 0))
  return end > startFrom ? { date, startFrom, end } : null
}

// ============================================================================
// Pure Packing
// ============================================================================

export function packDay(
  tasks: readonly Task[],
  window: DayWindow,
  logger: Logger = nullLogger
): PackResult {
  const placements: Placement[] = []
  const skipped: SkippedTask[] = []

  // Partition, keeping list order within each group
  const deadlineTasks: Array<{ task: Task; deadline: LocalDateTime }> = []
  const normalTasks: Task[] = []
  for (const task of tasks) {
    const deadline = resolveDeadline(task, window.date, window.end)
    if (deadline) deadlineTasks.push({ task, deadline })
    else normalTasks.push(task)
  }

  // Backward phase: tightest deadline claims its late slot first (sort is stable)
  deadlineTasks.sort((a, b) => compareDateTimes(a.deadline, b.deadline))

  const occupied: Interval[] = []
  for (const { task, deadline } of deadlineTasks) {
    const slot = findBackwardSlot(deadline, task.duration, mergeIntervals(occupied), window.startFrom)
    if (!slot) {
      logger.debug('No slot before deadline', { task: task.description, deadline })
      skipped.push({ task, reason: 'noSlotBeforeDeadline' })
      continue
    }
    addWithBreak(occupied, slot.start, slot.end)
    placements.push({ task, start: slot.start, end: slot.end, deadline })
  }

  // Forward phase: cursor starts past whatever already covers the window start
  let busy = mergeIntervals(occupied)
  let cursor = window.startFrom
  for (const range of busy) {
    if (range.start <= cursor && cursor < range.end) cursor = range.end
  }

  let exhausted = false
  for (const task of normalTasks) {
    const slot = exhausted
      ? null
      : findForwardSlot(cursor, task.duration, busy, window.startFrom, window.end)
    if (!slot) {
      if (!exhausted) logger.debug('Window exhausted', { task: task.description, cursor })
      exhausted = true
      skipped.push({ task, reason: 'windowExhausted' })
      continue
    }

    addWithBreak(busy, slot.start, slot.end)
    busy = mergeIntervals(busy)
    placements.push({ task, start: slot.start, end: slot.end, deadline: null })

    cursor = addMinutes(slot.end, FORCED_BREAK_MINUTES)
    if (cursor >= window.end) exhausted = true
  }

  placements.sort((a, b) => compareDateTimes(a.start, b.start))
  return { placements, skipped }
}

// ============================================================================
// Reorder
// ============================================================================

async function attemptReorder(
  reorderer: Reorderer,
  request: ReorderRequest,
  timeoutMs: number | undefined
): Promise<Result<Task[], ReorderError>> {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined

  try {
    const call = reorderer.reorder(request, { signal: controller.signal })
    if (timeoutMs === undefined) return await call

    const timeout = new Promise<Result<Task[], ReorderError>>((resolve) => {
      timer = setTimeout(() => {
        controller.abort()
        resolve(Err(new ReorderError(`Reorder timed out after ${timeoutMs}ms`)))
      }, timeoutMs)
    })
    return await Promise.race([call, timeout])
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    return Err(new ReorderError(`Reorder threw: ${reason}`))
  } finally {
    clearTimeout(timer)
  }
}

type Reconciled = {
  tasks: Task[]
  /** Originals the reorderer left out, appended in their original order */
  restored: number
}

/**
 * Re-validates a reorderer's list against the originals. Each original is
 * matched at most once by description (case-insensitive) and hands its
 * structured deadline to its match. Null when nothing valid came back.
 */
function reconcileReorder(returned: readonly Task[], originals: readonly Task[]): Reconciled | null {
  const reordered = normalizeTasks(returned)
  if (reordered.length === 0) return null

  const pending = new Map<string, Task[]>()
  for (const task of originals) {
    const key = task.description.toLowerCase()
    const queue = pending.get(key)
    if (queue) queue.push(task)
    else pending.set(key, [task])
  }

  const tasks = reordered.map((task) => {
    const original = pending.get(task.description.toLowerCase())?.shift()
    return { ...task, deadline: original ? original.deadline : null }
  })

  const omitted = originals.filter((task) => pending.get(task.description.toLowerCase())?.includes(task) ?? false)
  return { tasks: [...tasks, ...omitted], restored: omitted.length }
}

// ============================================================================
// Pipeline
// ============================================================================

export async function planDay(
  inputs: readonly TaskInput[],
  profile: Profile,
  options: PlanOptions
): Promise<DayPlan> {
  const logger = (options.logger ?? nullLogger).child({ component: 'scheduler' })
  const tasks = normalizeTasks(inputs)

  const window = resolveWindow(options.now, options.category, profile)
  if (!window) {
    logger.info('No schedule possible: workday already over', { now: options.now, workEnd: profile.workHours.end })
    return {
      window: null,
      placements: [],
      skipped: tasks.map((task): SkippedTask => ({ task, reason: 'noWindow' })),
      reordered: false,
    }
  }
  logger.debug('Window resolved', { startFrom: window.startFrom, end: window.end, category: options.category })

  if (tasks.length === 0) {
    return { window, placements: [], skipped: [], reordered: false }
  }

  let ordered = tasks
  let reordered = false
  if (options.reorderer) {
    const outcome = await attemptReorder(
      options.reorderer,
      { tasks, profile, category: options.category },
      options.reorderTimeoutMs
    )
    const reconciled = outcome.ok ? reconcileReorder(outcome.value, tasks) : null
    if (reconciled) {
      ordered = reconciled.tasks
      reordered = true
      if (reconciled.restored > 0) {
        logger.debug('Reorder omitted tasks, appended in original order', { restored: reconciled.restored })
      }
    } else {
      const reason = outcome.ok ? 'Reorder returned no valid tasks' : outcome.error.message
      logger.warn('Reorder unavailable, keeping original order', { reason })
    }
  }

  const { placements, skipped } = packDay(ordered, window, logger)
  logger.info('Day planned', {
    category: options.category,
    placed: placements.length,
    skipped: skipped.length,
    reordered,
  })
  return { window, placements, skipped, reordered }
}

export function toPlacedTask(placement: Placement): PlacedTask {
  return {
    description: placement.task.description,
    startTime: formatClockTime(placement.start),
    endTime: formatClockTime(placement.end),
  }
}

/** Chronological display timeline; an empty list means nothing could be scheduled. */
export async function scheduleTasks(
  inputs: readonly TaskInput[],
  profile: Profile,
  options: PlanOptions
): Promise<PlacedTask[]> {
  const plan = await planDay(inputs, profile, options)
  return plan.placements.map(toPlacedTask)
}
