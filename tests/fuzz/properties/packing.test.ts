/**
 * Property tests for day packing.
 *
 * For any task list and any time of day:
 * - placements never overlap each other or a forced break
 * - every placement keeps its duration and stays inside the window
 * - deadline placements end by their deadline
 * - every task is either placed or reported as skipped, exactly once,
 *   whatever the reorderer returns
 * - packing is deterministic
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { categoryGen, nowGen, taskInputGen, taskListGen } from '../generators'
import { assertTimelineInvariants } from '../../helpers/schedule-invariants'
import { packDay, planDay, resolveWindow } from '../../../src/scheduler'
import { DEFAULT_PROFILE } from '../../../src/profile'
import { normalizeTasks } from '../../../src/task-input'
import { minutesBetween } from '../../../src/time-date'
import type { Reorderer } from '../../../src/reorder'
import { Ok } from '../../../src/result'

describe('Property: day packing', () => {
  it('produces a valid timeline', () => {
    fc.assert(
      fc.property(taskListGen, nowGen, categoryGen, (tasks, now, category) => {
        const window = resolveWindow(now, category, DEFAULT_PROFILE)
        fc.pre(window !== null)
        if (!window) return
        assertTimelineInvariants(packDay(tasks, window), window)
      })
    )
  })

  it('accounts for every task exactly once', () => {
    fc.assert(
      fc.property(taskListGen, nowGen, categoryGen, (tasks, now, category) => {
        const window = resolveWindow(now, category, DEFAULT_PROFILE)
        fc.pre(window !== null)
        if (!window) return
        const { placements, skipped } = packDay(tasks, window)
        const seen = [...placements.map((p) => p.task), ...skipped.map((s) => s.task)]
        expect(seen).toHaveLength(tasks.length)
        for (const task of tasks) expect(seen).toContain(task)
      })
    )
  })

  it('is deterministic', () => {
    fc.assert(
      fc.property(taskListGen, nowGen, categoryGen, (tasks, now, category) => {
        const window = resolveWindow(now, category, DEFAULT_PROFILE)
        fc.pre(window !== null)
        if (!window) return
        expect(packDay(tasks, window)).toEqual(packDay(tasks, window))
      })
    )
  })

  it('keeps a personal window at six hours from the quantized start', () => {
    fc.assert(
      fc.property(nowGen, (now) => {
        const window = resolveWindow(now, 'personal', DEFAULT_PROFILE)
        expect(window).not.toBeNull()
        if (!window) return
        expect(window.startFrom >= now).toBe(true)
        expect(minutesBetween(now, window.startFrom)).toBeLessThan(15)
        expect(minutesBetween(window.startFrom, window.end)).toBe(360)
      })
    )
  })

  it('survives loosely typed input', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(taskInputGen, { maxLength: 10 }), nowGen, categoryGen, async (inputs, now, category) => {
        const plan = await planDay(inputs, DEFAULT_PROFILE, { now, category })
        const expected = normalizeTasks(inputs).length
        expect(plan.placements.length + plan.skipped.length).toBe(expected)
        if (plan.window) assertTimelineInvariants(plan, plan.window)
      })
    )
  })

  it('accounts for every task when the reorderer drops some', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(taskInputGen, { maxLength: 10 }),
        fc.array(fc.boolean(), { maxLength: 10 }),
        nowGen,
        categoryGen,
        async (inputs, keep, now, category) => {
          const reorderer: Reorderer = {
            async reorder(request) {
              return Ok(request.tasks.filter((_, i) => keep[i] ?? false).reverse())
            },
          }
          const plan = await planDay(inputs, DEFAULT_PROFILE, { now, category, reorderer })
          const accounted = [...plan.placements.map((p) => p.task), ...plan.skipped.map((s) => s.task)]
          const expected = normalizeTasks(inputs)
          expect(accounted.map((t) => t.description).sort()).toEqual(expected.map((t) => t.description).sort())
          if (plan.window) assertTimelineInvariants(plan, plan.window)
        }
      )
    )
  })
})
