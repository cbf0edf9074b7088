/**
 * Segment 11: Day Planner Tests
 *
 * The facade end to end: profile lookup, clock and timezone, reorder wiring.
 */

import { describe, it, expect } from 'vitest'
import { createDayPlanner, createDayPlannerFromEnv } from '../src/planner'
import { createMockProfileStore } from '../src/profile-store'
import { DEFAULT_PROFILE } from '../src/profile'
import { createConsoleLogger } from '../src/logger'
import { ConfigurationError, ValidationError } from '../src/errors'
import { Ok } from '../src/result'
import type { Reorderer } from '../src/reorder'

function fixedClock(iso: string): () => Date {
  return () => new Date(iso)
}

function captureLogs() {
  const lines: Array<Record<string, unknown>> = []
  const logger = createConsoleLogger({
    level: 'debug',
    sink: (_level, line) => {
      const entry: Record<string, unknown> = JSON.parse(line)
      lines.push(entry)
    },
  })
  return { logger, lines }
}

describe('Segment 11: Day Planner', () => {
  describe('construction', () => {
    it('rejects an unknown timezone', () => {
      expect(() => createDayPlanner({ timezone: 'Nowhere/City' })).toThrow(ValidationError)
      expect(() => createDayPlanner({ timezone: 'Nowhere/City' })).toThrow('Invalid timezone: Nowhere/City')
    })

    it('rejects a non-positive reorder timeout', () => {
      expect(() => createDayPlanner({ reorderTimeoutMs: 0 })).toThrow(ValidationError)
    })
  })

  describe('plan', () => {
    it('falls back to the default profile for an unknown user', async () => {
      const { logger, lines } = captureLogs()
      const planner = createDayPlanner({ clock: fixedClock('2024-03-15T09:00:00Z'), logger })

      const plan = await planner.plan('alice', [{ description: 'Email' }], 'work')

      expect(plan.window?.end).toBe('2024-03-15T17:00:00')
      expect(lines[0]).toMatchObject({
        level: 'info',
        message: 'No stored profile, using defaults',
        component: 'planner',
        userId: 'alice',
      })
    })

    it('uses the stored profile', async () => {
      const profileStore = createMockProfileStore()
      await profileStore.saveProfile('alice', { ...DEFAULT_PROFILE, workHours: { start: '08:00', end: '10:00' } })
      const planner = createDayPlanner({ profileStore, clock: fixedClock('2024-03-15T09:00:00Z') })

      const plan = await planner.plan('alice', [{ description: 'A', duration: 60 }, { description: 'B' }], 'work')

      expect(plan.placements.map((p) => [p.task.description, p.start, p.end])).toEqual([
        ['A', '2024-03-15T09:00:00', '2024-03-15T10:00:00'],
      ])
      expect(plan.skipped.map((s) => [s.task.description, s.reason])).toEqual([['B', 'windowExhausted']])
    })

    it('reads the clock in the configured timezone', async () => {
      // 13:00 UTC is 09:00 in New York during daylight saving time
      const planner = createDayPlanner({ timezone: 'America/New_York', clock: fixedClock('2024-07-01T13:00:00Z') })
      const plan = await planner.plan('alice', [{ description: 'Email' }], 'personal')
      expect(plan.window).toEqual({
        date: '2024-07-01',
        startFrom: '2024-07-01T09:00:00',
        end: '2024-07-01T15:00:00',
      })
    })

    it('passes the reorderer through', async () => {
      const reorderer: Reorderer = {
        async reorder(request) {
          return Ok([...request.tasks].reverse())
        },
      }
      const planner = createDayPlanner({ reorderer, clock: fixedClock('2024-03-15T09:00:00Z') })
      const plan = await planner.plan('alice', [{ description: 'A' }, { description: 'B' }], 'work')
      expect(plan.reordered).toBe(true)
      expect(plan.placements.map((p) => p.task.description)).toEqual(['B', 'A'])
    })
  })

  describe('schedule', () => {
    it('returns the display timeline', async () => {
      const planner = createDayPlanner({ clock: fixedClock('2024-03-15T09:00:00Z') })
      const timeline = await planner.schedule(
        'alice',
        [{ description: 'Email', duration: 30 }, { description: 'Submit report before 11 am', duration: 60 }],
        'work'
      )
      expect(timeline).toEqual([
        { description: 'Email', startTime: '9:00 AM', endTime: '9:30 AM' },
        { description: 'Submit report before 11 am', startTime: '10:00 AM', endTime: '11:00 AM' },
      ])
    })

    it('returns nothing after the workday', async () => {
      const planner = createDayPlanner({ clock: fixedClock('2024-03-15T18:00:00Z') })
      expect(await planner.schedule('alice', [{ description: 'Email' }], 'work')).toEqual([])
    })
  })

  describe('close', () => {
    it('closes the profile store', async () => {
      const profileStore = createMockProfileStore()
      await profileStore.saveProfile('alice', DEFAULT_PROFILE)
      const planner = createDayPlanner({ profileStore })
      await planner.close()
      expect(await profileStore.listUserIds()).toEqual([])
    })
  })

  describe('createDayPlannerFromEnv', () => {
    it('runs without a reorder key', async () => {
      const planner = await createDayPlannerFromEnv(
        { SLOTWISE_LOG_LEVEL: 'error' },
        { clock: fixedClock('2024-03-15T09:00:00Z') }
      )
      const plan = await planner.plan('alice', [{ description: 'Email' }], 'personal')
      expect(plan.reordered).toBe(false)
      expect(plan.placements).toHaveLength(1)
      await planner.close()
    })

    it('opens a SQLite store when a path is configured', async () => {
      const planner = await createDayPlannerFromEnv(
        { SLOTWISE_LOG_LEVEL: 'error', SLOTWISE_DB_PATH: ':memory:', GROQ_API_KEY: 'gsk_test-secret' },
        { clock: fixedClock('2024-03-15T09:00:00Z') }
      )
      const plan = await planner.plan('alice', [], 'work')
      expect(plan.placements).toEqual([])
      await planner.close()
    })

    it('rejects invalid settings', async () => {
      await expect(createDayPlannerFromEnv({ SLOTWISE_LOG_LEVEL: 'loud' })).rejects.toThrow(ConfigurationError)
    })
  })
})
