/**
 * Day Planner
 *
 * Consumer-facing facade: loads the user's profile, reads the clock in the
 * configured timezone and runs the scheduling pipeline.
 */

import { toLocalDateTime, isValidTimezone } from './time-date'
import { ValidationError } from './errors'
import { DEFAULT_PROFILE, type Profile } from './profile'
import { type ProfileStore, createMockProfileStore } from './profile-store'
import { createSqliteProfileStore } from './sqlite-profile-store'
import type { Reorderer, ScheduleCategory } from './reorder'
import { createLlmReorderer } from './reorder'
import { createGroqLlmClient } from './llm-client'
import { type Env, loadLlmConfig, loadRuntimeSettings } from './config'
import { type Logger, createConsoleLogger, nullLogger } from './logger'
import type { TaskInput } from './task-input'
import { type DayPlan, type PlacedTask, planDay, toPlacedTask } from './scheduler'

// ============================================================================
// Types
// ============================================================================

export type DayPlannerConfig = {
  profileStore?: ProfileStore
  reorderer?: Reorderer
  logger?: Logger
  /** IANA timezone the clock is read in (default: 'UTC') */
  timezone?: string
  clock?: () => Date
  reorderTimeoutMs?: number
}

export type DayPlanner = {
  plan(userId: string, tasks: readonly TaskInput[], category: ScheduleCategory): Promise<DayPlan>
  schedule(userId: string, tasks: readonly TaskInput[], category: ScheduleCategory): Promise<PlacedTask[]>
  close(): Promise<void>
}

// ============================================================================
// Factory
// ============================================================================

export function createDayPlanner(config: DayPlannerConfig = {}): DayPlanner {
  const timezone = config.timezone ?? 'UTC'
  if (!isValidTimezone(timezone)) {
    throw new ValidationError(`Invalid timezone: ${timezone}`)
  }
  if (config.reorderTimeoutMs !== undefined && !(config.reorderTimeoutMs > 0)) {
    throw new ValidationError(`reorderTimeoutMs must be positive; got ${config.reorderTimeoutMs}`)
  }

  const profileStore = config.profileStore ?? createMockProfileStore()
  const logger = (config.logger ?? nullLogger).child({ component: 'planner' })
  const clock = config.clock ?? (() => new Date())

  async function loadProfile(userId: string): Promise<Profile> {
    const stored = await profileStore.getProfile(userId)
    if (stored) return stored
    logger.info('No stored profile, using defaults', { userId })
    return DEFAULT_PROFILE
  }

  async function plan(userId: string, tasks: readonly TaskInput[], category: ScheduleCategory): Promise<DayPlan> {
    const profile = await loadProfile(userId)
    return planDay(tasks, profile, {
      now: toLocalDateTime(clock(), timezone),
      category,
      reorderer: config.reorderer,
      reorderTimeoutMs: config.reorderTimeoutMs,
      logger: logger.child({ userId }),
    })
  }

  return {
    plan,

    async schedule(userId, tasks, category) {
      const result = await plan(userId, tasks, category)
      return result.placements.map(toPlacedTask)
    },

    async close() {
      await profileStore.close()
    },
  }
}

/**
 * Builds a planner from environment variables (see config.ts). Without a usable
 * API key the planner runs without the reorder step.
 */
export async function createDayPlannerFromEnv(
  env: Env = process.env,
  overrides: Pick<DayPlannerConfig, 'timezone' | 'clock'> = {}
): Promise<DayPlanner> {
  const settings = loadRuntimeSettings(env)
  if (!settings.ok) throw settings.error

  const logger = createConsoleLogger({ level: settings.value.logLevel, context: { service: 'slotwise' } })

  let reorderer: Reorderer | undefined
  const llm = loadLlmConfig(env)
  if (llm.ok) {
    reorderer = createLlmReorderer(createGroqLlmClient(llm.value))
  } else {
    logger.warn('Reorder disabled', { reason: llm.error.message })
  }

  const profileStore = settings.value.dbPath
    ? await createSqliteProfileStore(settings.value.dbPath)
    : createMockProfileStore()

  return createDayPlanner({
    ...overrides,
    profileStore,
    reorderer,
    logger,
    reorderTimeoutMs: settings.value.reorderTimeoutMs,
  })
}
