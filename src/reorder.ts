/**
 * Reorder Collaborator
 *
 * Asks a text-generation service to reorder the day's tasks for productivity
 * and energy alignment. The service is a black box that may be unavailable or
 * wrong: every outcome comes back as a Result and the scheduler decides what to
 * do with a failure. Deadlines are not part of the exchange.
 */

import { type Result, Ok, Err } from './result'
import { ParseError, ReorderError } from './errors'
import type { LlmClient } from './llm-client'
import type { Profile } from './profile'
import { type Task, normalizeTasks } from './task-input'

// ============================================================================
// Types
// ============================================================================

export type ScheduleCategory = 'work' | 'personal'

export type ReorderRequest = {
  tasks: readonly Task[]
  profile: Profile
  category: ScheduleCategory
}

export type ReorderOptions = {
  signal?: AbortSignal
}

export interface Reorderer {
  reorder(request: ReorderRequest, options?: ReorderOptions): Promise<Result<Task[], ReorderError>>
}

// ============================================================================
// Prompt
// ============================================================================

export const REORDER_SYSTEM_PROMPT = 'You are an expert day planner.'

export const REORDER_INSTRUCTIONS =
  'Reorder tasks to maximize productivity, respecting durations where reasonable. ' +
  "Prefer high-energy tasks during the user's higher energy periods. " +
  'Return ONLY a JSON array of tasks with the SAME schema ' +
  '(description, priority, energy, duration).'

export function scheduleTypeLabel(category: ScheduleCategory): string {
  return category === 'work' ? 'work-related' : 'personal'
}

export function buildReorderPrompt(request: ReorderRequest): string {
  const { profile } = request
  const payload = {
    schedule_type: scheduleTypeLabel(request.category),
    profile: {
      work_hours: profile.workHours,
      break_duration_min: profile.breakDurationMin,
      energy_levels: profile.energyLevels,
    },
    tasks: request.tasks,
  }
  return `${REORDER_INSTRUCTIONS}\n\n${JSON.stringify(payload)}`
}

// ============================================================================
// Response
// ============================================================================

/** Parses text as JSON, falling back to the first bracketed span inside it. */
export function extractJson(text: string): Result<unknown, ParseError> {
  const trimmed = text.trim()
  try {
    return Ok(JSON.parse(trimmed))
  } catch {
    const span = /(\[[\s\S]*\]|\{[\s\S]*\})/.exec(trimmed)?.[1]
    if (span === undefined) return Err(new ParseError('No JSON found in reorder response'))
    try {
      return Ok(JSON.parse(span))
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e)
      return Err(new ParseError(`Malformed JSON in reorder response: ${reason}`))
    }
  }
}

export function parseReorderResponse(text: string): Result<Task[], ReorderError> {
  const json = extractJson(text)
  if (!json.ok) return Err(new ReorderError(json.error.message))
  if (!Array.isArray(json.value)) return Err(new ReorderError('Reorder response is not a JSON array'))

  // The service is not trusted with deadlines; they are re-derived by the caller
  const tasks = normalizeTasks(json.value).map((task) => ({ ...task, deadline: null }))
  if (tasks.length === 0) return Err(new ReorderError('Reorder response contained no valid tasks'))
  return Ok(tasks)
}

// ============================================================================
// Factory
// ============================================================================

export function createLlmReorderer(client: LlmClient): Reorderer {
  return {
    async reorder(request, options = {}) {
      let text: string
      try {
        text = await client.complete(
          {
            system: REORDER_SYSTEM_PROMPT,
            prompt: buildReorderPrompt(request),
            temperature: 0.2,
            maxTokens: 1200,
          },
          options
        )
      } catch (e) {
        const reason = e instanceof Error ? e.message : String(e)
        return Err(new ReorderError(`Reorder service call failed: ${reason}`))
      }
      return parseReorderResponse(text)
    },
  }
}
