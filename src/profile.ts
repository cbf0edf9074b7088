/**
 * User Profile
 *
 * Working hours, preferred break length and energy by time of day. The packer
 * reads only `workHours.end`; the other fields travel to the reorder service.
 * Missing fields take the defaults a new user starts with.
 */

import { z } from 'zod'
import { type Result, Ok, Err } from './result'
import { ValidationError } from './errors'
import { LEVELS } from './task-input'

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected 24-hour HH:MM')
const level = z.enum(LEVELS)

export const profileSchema = z.object({
  workHours: z
    .object({
      start: clockTime.default('09:00'),
      end: clockTime.default('17:00'),
    })
    .default({}),
  breakDurationMin: z.number().int().min(5).max(60).default(15),
  energyLevels: z
    .object({
      morning: level.default('high'),
      afternoon: level.default('medium'),
      evening: level.default('low'),
    })
    .default({}),
})

export type Profile = z.infer<typeof profileSchema>

export const DEFAULT_PROFILE: Profile = profileSchema.parse({})

export function parseProfile(raw: unknown): Result<Profile, ValidationError> {
  const parsed = profileSchema.safeParse(raw)
  if (parsed.success) return Ok(parsed.data)

  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
  return Err(new ValidationError(`Invalid profile: ${issues}`))
}
