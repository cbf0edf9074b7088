/**
 * Profile Store
 *
 * Persistence interface for user profiles + in-memory implementation.
 */

import { NotFoundError, ValidationError } from './errors'
import { type Profile, parseProfile } from './profile'

export interface ProfileStore {
  getProfile(userId: string): Promise<Profile | null>
  /** Validates before writing; throws ValidationError for an invalid profile */
  saveProfile(userId: string, profile: Profile): Promise<void>
  /** Throws NotFoundError when the user has no profile */
  deleteProfile(userId: string): Promise<void>
  listUserIds(): Promise<string[]>
  close(): Promise<void>
}

export function validUserId(userId: string): string {
  const trimmed = userId.trim()
  if (!trimmed) throw new ValidationError('User id must not be empty')
  return trimmed
}

export function validProfile(profile: Profile): Profile {
  const parsed = parseProfile(profile)
  if (!parsed.ok) throw parsed.error
  return parsed.value
}

export function createMockProfileStore(): ProfileStore {
  const profiles = new Map<string, Profile>()

  return {
    async getProfile(userId) {
      const profile = profiles.get(userId.trim())
      return profile ? structuredClone(profile) : null
    },

    async saveProfile(userId, profile) {
      profiles.set(validUserId(userId), validProfile(profile))
    },

    async deleteProfile(userId) {
      const key = userId.trim()
      if (!profiles.delete(key)) throw new NotFoundError(`Profile for '${key}' not found`)
    },

    async listUserIds() {
      return [...profiles.keys()].sort()
    },

    async close() {
      profiles.clear()
    },
  }
}
