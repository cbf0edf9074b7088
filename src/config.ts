/**
 * Environment Configuration
 *
 * Environment variables:
 * - GROQ_API_KEY: API key for the reorder service (preferred)
 * - OPENAI_API_KEY: accepted in place of GROQ_API_KEY; must still be a gsk_ key
 * - GROQ_MODEL_SCHEDULER: model to ask first (default: 'llama-3.3-70b-versatile')
 * - GROQ_BASE_URL: OpenAI-compatible endpoint (default: Groq's)
 * - SLOTWISE_REORDER_TIMEOUT_MS: bound on the reorder round trip
 * - SLOTWISE_LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
 * - SLOTWISE_DB_PATH: SQLite file for profiles (default: in-memory store)
 */

import { type Result, Ok, Err } from './result'
import { ConfigurationError } from './errors'
import { type LogLevel, isLogLevel } from './logger'

export type Env = Record<string, string | undefined>

export const DEFAULT_SCHEDULER_MODEL = 'llama-3.3-70b-versatile'
export const DEFAULT_GROQ_BASE_URL = 'https://api.groq.com/openai/v1'

/** Tried in order after the configured model fails, skipping the configured one */
export const SUBSTITUTE_MODELS: readonly string[] = ['llama-3.3-70b-versatile', 'llama-3.1-8b-instant']

export type LlmConfig = {
  apiKey: string
  model: string
  baseUrl: string
  substituteModels: readonly string[]
}

export type RuntimeSettings = {
  logLevel: LogLevel
  reorderTimeoutMs?: number
  dbPath?: string
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function loadLlmConfig(env: Env = process.env): Result<LlmConfig, ConfigurationError> {
  const apiKey = nonEmpty(env['GROQ_API_KEY']) ?? nonEmpty(env['OPENAI_API_KEY']) ?? ''
  if (!apiKey.startsWith('gsk_')) {
    return Err(new ConfigurationError(
      'Missing or invalid Groq API key. Set GROQ_API_KEY (preferred) or OPENAI_API_KEY with a gsk_ token.'
    ))
  }

  return Ok({
    apiKey,
    model: nonEmpty(env['GROQ_MODEL_SCHEDULER']) ?? DEFAULT_SCHEDULER_MODEL,
    baseUrl: nonEmpty(env['GROQ_BASE_URL']) ?? DEFAULT_GROQ_BASE_URL,
    substituteModels: SUBSTITUTE_MODELS,
  })
}

export function loadRuntimeSettings(env: Env = process.env): Result<RuntimeSettings, ConfigurationError> {
  const level = (nonEmpty(env['SLOTWISE_LOG_LEVEL']) ?? 'info').toLowerCase()
  if (!isLogLevel(level)) {
    return Err(new ConfigurationError(`SLOTWISE_LOG_LEVEL must be one of debug, info, warn, error; got '${level}'`))
  }

  const settings: RuntimeSettings = { logLevel: level }

  const timeout = nonEmpty(env['SLOTWISE_REORDER_TIMEOUT_MS'])
  if (timeout !== undefined) {
    const ms = /^\d+$/.test(timeout) ? parseInt(timeout, 10) : NaN
    if (!(ms > 0)) {
      return Err(new ConfigurationError(`SLOTWISE_REORDER_TIMEOUT_MS must be a positive integer; got '${timeout}'`))
    }
    settings.reorderTimeoutMs = ms
  }

  const dbPath = nonEmpty(env['SLOTWISE_DB_PATH'])
  if (dbPath !== undefined) settings.dbPath = dbPath

  return Ok(settings)
}
