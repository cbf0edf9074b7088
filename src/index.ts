/**
 * slotwise
 *
 * Public API exports
 */

// Error system
export {
  SlotwiseError, SlotwiseErrorCode,
  ParseError, ValidationError, ConfigurationError,
  NotFoundError, InvalidDataError, ReorderError,
} from './errors'
export type { SlotwiseErrorCode as SlotwiseErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addMinutes, minutesBetween,
  compareDateTimes, minDateTime, maxDateTime,
  formatClockTime, isValidTimezone, toLocalDateTime,
} from './time-date'

// Grid & intervals
export { GRID_MINUTES, roundUpToGrid, roundDownToGrid, isOnGrid } from './grid'
export type { Interval } from './intervals'
export { FORCED_BREAK_MINUTES, overlaps, fits, breakIsFree, addWithBreak, mergeIntervals } from './intervals'

// Placement
export type { Slot } from './placement'
export { SEARCH_STEP_MINUTES, MAX_SEARCH_STEPS, findBackwardSlot, findForwardSlot } from './placement'

// Tasks & deadlines
export type { Level, Task, TaskInput } from './task-input'
export {
  LEVELS, MIN_DURATION, MAX_DURATION, DEFAULT_DURATION, DURATION_LABELS,
  isLevel, coerceLevel, coerceDuration, coerceDeadline,
  taskSchema, normalizeTask, normalizeTasks,
} from './task-input'
export type { DeadlinePhraseShape, DeadlinePhrase } from './deadlines'
export { DEADLINE_PHRASE_SHAPES, findDeadlinePhrase, structuredDeadline, resolveDeadline } from './deadlines'

// Profile
export type { Profile } from './profile'
export { profileSchema, DEFAULT_PROFILE, parseProfile } from './profile'
export type { ProfileStore } from './profile-store'
export { createMockProfileStore } from './profile-store'
export { createSqliteProfileStore } from './sqlite-profile-store'

// Reorder collaborator
export type { LlmClient, LlmRequest, LlmCallOptions } from './llm-client'
export { completeWithFallback, createGroqLlmClient } from './llm-client'
export type { ScheduleCategory, ReorderRequest, ReorderOptions, Reorderer } from './reorder'
export {
  REORDER_SYSTEM_PROMPT, REORDER_INSTRUCTIONS,
  scheduleTypeLabel, buildReorderPrompt, extractJson, parseReorderResponse,
  createLlmReorderer,
} from './reorder'

// Scheduler
export type {
  DayWindow, Placement, SkipReason, SkippedTask, PackResult, DayPlan, PlacedTask, PlanOptions,
} from './scheduler'
export { PERSONAL_WINDOW_HOURS, resolveWindow, packDay, planDay, toPlacedTask, scheduleTasks } from './scheduler'

// Day planner
export type { DayPlannerConfig, DayPlanner } from './planner'
export { createDayPlanner, createDayPlannerFromEnv } from './planner'

// Configuration & logging
export type { Env, LlmConfig, RuntimeSettings } from './config'
export {
  DEFAULT_SCHEDULER_MODEL, DEFAULT_GROQ_BASE_URL, SUBSTITUTE_MODELS,
  loadLlmConfig, loadRuntimeSettings,
} from './config'
export type { LogLevel, LogContext, Logger, LogSink, ConsoleLoggerOptions } from './logger'
export { LOG_LEVELS, isLogLevel, createConsoleLogger, nullLogger } from './logger'
