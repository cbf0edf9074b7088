/**
 * Time & Date Utilities
 *
 * Wall-clock date/time values as branded ISO strings. Lexicographic order of a
 * LocalDateTime is chronological order, so comparisons are plain string
 * comparisons. Arithmetic goes through the Julian Day Number so adding minutes
 * across midnight, month ends and leap days needs no special cases.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  return String(n).padStart(4, '0')
}

// ============================================================================
// Julian Day Number
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

/** Accepts HH:MM or HH:MM:SS on the 24-hour clock; normalizes to HH:MM:SS. */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  const time = timeOf(dt)
  let totalMinutes = hourOf(time) * 60 + minuteOf(time) + n

  // Floor division keeps negative offsets on the previous day
  const dayDelta = Math.floor(totalMinutes / 1440)
  totalMinutes = totalMinutes - dayDelta * 1440

  const date = dateOf(dt)
  const newDate = dayDelta === 0 ? date : addDays(date, dayDelta)
  return makeDateTime(newDate, makeTime(Math.floor(totalMinutes / 60), totalMinutes % 60, secondOf(time)))
}

/** Whole minutes from a to b; seconds are ignored. */
export function minutesBetween(a: LocalDateTime, b: LocalDateTime): number {
  const days = daysBetween(dateOf(a), dateOf(b))
  const timeA = timeOf(a)
  const timeB = timeOf(b)
  const minutesA = hourOf(timeA) * 60 + minuteOf(timeA)
  const minutesB = hourOf(timeB) * 60 + minuteOf(timeB)
  return days * 1440 + (minutesB - minutesA)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function minDateTime(a: LocalDateTime, b: LocalDateTime): LocalDateTime {
  return a <= b ? a : b
}

export function maxDateTime(a: LocalDateTime, b: LocalDateTime): LocalDateTime {
  return a >= b ? a : b
}

// ============================================================================
// Display
// ============================================================================

/** 12-hour clock without a leading zero on the hour: `9:05 AM`, `12:30 PM`. */
export function formatClockTime(dt: LocalDateTime): string {
  const time = timeOf(dt)
  const hour = hourOf(time)
  const hour12 = hour % 12 === 0 ? 12 : hour % 12
  return `${hour12}:${pad2(minuteOf(time))} ${hour < 12 ? 'AM' : 'PM'}`
}

// ============================================================================
// Timezone Conversion
// ============================================================================

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
}

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  // Sub-second precision of the instant is not part of the formatted parts
  return Math.round((localMs - Math.floor(utcMs / 1000) * 1000) / 60000)
}

function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds())
  )
}

/** Wall-clock reading of an instant in timezone tz. */
export function toLocalDateTime(instant: Date, tz: string): LocalDateTime {
  const ms = instant.getTime()
  if (tz === 'UTC') return msToDt(ms)
  return msToDt(ms + utcOffsetAtMs(ms, tz) * 60000)
}
