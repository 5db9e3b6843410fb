// Time helpers. Instants stay JS Dates; anything wall-clock (day keys, hours, the
// day window) is read through luxon in the planner's time zone.

import { DateTime, Info } from 'luxon'
import { PlannerInputError } from '../errors'
import type { Clock, DayWindowOptions } from './types'

const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export function minutesBetween(start: Date, end: Date): number {
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / 60000))
}

export function addMinutes(date: Date, minutes: number): Date {
  return new Date(date.getTime() + minutes * 60000)
}

export function compareAsc(a: Date, b: Date): number {
  return a.getTime() - b.getTime()
}

export function overlaps(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart < bEnd && bStart < aEnd
}

export function isValidTimeZone(timeZone: string): boolean {
  return Info.normalizeZone(timeZone).isValid
}

export function parseDayKey(day: string, timeZone: string): DateTime<true> {
  if (!DAY_KEY_PATTERN.test(day)) {
    throw new PlannerInputError(`day must be YYYY-MM-DD, got "${day}"`, 'day')
  }
  const parsed = DateTime.fromISO(day, { zone: timeZone })
  if (!parsed.isValid) {
    throw new PlannerInputError(`invalid day "${day}": ${parsed.invalidReason}`, 'day')
  }
  return parsed.startOf('day')
}

// Builds the [startHour, endHour) bounds of the given day in the configured zone
export function dayWindow(day: string, options: DayWindowOptions): { windowStart: Date; windowEnd: Date } {
  const date = parseDayKey(day, options.timeZone)
  return {
    windowStart: date.set({ hour: options.dayStartHour }).toJSDate(),
    windowEnd: date.set({ hour: options.dayEndHour }).toJSDate(),
  }
}

export function toDateKey(date: Date, timeZone: string): string {
  return DateTime.fromJSDate(date, { zone: timeZone }).toISODate() ?? ''
}

export function hourIn(date: Date, timeZone: string): number {
  return DateTime.fromJSDate(date, { zone: timeZone }).hour
}

export function formatClock(date: Date, timeZone: string): string {
  return DateTime.fromJSDate(date, { zone: timeZone }).toFormat('HH:mm')
}

export const systemClock: Clock = { now: () => new Date() }

export function fixedClock(at: Date): Clock {
  const frozen = new Date(at)
  return { now: () => new Date(frozen) }
}

// "now" is read once per planning call and shared by every scoring step
export function resolveNow(source: Date | Clock | undefined): Date {
  if (source === undefined) return systemClock.now()
  if (source instanceof Date) return new Date(source)
  return source.now()
}
