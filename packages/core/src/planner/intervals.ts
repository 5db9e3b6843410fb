import { compareAsc, dayWindow, minutesBetween, toDateKey } from './time'
import type { BusyInterval, DayWindowOptions, FreeWindow, TimeInterval } from './types'

export interface FreeWindowOptions extends DayWindowOptions {
  minBlockMinutes: number
}

export const DEFAULT_FREE_WINDOW_OPTIONS: FreeWindowOptions = {
  timeZone: 'UTC',
  dayStartHour: 6,
  dayEndHour: 22,
  minBlockMinutes: 15,
}

/**
 * Sorts intervals by start and folds overlapping or touching ones together.
 * Inverted and empty intervals are dropped. Inputs are not mutated.
 */
export function mergeIntervals(intervals: ReadonlyArray<TimeInterval>): TimeInterval[] {
  const sorted = intervals
    .filter((i) => i.start < i.end)
    .map((i) => ({ start: new Date(i.start), end: new Date(i.end) }))
    .sort((a, b) => compareAsc(a.start, b.start))

  const merged: TimeInterval[] = []
  for (const interval of sorted) {
    const last = merged[merged.length - 1]
    if (!last || interval.start > last.end) {
      merged.push(interval)
    } else if (interval.end > last.end) {
      last.end = interval.end
    }
  }
  return merged
}

// Busy intervals of `day`, clamped to the day window. Entries marked busy=false and
// entries whose calendar dates don't include the day are skipped.
export function busyWithinDay(
  day: string,
  busy: ReadonlyArray<BusyInterval>,
  options: DayWindowOptions,
): TimeInterval[] {
  const { windowStart, windowEnd } = dayWindow(day, options)
  const clamped: TimeInterval[] = []
  for (const b of busy) {
    if (b.busy === false || !(b.start < b.end)) continue
    if (toDateKey(b.start, options.timeZone) > day || toDateKey(b.end, options.timeZone) < day) continue
    const start = b.start < windowStart ? windowStart : b.start
    const end = b.end > windowEnd ? windowEnd : b.end
    if (start < end) clamped.push({ start: new Date(start), end: new Date(end) })
  }
  return clamped
}

/**
 * Free windows of `day` given the busy set: the gaps between merged busy intervals
 * inside the day window, keeping only those at least `minBlockMinutes` long.
 */
export function freeWindows(
  day: string,
  busy: ReadonlyArray<BusyInterval>,
  options: Partial<FreeWindowOptions> = {},
): FreeWindow[] {
  const opts: FreeWindowOptions = { ...DEFAULT_FREE_WINDOW_OPTIONS, ...options }
  const { windowStart, windowEnd } = dayWindow(day, opts)
  const merged = mergeIntervals(busyWithinDay(day, busy, opts))

  const free: FreeWindow[] = []
  let cursor = windowStart
  for (const b of merged) {
    if (cursor < b.start && minutesBetween(cursor, b.start) >= opts.minBlockMinutes) {
      free.push({ start: new Date(cursor), end: new Date(b.start) })
    }
    if (b.end > cursor) cursor = b.end
  }
  if (cursor < windowEnd && minutesBetween(cursor, windowEnd) >= opts.minBlockMinutes) {
    free.push({ start: new Date(cursor), end: new Date(windowEnd) })
  }
  return free
}
