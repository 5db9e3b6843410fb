import { DateTime } from 'luxon'
import { compareAsc, minutesBetween } from '../planner/time'

export interface InsightEvent {
  title: string
  start: Date
  end: Date
  category?: string
}

export interface ScheduleAnalysis {
  blocks: number
  totalMinutes: number
  firstStart: string // HH:mm or "--"
  lastEnd: string
  meetings: number
  text: string
}

export interface BlockInsights {
  deepWorkBlocks: number
  bufferMinutes: number
  longestBlockMinutes: number
  text: string
}

export interface StressAnalysis {
  load: number
  recovery: number
  risk: number
  text: string
}

export interface BalanceReport {
  score: number
  focusMinutes: number
  recoveryMinutes: number
  text: string
}

const RECOVERY_KEYWORDS = ['buffer', 'walk', 'break', 'exercise']

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

function minuteOfDay(date: Date, timeZone: string): number {
  const local = DateTime.fromJSDate(date, { zone: timeZone })
  return local.hour * 60 + local.minute
}

function formatMinuteOfDay(minutes: number | undefined): string {
  if (minutes === undefined) return '--'
  return `${String(Math.floor(minutes / 60)).padStart(2, '0')}:${String(minutes % 60).padStart(2, '0')}`
}

/**
 * Counts, total time, the wall-clock span the blocks cover and how many look like meetings.
 */
export function analyzeSchedule(events: ReadonlyArray<InsightEvent>, timeZone = 'UTC'): ScheduleAnalysis {
  let totalMinutes = 0
  let meetings = 0
  let first: number | undefined
  let last: number | undefined

  for (const e of events) {
    totalMinutes += minutesBetween(e.start, e.end)
    if (e.title.toLowerCase().includes('meeting')) meetings++
    const startMin = minuteOfDay(e.start, timeZone)
    const endMin = minuteOfDay(e.end, timeZone)
    if (first === undefined || startMin < first) first = startMin
    if (last === undefined || endMin > last) last = endMin
  }

  const firstStart = formatMinuteOfDay(first)
  const lastEnd = formatMinuteOfDay(last)
  const text =
    `Blocks: ${events.length}  |  Total: ${Math.floor(totalMinutes / 60)}h${totalMinutes % 60}m  |  ` +
    `Window: ${firstStart}–${lastEnd}  |  Meetings: ${meetings}`
  return { blocks: events.length, totalMinutes, firstStart, lastEnd, meetings, text }
}

export function provideInsights(blocks: ReadonlyArray<InsightEvent>): BlockInsights {
  let deepWorkBlocks = 0
  let bufferMinutes = 0
  let longestBlockMinutes = 0

  for (const b of blocks) {
    const minutes = minutesBetween(b.start, b.end)
    if (b.category === 'task') deepWorkBlocks++
    if (b.category === 'buffer') bufferMinutes += minutes
    longestBlockMinutes = Math.max(longestBlockMinutes, minutes)
  }

  const text =
    `Deep-work blocks: ${deepWorkBlocks}\nBuffers: ${bufferMinutes} min\nLongest block: ${longestBlockMinutes} min\n` +
    'Tip: keep deep-work blocks ≥ 60m and surround with 5–10m buffers.'
  return { deepWorkBlocks, bufferMinutes, longestBlockMinutes, text }
}

/**
 * Density vs. recovery: load grows with booked minutes, recovery with the gaps
 * between consecutive blocks, risk is load minus half the recovery.
 */
export function analyzeStress(events: ReadonlyArray<InsightEvent>): StressAnalysis {
  const sorted = [...events].sort((a, b) => compareAsc(a.start, b.start))
  let totalMinutes = 0
  let gapMinutes = 0
  let lastEnd: Date | undefined

  for (const e of sorted) {
    totalMinutes += minutesBetween(e.start, e.end)
    if (lastEnd && lastEnd < e.start) gapMinutes += minutesBetween(lastEnd, e.start)
    lastEnd = e.end
  }

  const load = Math.min(100, Math.trunc(totalMinutes / 6))
  const recovery = clamp(Math.trunc(gapMinutes / 3), 0, 100)
  const risk = clamp(load - Math.trunc(recovery / 2), 0, 100)
  const text =
    `Load: ${load}/100\nRecovery: ${recovery}/100\nStress risk: ${risk}/100\n` +
    'Tip: add micro-buffers (5–10m) after meetings and one 30m walk.'
  return { load, recovery, risk, text }
}

export function optimizeWorkLifeBalance(events: ReadonlyArray<InsightEvent>): BalanceReport {
  let focusMinutes = 0
  let recoveryMinutes = 0

  for (const e of events) {
    const title = e.title.toLowerCase()
    const minutes = minutesBetween(e.start, e.end)
    if (RECOVERY_KEYWORDS.some((k) => title.includes(k))) recoveryMinutes += minutes
    else focusMinutes += minutes
  }

  const score = clamp(
    70 + Math.trunc(recoveryMinutes / 15) - Math.trunc(Math.abs(focusMinutes - recoveryMinutes) / 10),
    0,
    100,
  )
  const text =
    `Balance score: ${score}/100\nFocus: ${focusMinutes}m | Recovery: ${recoveryMinutes}m\n` +
    'Suggestion: schedule recovery up to ~35% of total focus time.'
  return { score, focusMinutes, recoveryMinutes, text }
}

export function suggestGoals(): string[] {
  return [
    'Ship two 60–90m deep-work blocks before noon',
    'Book 30–45m movement break',
    'Protect 1h for admin/email batching',
  ]
}

export function recommendHabits(): string[] {
  return ['⚑ Walk 20m after lunch', '📚 Read 25m in the evening', '🧘 5m breathing before first meeting']
}
