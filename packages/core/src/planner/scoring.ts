import { hourIn, minutesBetween } from './time'
import type { FreeWindow, ScoringContext, Task } from './types'

export const UNUSABLE_SCORE = -1e9
export const MIN_USABLE_MINUTES = 15

const URGENCY_HORIZON_MINUTES = 60 * 24 * 7
const LENGTH_SATURATION_MINUTES = 120

export const SCORE_WEIGHTS = {
  priority: 1.8,
  urgency: 1.4,
  circadian: 0.8,
  length: 0.5,
  earliness: 0.2,
} as const

export interface ScoreBreakdown {
  priority: number
  urgency: number
  circadian: number
  length: number
  earliness: number
  total: number
}

export function normalizedPriority(priority: number): number {
  return (priority - 1) / 4
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value))
}

// 0 without a deadline or a week or more out, 1 once it is due
export function urgency(task: Task, now: Date): number {
  if (!task.deadline) return 0
  const minutesLeft = Math.trunc((task.deadline.getTime() - now.getTime()) / 60000)
  return clamp01(1 - minutesLeft / URGENCY_HORIZON_MINUTES)
}

// Morning 07-12 and afternoon 13-17, hour bounds inclusive
export function circadianBias(task: Task, startHour: number): number {
  let circ = 0
  if (task.preferMorning) circ += startHour >= 7 && startHour <= 12 ? 1.0 : -0.3
  if (task.preferAfternoon) circ += startHour >= 13 && startHour <= 17 ? 1.0 : -0.3
  return circ
}

/**
 * Weighted terms behind {@link slotScore}. Does not apply the usability cutoff.
 */
export function scoreBreakdown(window: FreeWindow, task: Task, context: ScoringContext): ScoreBreakdown {
  const durationMinutes = minutesBetween(window.start, window.end)
  const hoursAhead = (window.start.getTime() - context.now.getTime()) / 3600000

  const priority = SCORE_WEIGHTS.priority * normalizedPriority(task.priority)
  const urgent = SCORE_WEIGHTS.urgency * urgency(task, context.now)
  const circadian = SCORE_WEIGHTS.circadian * circadianBias(task, hourIn(window.start, context.timeZone))
  const length = SCORE_WEIGHTS.length * Math.min(1, durationMinutes / LENGTH_SATURATION_MINUTES)
  const earliness = SCORE_WEIGHTS.earliness * (1 / Math.max(1, hoursAhead))

  return {
    priority,
    urgency: urgent,
    circadian,
    length,
    earliness,
    total: priority + urgent + circadian + length + earliness,
  }
}

// Suitability of a free window for a task; UNUSABLE_SCORE marks windows that must never be picked
export function slotScore(window: FreeWindow, task: Task, context: ScoringContext): number {
  if (minutesBetween(window.start, window.end) < MIN_USABLE_MINUTES) return UNUSABLE_SCORE
  return scoreBreakdown(window, task, context).total
}
