import { habitBlock } from './blocks'
import { normalizedPriority, UNUSABLE_SCORE } from './scoring'
import { addMinutes, hourIn, minutesBetween } from './time'
import type { FreeWindow, Habit, HabitAnchor, PlacementResult, PlannedBlock, PlanningContext, UnscheduledItem } from './types'

type Fragment = { start: Date; end: Date }

export function anchorBonus(anchor: HabitAnchor, startHour: number): number {
  switch (anchor) {
    case 'morning':
      return startHour <= 11 ? 1.0 : -0.2
    case 'after-lunch':
      return startHour >= 12 && startHour <= 15 ? 1.0 : -0.2
    case 'evening':
      return startHour >= 17 ? 1.0 : -0.2
    default:
      return 0
  }
}

// Longer windows are mildly preferred (uncapped), plus anchor fit and priority
export function habitWindowScore(window: FreeWindow, habit: Habit, timeZone: string): number {
  const hours = minutesBetween(window.start, window.end) / 60
  return 0.2 * hours + anchorBonus(habit.anchor, hourIn(window.start, timeZone)) + 0.5 * normalizedPriority(habit.priority)
}

/**
 * One block per habit, in input order, at the start of its best window. The block
 * runs for the habit's full target even when that passes the window's end; such
 * overruns are logged, not clamped.
 */
export function scheduleHabits(
  windows: ReadonlyArray<FreeWindow>,
  habits: ReadonlyArray<Habit>,
  context: PlanningContext,
): PlacementResult {
  const { timeZone, minBlockMinutes } = context.preferences
  const blocks: PlannedBlock[] = []
  const unscheduled: UnscheduledItem[] = []
  const pool: Fragment[] = windows.map((w) => ({ start: new Date(w.start), end: new Date(w.end) }))

  for (const habit of habits) {
    let bestIdx = -1
    let best = UNUSABLE_SCORE
    pool.forEach((fragment, i) => {
      const score = habitWindowScore(fragment, habit, timeZone)
      if (score > best) {
        best = score
        bestIdx = i
      }
    })

    const chosen = pool[bestIdx]
    if (bestIdx < 0 || !chosen) {
      unscheduled.push({ kind: 'habit', title: habit.title, remainingMinutes: habit.targetMinutes })
      continue
    }

    const start = chosen.start
    const end = addMinutes(start, habit.targetMinutes)
    blocks.push(
      habitBlock(habit.title, start, end, [
        habit.anchor ? `anchor_${habit.anchor}` : 'no_anchor',
        `priority_${habit.priority}`,
        `score_${best.toFixed(3)}`,
      ]),
    )

    const overrun = minutesBetween(chosen.end, end)
    if (overrun > 0) {
      context.logger.warn(`habit "${habit.title}" runs ${overrun}m past its window ending ${chosen.end.toISOString()}`)
    }

    chosen.start = end
    if (minutesBetween(chosen.start, chosen.end) < minBlockMinutes) pool.splice(bestIdx, 1)
  }

  return { blocks, unscheduled }
}
