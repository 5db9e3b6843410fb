import { createLogger } from '../log'
import { parsePreferences } from '../schemas'
import { scheduleHabits } from './habits'
import { freeWindows } from './intervals'
import { scheduleTasksIntoWindows } from './tasks'
import { minutesBetween, parseDayKey, resolveNow } from './time'
import type { BusyInterval, PlanDayArgs, PlanDayResult, PlannedBlock, PlanningContext, SuggestDayArgs } from './types'

export function summarizePlan(day: string, taskBlocks: ReadonlyArray<PlannedBlock>, habitBlocks: ReadonlyArray<PlannedBlock>): string {
  const taskMinutes = taskBlocks
    .filter((b) => b.category === 'task')
    .reduce((acc, b) => acc + minutesBetween(b.start, b.end), 0)
  return `Planned ${taskMinutes} task min and ${habitBlocks.length} habit block(s) for ${day}.`
}

/**
 * Plans one day in two passes:
 *  1. free windows from the existing calendar, tasks carved into them
 *  2. free windows recomputed with the task blocks (and buffers) as busy, habits placed
 */
export function planDay(args: PlanDayArgs): PlanDayResult {
  const preferences = parsePreferences(args.preferences ?? {})
  parseDayKey(args.day, preferences.timeZone)

  const context: PlanningContext = {
    now: resolveNow(args.now),
    preferences,
    logger: args.logger ?? createLogger('planner'),
  }
  const tasks = args.tasks && args.tasks.length > 0 ? args.tasks : args.fallback?.tasks ?? []
  const habits = args.habits && args.habits.length > 0 ? args.habits : args.fallback?.habits ?? []

  const freeBefore = freeWindows(args.day, args.existing, preferences)
  const planned = scheduleTasksIntoWindows(freeBefore, tasks, context)

  const busy: BusyInterval[] = [...args.existing, ...planned.blocks]
  const freeAfter = freeWindows(args.day, busy, preferences)
  const placedHabits = scheduleHabits(freeAfter, habits, context)

  const summary = summarizePlan(args.day, planned.blocks, placedHabits.blocks)
  context.logger.info(summary)

  return {
    day: args.day,
    blocks: [...planned.blocks, ...placedHabits.blocks],
    summary,
    unscheduled: [...planned.unscheduled, ...placedHabits.unscheduled],
  }
}

// Plans a day from the given pools alone, ignoring whatever is already on the calendar
export function suggestDay(args: SuggestDayArgs): PlanDayResult {
  return planDay({
    day: args.day,
    now: args.now,
    existing: [],
    tasks: args.pools.tasks,
    habits: args.pools.habits,
    preferences: args.preferences,
    logger: args.logger,
  })
}
