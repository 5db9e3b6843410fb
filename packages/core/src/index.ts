export * from './planner/types'
export { planDay, suggestDay, summarizePlan } from './planner/algorithm'
export { freeWindows, mergeIntervals, busyWithinDay, DEFAULT_FREE_WINDOW_OPTIONS } from './planner/intervals'
export type { FreeWindowOptions } from './planner/intervals'
export {
  slotScore,
  scoreBreakdown,
  urgency,
  circadianBias,
  normalizedPriority,
  SCORE_WEIGHTS,
  UNUSABLE_SCORE,
  MIN_USABLE_MINUTES,
} from './planner/scoring'
export type { ScoreBreakdown } from './planner/scoring'
export { scheduleTasksIntoWindows, sortTasksForPlacement, compareTasks, MIN_TASK_EFFORT_MINUTES } from './planner/tasks'
export { scheduleHabits, habitWindowScore, anchorBonus } from './planner/habits'
export { BLOCK_COLORS, BUFFER_TITLE, TASK_MARKER, HABIT_MARKER } from './planner/blocks'
export {
  minutesBetween,
  addMinutes,
  overlaps,
  dayWindow,
  parseDayKey,
  toDateKey,
  hourIn,
  formatClock,
  isValidTimeZone,
  systemClock,
  fixedClock,
  resolveNow,
} from './planner/time'
export * from './domain/insights'
export * from './schemas'
export * from './errors'
export * from './log'
export { loadPlannerEnv } from './env'
export type { PlannerEnv, PlannerRuntimeConfig } from './env'
