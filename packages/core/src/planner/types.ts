import type { Logger } from '../log'

export type BlockCategory = 'task' | 'buffer' | 'habit'

export type HabitAnchor = 'morning' | 'after-lunch' | 'evening' | ''

export interface TimeInterval {
  start: Date
  end: Date
}

// A maximal gap between busy intervals inside the day window
export type FreeWindow = TimeInterval

export interface BusyInterval extends TimeInterval {
  busy?: boolean // defaults to true; tentative entries pass `false`
}

export interface BusyBlock extends BusyInterval {
  title: string
  category?: string
  notes?: string
  color?: string
  seriesId?: string
}

export interface Task {
  id?: string
  title: string
  // Total focused effort; may be split across windows when splitOk is set
  effortMinutes: number
  // 1..5, 5 is highest
  priority: number
  deadline?: Date
  preferMorning: boolean
  preferAfternoon: boolean
  splitOk: boolean
  maxChunkMinutes: number
  notes?: string // not used in scoring
}

export interface Habit {
  title: string
  targetMinutes: number
  anchor: HabitAnchor
  priority: number // 1..5
}

export interface PlannedBlock {
  title: string
  description: string
  start: Date
  end: Date
  color: string
  category: BlockCategory
  rationale: string[] // applied rules/decisions
}

export interface DayWindowOptions {
  timeZone: string // IANA zone, e.g. "Europe/Berlin"
  dayStartHour: number // 0-23, local wall clock
  dayEndHour: number // 0-23, local wall clock
}

export interface PlannerPreferences extends DayWindowOptions {
  minBlockMinutes: number // shortest free window worth reporting
  preBufferMinutes: number
  postBufferMinutes: number
}

export interface Clock {
  now(): Date
}

export interface ScoringContext {
  now: Date
  timeZone: string
}

export interface PlanningContext {
  now: Date
  preferences: PlannerPreferences
  logger: Logger
}

export interface UnscheduledItem {
  kind: 'task' | 'habit'
  id?: string
  title: string
  remainingMinutes: number
}

export interface PlacementResult {
  blocks: PlannedBlock[]
  unscheduled: UnscheduledItem[]
}

// Explicit fallback pools, used when a call supplies no tasks or habits of its own
export interface PlannerPools {
  tasks?: Task[]
  habits?: Habit[]
}

export interface PlanDayArgs {
  day: string // YYYY-MM-DD in the planner's time zone
  now?: Date | Clock
  existing: BusyBlock[]
  tasks?: Task[]
  habits?: Habit[]
  fallback?: PlannerPools
  preferences?: Partial<PlannerPreferences>
  logger?: Logger
}

export interface SuggestDayArgs {
  day: string
  now?: Date | Clock
  pools: PlannerPools
  preferences?: Partial<PlannerPreferences>
  logger?: Logger
}

export interface PlanDayResult {
  day: string
  blocks: PlannedBlock[] // task blocks (with buffers) first, then habit blocks
  summary: string
  unscheduled: UnscheduledItem[]
}
