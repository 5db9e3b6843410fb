import { z } from 'zod'
import { toPlannerError } from './errors'
import { isValidTimeZone } from './planner/time'
import type { BusyBlock, Habit, PlannerPreferences, Task } from './planner/types'

export const dayKeySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'day must be YYYY-MM-DD')

export const prioritySchema = z.number().int().min(1).max(5)

export const taskSchema = z.object({
  id: z.string().optional(),
  title: z.string().min(1),
  effortMinutes: z.number().int().positive().default(30),
  priority: prioritySchema.default(3),
  deadline: z.coerce.date().optional(),
  preferMorning: z.boolean().default(false),
  preferAfternoon: z.boolean().default(false),
  splitOk: z.boolean().default(true),
  maxChunkMinutes: z.number().int().min(15).default(120),
  notes: z.string().optional(),
})

export type TaskRecord = z.infer<typeof taskSchema>

export const habitSchema = z.object({
  title: z.string().min(1),
  targetMinutes: z.number().int().positive().default(20),
  anchor: z.enum(['morning', 'after-lunch', 'evening', '']).default(''),
  priority: prioritySchema.default(3),
})

export type HabitRecord = z.infer<typeof habitSchema>

// start/end are not cross-checked: degenerate intervals are dropped by the planner
export const busyBlockSchema = z.object({
  title: z.string(),
  category: z.string().optional(),
  notes: z.string().optional(),
  start: z.coerce.date(),
  end: z.coerce.date(),
  color: z.string().optional(),
  seriesId: z.string().optional(),
  busy: z.boolean().optional(),
})

export type BusyBlockRecord = z.infer<typeof busyBlockSchema>

export const plannerPreferencesSchema = z
  .object({
    timeZone: z.string().min(1).refine(isValidTimeZone, { message: 'unknown time zone' }).default('UTC'),
    dayStartHour: z.number().int().min(0).max(23).default(6),
    dayEndHour: z.number().int().min(0).max(23).default(22),
    minBlockMinutes: z.number().int().positive().default(15),
    preBufferMinutes: z.number().int().min(0).default(5),
    postBufferMinutes: z.number().int().min(0).default(10),
  })
  .refine((p) => p.dayStartHour < p.dayEndHour, {
    message: 'dayStartHour must be before dayEndHour',
    path: ['dayStartHour'],
  })

export const dayFileSchema = z.object({
  day: dayKeySchema.optional(),
  existing: z.array(busyBlockSchema).default([]),
  tasks: z.array(taskSchema).default([]),
  habits: z.array(habitSchema).default([]),
})

export type DayFile = z.infer<typeof dayFileSchema>

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input)
  if (!parsed.success) throw toPlannerError(parsed.error)
  return parsed.data
}

export function parseTasks(input: unknown): Task[] {
  return parseWith(z.array(taskSchema), input)
}

export function parseHabits(input: unknown): Habit[] {
  return parseWith(z.array(habitSchema), input)
}

export function parseBusyBlocks(input: unknown): BusyBlock[] {
  return parseWith(z.array(busyBlockSchema), input)
}

export function parsePreferences(input: unknown = {}): PlannerPreferences {
  return parseWith(plannerPreferencesSchema, input)
}

export function parseDayFile(input: unknown): DayFile {
  return parseWith(dayFileSchema, input)
}
