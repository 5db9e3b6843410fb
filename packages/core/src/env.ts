import { z } from 'zod'
import { toPlannerError } from './errors'
import { LOG_LEVELS, type LogLevel } from './log'
import { parsePreferences } from './schemas'
import type { PlannerPreferences } from './planner/types'

// Blank variables count as unset
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value)

const optionalInt = z.preprocess(blankAsUnset, z.coerce.number().int().optional())

const envSchema = z.object({
  PLANNER_TIME_ZONE: z.preprocess(blankAsUnset, z.string().optional()),
  PLANNER_DAY_START_HOUR: optionalInt,
  PLANNER_DAY_END_HOUR: optionalInt,
  PLANNER_MIN_BLOCK_MINUTES: optionalInt,
  PLANNER_LOG_LEVEL: z.preprocess(blankAsUnset, z.enum(LOG_LEVELS).default('info')),
})

export type PlannerEnv = z.infer<typeof envSchema>

export interface PlannerRuntimeConfig {
  preferences: PlannerPreferences
  logLevel: LogLevel
}

export function loadPlannerEnv(source: NodeJS.ProcessEnv = process.env): PlannerRuntimeConfig {
  const parsed = envSchema.safeParse(source)
  if (!parsed.success) throw toPlannerError(parsed.error)
  const env = parsed.data
  return {
    preferences: parsePreferences({
      timeZone: env.PLANNER_TIME_ZONE,
      dayStartHour: env.PLANNER_DAY_START_HOUR,
      dayEndHour: env.PLANNER_DAY_END_HOUR,
      minBlockMinutes: env.PLANNER_MIN_BLOCK_MINUTES,
    }),
    logLevel: env.PLANNER_LOG_LEVEL,
  }
}
