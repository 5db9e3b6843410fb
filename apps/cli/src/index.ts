#!/usr/bin/env tsx

/**
 * plan-day
 * Reads a JSON day file ({ day?, existing?, tasks?, habits? }) and prints the planned blocks.
 *
 *   plan-day <file.json> [--day YYYY-MM-DD] [--now ISO-8601] [--json]
 */

import { readFileSync } from 'fs'
import { DateTime } from 'luxon'
import {
  PlannerInputError,
  createLogger,
  formatClock,
  loadPlannerEnv,
  parseDayFile,
  planDay,
  toPlannerError,
  type PlanDayResult,
} from '@planday/core'

export interface CliOptions {
  file: string
  day?: string
  now?: string
  json: boolean
}

export interface CliIo {
  stdout: (line: string) => void
  stderr: (line: string) => void
}

const USAGE = 'usage: plan-day <file.json> [--day YYYY-MM-DD] [--now ISO-8601] [--json]'

export function parseArgs(argv: string[]): CliOptions {
  let file: string | undefined
  let day: string | undefined
  let now: string | undefined
  let json = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === '--json') json = true
    else if (arg === '--day' || arg === '--now') {
      const value = argv[i + 1]
      if (value === undefined || value.startsWith('--')) throw new PlannerInputError(`${arg} needs a value`, arg.slice(2))
      if (arg === '--day') day = value
      else now = value
      i++
    } else if (arg.startsWith('--')) throw new PlannerInputError(`unknown option ${arg}`)
    else if (file === undefined) file = arg
    else throw new PlannerInputError(`unexpected argument ${arg}`)
  }

  if (!file) throw new PlannerInputError(USAGE)
  return { file, day, now, json }
}

function parseNow(value: string | undefined): Date {
  if (value === undefined) return new Date()
  const parsed = new Date(value)
  if (Number.isNaN(parsed.getTime())) throw new PlannerInputError(`--now is not a valid timestamp: ${value}`, 'now')
  return parsed
}

export function formatPlan(result: PlanDayResult, timeZone: string): string[] {
  const lines = [...result.blocks]
    .sort((a, b) => a.start.getTime() - b.start.getTime())
    .map((b) => `${formatClock(b.start, timeZone)}–${formatClock(b.end, timeZone)}  ${b.title}`)
  for (const item of result.unscheduled) {
    lines.push(`Unscheduled ${item.kind}: ${item.title} (${item.remainingMinutes} min)`)
  }
  lines.push(result.summary)
  return lines
}

export function runCli(argv: string[], env: NodeJS.ProcessEnv, io: CliIo): number {
  try {
    const options = parseArgs(argv)
    const { preferences, logLevel } = loadPlannerEnv(env)
    const now = parseNow(options.now)

    let raw: unknown
    try {
      raw = JSON.parse(readFileSync(options.file, 'utf8'))
    } catch (error) {
      throw new PlannerInputError(`cannot read ${options.file}: ${toPlannerError(error).message}`, 'file')
    }
    const input = parseDayFile(raw)
    const day = options.day ?? input.day ?? DateTime.fromJSDate(now, { zone: preferences.timeZone }).toISODate() ?? ''

    const result = planDay({
      day,
      now,
      existing: input.existing,
      tasks: input.tasks,
      habits: input.habits,
      preferences,
      logger: createLogger('planner', logLevel),
    })

    if (options.json) io.stdout(JSON.stringify(result, null, 2))
    else formatPlan(result, preferences.timeZone).forEach((line) => io.stdout(line))
    return 0
  } catch (error) {
    io.stderr(`plan-day: ${toPlannerError(error).message}`)
    return 1
  }
}

if (require.main === module) {
  const code = runCli(process.argv.slice(2), process.env, {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  })
  process.exit(code)
}
