import { loadPlannerEnv } from '../env'
import { PlannerInputError, toPlannerError } from '../errors'
import { parseBusyBlocks, parseDayFile, parseHabits, parsePreferences, parseTasks } from '../schemas'

describe('schemas', () => {
  it('fills task defaults', () => {
    const [task] = parseTasks([{ title: 'Write report', deadline: '2026-10-21T12:00:00Z' }])
    expect(task).toEqual({
      title: 'Write report',
      effortMinutes: 30,
      priority: 3,
      deadline: new Date('2026-10-21T12:00:00Z'),
      preferMorning: false,
      preferAfternoon: false,
      splitOk: true,
      maxChunkMinutes: 120,
    })
  })

  it('fills habit defaults', () => {
    expect(parseHabits([{ title: 'Walk' }])).toEqual([{ title: 'Walk', targetMinutes: 20, anchor: '', priority: 3 }])
  })

  it('keeps inverted busy blocks for the planner to drop', () => {
    const [block] = parseBusyBlocks([{ title: 'Odd', start: '2026-10-20T10:00:00Z', end: '2026-10-20T09:00:00Z' }])
    expect(block.start > block.end).toBe(true)
  })

  it('rejects out-of-range priorities with the offending path', () => {
    let caught: unknown
    try {
      parseTasks([{ title: 'ok' }, { title: 'bad', priority: 6 }])
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(PlannerInputError)
    expect(caught instanceof PlannerInputError && caught.path).toBe('1.priority')
  })

  it('rejects unknown time zones', () => {
    expect(() => parsePreferences({ timeZone: 'Mars/Olympus' })).toThrow('timeZone: unknown time zone')
  })

  it('parses a day file with empty defaults', () => {
    expect(parseDayFile({ day: '2026-10-20' })).toEqual({ day: '2026-10-20', existing: [], tasks: [], habits: [] })
    expect(() => parseDayFile({ day: '20/10/2026' })).toThrow('day: day must be YYYY-MM-DD')
  })
})

describe('loadPlannerEnv', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadPlannerEnv({})).toEqual({
      preferences: {
        timeZone: 'UTC',
        dayStartHour: 6,
        dayEndHour: 22,
        minBlockMinutes: 15,
        preBufferMinutes: 5,
        postBufferMinutes: 10,
      },
      logLevel: 'info',
    })
  })

  it('coerces string variables and treats blanks as unset', () => {
    const config = loadPlannerEnv({
      PLANNER_TIME_ZONE: 'Europe/Berlin',
      PLANNER_DAY_START_HOUR: '7',
      PLANNER_DAY_END_HOUR: '',
      PLANNER_MIN_BLOCK_MINUTES: '20',
      PLANNER_LOG_LEVEL: 'warn',
    })
    expect(config.preferences).toMatchObject({ timeZone: 'Europe/Berlin', dayStartHour: 7, dayEndHour: 22, minBlockMinutes: 20 })
    expect(config.logLevel).toBe('warn')
  })

  it('rejects malformed values', () => {
    expect(() => loadPlannerEnv({ PLANNER_DAY_START_HOUR: 'seven' })).toThrow(PlannerInputError)
    expect(() => loadPlannerEnv({ PLANNER_LOG_LEVEL: 'loud' })).toThrow(PlannerInputError)
    expect(() => loadPlannerEnv({ PLANNER_DAY_START_HOUR: '23' })).toThrow('dayStartHour must be before dayEndHour')
  })
})

describe('toPlannerError', () => {
  it('wraps unknown failures', () => {
    const error = toPlannerError(new Error('boom'))
    expect(error.code).toBe('planner_error')
    expect(error.message).toBe('boom')
    expect(toPlannerError('nope').message).toBe('unexpected error')
  })
})
