import path from 'path'
import { parseArgs, runCli } from '../index'

const fixture = (name: string) => path.join(__dirname, '..', '..', 'fixtures', name)
const env = { PLANNER_TIME_ZONE: 'UTC', PLANNER_LOG_LEVEL: 'silent' }

function capture() {
  const out: string[] = []
  const err: string[] = []
  return { out, err, io: { stdout: (line: string) => out.push(line), stderr: (line: string) => err.push(line) } }
}

describe('parseArgs', () => {
  it('reads the file and options in any order', () => {
    expect(parseArgs(['--json', 'day.json', '--day', '2026-10-20'])).toEqual({
      file: 'day.json',
      day: '2026-10-20',
      now: undefined,
      json: true,
    })
  })

  it('rejects missing values and unknown flags', () => {
    expect(() => parseArgs(['day.json', '--now'])).toThrow('--now needs a value')
    expect(() => parseArgs(['day.json', '--verbose'])).toThrow('unknown option --verbose')
    expect(() => parseArgs([])).toThrow(/^usage: plan-day/)
  })
})

describe('plan-day', () => {
  it('prints the plan in time order followed by the summary', () => {
    const { out, err, io } = capture()
    const code = runCli([fixture('sample-day.json'), '--now', '2026-10-20T05:00:00Z'], env, io)
    expect(code).toBe(0)
    expect(err).toEqual([])
    expect(out).toEqual([
      '05:55–06:00  Buffer',
      '06:00–07:00  🔵 Write report',
      '07:00–07:10  Buffer',
      '09:30–09:45  🟢 Stretch',
      'Planned 60 task min and 1 habit block(s) for 2026-10-20.',
    ])
  })

  it('plans another day when --day is given', () => {
    const { out, io } = capture()
    runCli([fixture('sample-day.json'), '--now', '2026-10-20T05:00:00Z', '--day', '2026-10-21'], env, io)
    expect(out).toEqual([
      '05:55–06:00  Buffer',
      '06:00–07:00  🔵 Write report',
      '07:00–07:10  Buffer',
      '07:10–07:25  🟢 Stretch',
      'Planned 60 task min and 1 habit block(s) for 2026-10-21.',
    ])
  })

  it('emits JSON with --json', () => {
    const { out, io } = capture()
    runCli([fixture('sample-day.json'), '--now', '2026-10-20T05:00:00Z', '--json'], env, io)
    expect(out).toHaveLength(1)
    const parsed = JSON.parse(out[0])
    expect(parsed.day).toBe('2026-10-20')
    expect(parsed.blocks).toHaveLength(4)
    expect(parsed.blocks[0]).toMatchObject({
      title: '🔵 Write report',
      description: 'numbers from Q3',
      start: '2026-10-20T06:00:00.000Z',
      category: 'task',
    })
    expect(parsed.unscheduled).toEqual([])
  })

  it('fails with exit code 1 on invalid input', () => {
    const { out, err, io } = capture()
    expect(runCli([fixture('invalid-day.json')], env, io)).toBe(1)
    expect(out).toEqual([])
    expect(err).toEqual(['plan-day: tasks.0.priority: Number must be less than or equal to 5'])
  })

  it('fails when the file cannot be read', () => {
    const { err, io } = capture()
    expect(runCli([fixture('missing.json')], env, io)).toBe(1)
    expect(err[0]).toMatch(/^plan-day: cannot read .*missing\.json/)
  })

  it('fails on a bad --now value', () => {
    const { err, io } = capture()
    expect(runCli([fixture('sample-day.json'), '--now', 'soon'], env, io)).toBe(1)
    expect(err).toEqual(['plan-day: --now is not a valid timestamp: soon'])
  })
})
