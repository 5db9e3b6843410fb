import {
  analyzeSchedule,
  analyzeStress,
  optimizeWorkLifeBalance,
  provideInsights,
  recommendHabits,
  suggestGoals,
  type InsightEvent,
} from '../domain/insights'

const at = (hhmm: string) => new Date(`2026-10-20T${hhmm}:00.000Z`)
const ev = (title: string, from: string, to: string, category?: string): InsightEvent => ({
  title,
  start: at(from),
  end: at(to),
  category,
})

const day = [ev('Team Meeting', '09:00', '10:00'), ev('Deep work', '10:30', '12:00'), ev('1:1 meeting', '14:00', '14:30')]

describe('insights', () => {
  test('analyzeSchedule totals the day and counts meetings', () => {
    const analysis = analyzeSchedule(day)
    expect(analysis).toEqual({
      blocks: 3,
      totalMinutes: 180,
      firstStart: '09:00',
      lastEnd: '14:30',
      meetings: 2,
      text: 'Blocks: 3  |  Total: 3h0m  |  Window: 09:00–14:30  |  Meetings: 2',
    })
  })

  test('analyzeSchedule handles an empty day', () => {
    expect(analyzeSchedule([]).text).toBe('Blocks: 0  |  Total: 0h0m  |  Window: --–--  |  Meetings: 0')
  })

  test('analyzeSchedule reads wall-clock times in the given zone', () => {
    const analysis = analyzeSchedule(day, 'Europe/Berlin')
    expect([analysis.firstStart, analysis.lastEnd]).toEqual(['11:00', '16:30'])
  })

  test('provideInsights counts deep work and buffer time', () => {
    const insights = provideInsights([
      ev('🔵 Essay', '06:00', '07:00', 'task'),
      ev('Buffer', '05:55', '06:00', 'buffer'),
      ev('Buffer', '07:00', '07:10', 'buffer'),
      ev('🟢 Walk', '07:10', '07:30', 'habit'),
    ])
    expect(insights.deepWorkBlocks).toBe(1)
    expect(insights.bufferMinutes).toBe(15)
    expect(insights.longestBlockMinutes).toBe(60)
    expect(insights.text.split('\n')[0]).toBe('Deep-work blocks: 1')
  })

  test('analyzeStress weighs load against recovery gaps', () => {
    const stress = analyzeStress([...day].reverse())
    expect([stress.load, stress.recovery, stress.risk]).toEqual([30, 50, 5])
    expect(stress.text.split('\n').slice(0, 3)).toEqual(['Load: 30/100', 'Recovery: 50/100', 'Stress risk: 5/100'])
  })

  test('optimizeWorkLifeBalance splits focus and recovery minutes', () => {
    const report = optimizeWorkLifeBalance([
      ev('Deep work', '08:00', '10:00'),
      ev('Walk', '10:00', '10:30'),
      ev('Buffer', '10:30', '10:40'),
    ])
    expect(report).toMatchObject({ score: 64, focusMinutes: 120, recoveryMinutes: 40 })
  })

  test('suggestion lists are fixed', () => {
    expect(suggestGoals()).toHaveLength(3)
    expect(recommendHabits()[0]).toBe('⚑ Walk 20m after lunch')
  })
})
