import type { BlockCategory, PlannedBlock } from './types'

export const BLOCK_COLORS: Record<BlockCategory, string> = {
  task: '#2f6feb',
  habit: '#22c55e',
  buffer: '#9aa3ab',
}

export const TASK_MARKER = '🔵'
export const HABIT_MARKER = '🟢'
export const BUFFER_TITLE = 'Buffer'

export function taskBlock(title: string, description: string | undefined, start: Date, end: Date, rationale: string[]): PlannedBlock {
  return {
    title: `${TASK_MARKER} ${title}`,
    description: description ?? title,
    start,
    end,
    color: BLOCK_COLORS.task,
    category: 'task',
    rationale,
  }
}

export function bufferBlock(start: Date, end: Date, rationale: string[]): PlannedBlock {
  return { title: BUFFER_TITLE, description: BUFFER_TITLE, start, end, color: BLOCK_COLORS.buffer, category: 'buffer', rationale }
}

export function habitBlock(title: string, start: Date, end: Date, rationale: string[]): PlannedBlock {
  return {
    title: `${HABIT_MARKER} ${title}`,
    description: title,
    start,
    end,
    color: BLOCK_COLORS.habit,
    category: 'habit',
    rationale,
  }
}
