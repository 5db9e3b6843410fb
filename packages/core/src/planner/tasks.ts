import { bufferBlock, taskBlock } from './blocks'
import { MIN_USABLE_MINUTES, UNUSABLE_SCORE, scoreBreakdown, slotScore } from './scoring'
import { addMinutes, minutesBetween, overlaps } from './time'
import type { FreeWindow, PlacementResult, PlannedBlock, PlanningContext, Task, UnscheduledItem } from './types'

export const MIN_TASK_EFFORT_MINUTES = 15

type Fragment = { start: Date; end: Date }

// priority desc, then deadline asc (tasks with one first), then effort desc
export function compareTasks(a: Task, b: Task): number {
  if (a.priority !== b.priority) return b.priority - a.priority
  if (a.deadline && b.deadline) {
    const diff = a.deadline.getTime() - b.deadline.getTime()
    if (diff !== 0) return diff
  } else if (a.deadline || b.deadline) {
    return a.deadline ? -1 : 1
  }
  return b.effortMinutes - a.effortMinutes
}

export function sortTasksForPlacement(tasks: ReadonlyArray<Task>): Task[] {
  return [...tasks].sort(compareTasks)
}

function pickFragment(pool: Fragment[], task: Task, context: PlanningContext): number {
  const scoring = { now: context.now, timeZone: context.preferences.timeZone }
  let bestIdx = -1
  let bestScore = UNUSABLE_SCORE
  pool.forEach((fragment, i) => {
    if (minutesBetween(fragment.start, fragment.end) < MIN_USABLE_MINUTES) return
    const score = slotScore(fragment, task, scoring)
    if (score > bestScore) {
      bestScore = score
      bestIdx = i
    }
  })
  return bestIdx
}

/**
 * Cuts [from, to) out of every fragment it touches. Pieces too short to ever be
 * picked are dropped; fragment order is kept.
 */
function reserve(pool: ReadonlyArray<Fragment>, from: Date, to: Date): Fragment[] {
  const next: Fragment[] = []
  for (const fragment of pool) {
    if (!overlaps(fragment.start, fragment.end, from, to)) {
      next.push(fragment)
      continue
    }
    if (minutesBetween(fragment.start, from) >= MIN_USABLE_MINUTES) next.push({ start: fragment.start, end: from })
    if (minutesBetween(to, fragment.end) >= MIN_USABLE_MINUTES) next.push({ start: to, end: fragment.end })
  }
  return next
}

/**
 * Greedy carving of tasks into free windows. Each chunk goes at the start of the
 * best-scoring fragment and is wrapped in a lead-in and a trailing buffer. There is
 * no backtracking: once a fragment is consumed it stays consumed.
 *
 * Work that finds no room is reported in `unscheduled`; nothing here throws.
 */
export function scheduleTasksIntoWindows(
  windows: ReadonlyArray<FreeWindow>,
  tasks: ReadonlyArray<Task>,
  context: PlanningContext,
): PlacementResult {
  const { preBufferMinutes, postBufferMinutes, timeZone } = context.preferences
  const blocks: PlannedBlock[] = []
  const unscheduled: UnscheduledItem[] = []
  if (tasks.length === 0) return { blocks, unscheduled }

  let pool: Fragment[] = windows.map((w) => ({ start: new Date(w.start), end: new Date(w.end) }))

  for (const task of sortTasksForPlacement(tasks)) {
    let need = Math.max(MIN_TASK_EFFORT_MINUTES, task.effortMinutes)
    let chunkNo = 0

    while (need > 0) {
      const bestIdx = pickFragment(pool, task, context)
      const chosen = pool[bestIdx]
      if (bestIdx < 0 || !chosen) break

      const chunk = Math.min(task.maxChunkMinutes, need, minutesBetween(chosen.start, chosen.end))
      if (chunk <= 0) break
      chunkNo += 1

      const start = chosen.start
      const end = addMinutes(start, chunk)
      const leadIn = addMinutes(start, -preBufferMinutes)
      const tail = addMinutes(end, postBufferMinutes)
      const score = scoreBreakdown(chosen, task, { now: context.now, timeZone })

      blocks.push(
        taskBlock(task.title, task.notes, start, end, [
          'placed_at_window_start',
          `priority_${task.priority}`,
          ...(task.deadline ? ['deadline_considered'] : []),
          `chunk_${chunkNo}`,
          `score_${score.total.toFixed(3)}`,
        ]),
        bufferBlock(leadIn, start, [`pre_task_buffer_${preBufferMinutes}m`]),
        bufferBlock(end, tail, [`post_task_buffer_${postBufferMinutes}m`]),
      )
      context.logger.debug(`placed ${chunk}m of "${task.title}" at ${start.toISOString()}`, { score: score.total })

      // Hold back room for a neighbour's buffers on both sides, in every fragment:
      // a trailing buffer can spill past a short busy block into the next window.
      pool = reserve(pool, addMinutes(leadIn, -postBufferMinutes), addMinutes(tail, preBufferMinutes))

      need -= chunk
      if (!task.splitOk) break
    }

    if (need > 0) {
      unscheduled.push({ kind: 'task', id: task.id, title: task.title, remainingMinutes: need })
      context.logger.debug(`"${task.title}" left with ${need}m unplaced`)
    }
  }

  return { blocks, unscheduled }
}
