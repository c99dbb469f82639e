/**
 * Strategic Shuffling
 *
 * Shuffles a finished schedule repeatedly and keeps the layout that scores
 * best under a caller-supplied goal. Counts and working periods are never
 * touched; only which slots each task holds changes.
 */

import type { ScheduleResult, TaskId, TaskOutcome } from './types'
import { ValidationError } from './errors'
import { shuffle } from './shuffle'
import { assign, createBoard, type Board } from './internal/board'
import { createRandom, randomSeed, assertSeed } from './internal/random'
import { buildOutcomes, buildSlots } from './schedule'

export type ShuffleGoal = (result: ScheduleResult) => number

export type ShuffleMaximizingOptions = {
  attempts: number
  seed?: number
}

export type ShuffleMaximizingResult = {
  /** `result.seed` still names the scheduling run the layout was shuffled from */
  result: ScheduleResult
  score: number
  attempts: number
  /** Seed of the shuffles tried here */
  seed: number
}

function boardFromResult(result: ScheduleResult): Board<null> {
  const board = createBoard<null>(
    result.slots.length,
    result.tasks.map(t => ({ id: t.id, duration: t.duration, priority: null, workingPeriod: t.workingPeriod })),
    () => 0
  )
  for (const slot of result.slots) {
    if (slot.taskId !== null) assign(board, slot.index, slot.taskId)
  }
  // Shortfalls were settled by triage; carry them over unchanged
  const outcomes = new Map<TaskId, TaskOutcome>(result.tasks.map((t): [TaskId, TaskOutcome] => [t.id, t]))
  for (const task of board.tasks.values()) {
    const outcome = outcomes.get(task.id)
    if (outcome) task.status = outcome.status
  }
  return board
}

function scoreOf(goal: ShuffleGoal, result: ScheduleResult): number {
  const score = goal(result)
  if (!Number.isFinite(score)) {
    throw new ValidationError(`Goal must return a finite score, got ${score}`)
  }
  return score
}

export function shuffleMaximizing(
  result: ScheduleResult,
  goal: ShuffleGoal,
  options: ShuffleMaximizingOptions
): ShuffleMaximizingResult {
  if (!Number.isInteger(options.attempts) || options.attempts < 0) {
    throw new ValidationError(`Attempts must be a non-negative integer, got ${options.attempts}`)
  }
  if (options.seed !== undefined) assertSeed(options.seed)

  const seed = options.seed ?? randomSeed()
  const random = createRandom(seed)

  let best = result
  let bestScore = scoreOf(goal, result)
  for (let attempt = 0; attempt < options.attempts; attempt++) {
    const board = boardFromResult(best)
    shuffle(board, random)
    const candidate: ScheduleResult = {
      slots: buildSlots(board, best.slots),
      tasks: buildOutcomes(board),
      seed: best.seed,
      triage: best.triage,
    }
    const score = scoreOf(goal, candidate)
    if (score > bestScore) {
      best = candidate
      bestScore = score
    }
  }

  return { result: best, score: bestScore, attempts: options.attempts, seed }
}
