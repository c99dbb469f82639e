/**
 * Triage Engine
 *
 * Settles contention left after claiming. Each pass walks the tasks still
 * short, least favored first, and lets each one take slots in its working
 * period that are empty or held by a strictly less favored task. Passes
 * repeat until one captures nothing.
 *
 * Every capture raises the sum of occupant ranks over all slots, so there
 * are at most slots × (levels + 1) productive passes. Going past that bound
 * means the engine is broken.
 */

import type { TaskId, TriageReport } from './types'
import { InvariantViolationError } from './errors'
import {
  assign, evict, getTask, priorityLevels, checkInvariants,
  type Board, type TaskState,
} from './internal/board'

export function maxTriagePasses<P>(board: Board<P>): number {
  return board.occupancy.length * (priorityLevels(board) + 1) + 1
}

/** Least favored first; ties keep input order. */
function turnOrder<P>(board: Board<P>, tasks: TaskState<P>[]): TaskState<P>[] {
  return [...tasks].sort((a, b) => board.priorityOrder(a.priority, b.priority) || a.order - b.order)
}

/** Scans the task's working period once. Returns the number of slots captured. */
function takeTurn<P>(board: Board<P>, task: TaskState<P>, pending: Set<TaskId>): number {
  let captured = 0
  for (const slot of task.workingPeriod) {
    if (task.claimed >= task.duration) break
    const occupant = board.occupancy[slot]
    if (occupant === task.id) continue

    if (occupant === null || occupant === undefined) {
      assign(board, slot, task.id)
      captured++
      continue
    }

    const holder = getTask(board, occupant)
    if (board.priorityOrder(task.priority, holder.priority) <= 0) continue

    // One slot changes hands; the loser waits for a later pass
    evict(board, slot)
    assign(board, slot, task.id)
    pending.add(holder.id)
    captured++
  }
  return captured
}

/**
 * Runs triage to a fixpoint over the given short tasks. Any task still short
 * afterwards is marked unschedulable and keeps what it holds.
 */
export function triage<P>(board: Board<P>, unsatisfied: Iterable<TaskId>): TriageReport {
  const pending = new Set<TaskId>()
  for (const id of unsatisfied) {
    const task = getTask(board, id)
    if (task.claimed < task.duration) pending.add(id)
  }

  const limit = maxTriagePasses(board)
  let passes = 0
  let captures = 0

  while (pending.size > 0) {
    if (passes >= limit) {
      throw new InvariantViolationError(`Triage did not settle within ${limit} passes`)
    }
    passes++

    let capturedThisPass = 0
    const turn = turnOrder(board, [...pending].map(id => getTask(board, id)))
    for (const task of turn) {
      capturedThisPass += takeTurn(board, task, pending)
      if (task.claimed >= task.duration) pending.delete(task.id)
    }

    captures += capturedThisPass
    if (capturedThisPass === 0) break
  }

  for (const id of pending) {
    const task = getTask(board, id)
    if (task.claimed < task.duration) task.status = 'unschedulable'
  }

  checkInvariants(board, 'triage')
  return { passes, captures }
}
