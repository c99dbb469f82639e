/**
 * Claim Engine
 *
 * First, contention-free pass. Tasks with the fewest slots in their working
 * period pick first; each takes free slots from the start of its period until
 * it has its duration or runs out. A claim never displaces another task.
 */

import type { TaskId } from './types'
import { assign, checkInvariants, type Board, type TaskState } from './internal/board'

/** Claim order: shortest working period first, then input order. */
export function claimOrder<P>(board: Board<P>): TaskState<P>[] {
  return [...board.tasks.values()]
    .filter(t => t.workingPeriod.length > 0)
    .sort((a, b) => a.workingPeriod.length - b.workingPeriod.length || a.order - b.order)
}

/** Runs the claim pass and returns the tasks left short, in claim order. */
export function claim<P>(board: Board<P>): TaskId[] {
  const order = claimOrder(board)

  for (const task of order) {
    for (const slot of task.workingPeriod) {
      if (task.claimed >= task.duration) break
      if (board.occupancy[slot] === null) assign(board, slot, task.id)
    }
  }

  checkInvariants(board, 'claim')
  return order.filter(t => t.status === 'unsatisfied').map(t => t.id)
}
