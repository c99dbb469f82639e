/**
 * Allocation Board
 *
 * Mutable state of one scheduling run: slot occupancy and per-task claim
 * counts. Every phase changes occupancy through `assign`, `evict` and
 * `swap` so the counts and the journal stay in step with the slots.
 * A board never outlives the run that created it.
 */

import type { PriorityOrder, TaskId, TaskStatus } from '../types'
import { InvariantViolationError } from '../errors'

// ============================================================================
// Types
// ============================================================================

export type TaskState<P> = {
  id: TaskId
  duration: number
  priority: P
  /** Slot indices, ascending */
  workingPeriod: number[]
  window: Set<number>
  claimed: number
  status: TaskStatus
  /** Position in the caller's task list; the tie-break everywhere */
  order: number
}

export type BoardChange =
  | { kind: 'assign'; slot: number; taskId: TaskId }
  | { kind: 'evict'; slot: number; taskId: TaskId }
  | { kind: 'swap'; left: number; right: number }

export type Board<P> = {
  occupancy: Array<TaskId | null>
  /** Insertion order is input order */
  tasks: Map<TaskId, TaskState<P>>
  priorityOrder: PriorityOrder<P>
  journal: BoardChange[]
}

export type BoardTask<P> = {
  id: TaskId
  duration: number
  priority: P
  workingPeriod: number[]
}

// ============================================================================
// Construction
// ============================================================================

export function createBoard<P>(
  slotCount: number,
  tasks: BoardTask<P>[],
  priorityOrder: PriorityOrder<P>
): Board<P> {
  const states = new Map<TaskId, TaskState<P>>()
  tasks.forEach((t, order) => {
    states.set(t.id, {
      id: t.id,
      duration: t.duration,
      priority: t.priority,
      workingPeriod: [...t.workingPeriod],
      window: new Set(t.workingPeriod),
      claimed: 0,
      status: t.workingPeriod.length === 0 ? 'unschedulable' : 'unsatisfied',
      order,
    })
  })
  return {
    occupancy: new Array<TaskId | null>(slotCount).fill(null),
    tasks: states,
    priorityOrder,
    journal: [],
  }
}

export function getTask<P>(board: Board<P>, id: TaskId): TaskState<P> {
  const task = board.tasks.get(id)
  if (!task) throw new InvariantViolationError(`Slot held by unknown task '${id}'`)
  return task
}

// ============================================================================
// Mutation
// ============================================================================

export function assign<P>(board: Board<P>, slot: number, id: TaskId): void {
  const occupant = board.occupancy[slot]
  if (occupant === undefined) throw new InvariantViolationError(`Slot ${slot} is outside the horizon`)
  if (occupant !== null) {
    throw new InvariantViolationError(`Slot ${slot} is already held by '${occupant}', cannot assign '${id}'`)
  }
  const task = getTask(board, id)
  if (!task.window.has(slot)) {
    throw new InvariantViolationError(`Slot ${slot} is outside the working period of '${id}'`)
  }
  if (task.claimed >= task.duration) {
    throw new InvariantViolationError(`'${id}' already holds its full duration of ${task.duration}`)
  }
  board.occupancy[slot] = id
  task.claimed++
  if (task.claimed === task.duration) task.status = 'satisfied'
  board.journal.push({ kind: 'assign', slot, taskId: id })
}

/** Frees a held slot and returns the task that lost it. */
export function evict<P>(board: Board<P>, slot: number): TaskState<P> {
  const occupant = board.occupancy[slot]
  if (occupant === undefined || occupant === null) {
    throw new InvariantViolationError(`Slot ${slot} has no occupant to evict`)
  }
  const task = getTask(board, occupant)
  board.occupancy[slot] = null
  task.claimed--
  task.status = 'unsatisfied'
  board.journal.push({ kind: 'evict', slot, taskId: occupant })
  return task
}

export function swap<P>(board: Board<P>, left: number, right: number): void {
  const a = board.occupancy[left]
  const b = board.occupancy[right]
  if (a === undefined || b === undefined) {
    throw new InvariantViolationError(`Cannot swap slots ${left} and ${right}: outside the horizon`)
  }
  board.occupancy[left] = b
  board.occupancy[right] = a
  board.journal.push({ kind: 'swap', left, right })
}

// ============================================================================
// Queries
// ============================================================================

export function heldSlots<P>(board: Board<P>, id: TaskId): number[] {
  const held: number[] = []
  board.occupancy.forEach((occupant, index) => {
    if (occupant === id) held.push(index)
  })
  return held
}

/** Whether `occupant` may sit at `slot`. An empty slot fits anywhere. */
export function fits<P>(board: Board<P>, occupant: TaskId | null, slot: number): boolean {
  if (occupant === null) return true
  return getTask(board, occupant).window.has(slot)
}

/** Number of distinct priority levels under the board's order. */
export function priorityLevels<P>(board: Board<P>): number {
  const sorted = [...board.tasks.values()]
    .map(t => t.priority)
    .sort(board.priorityOrder)
  let levels = sorted.length > 0 ? 1 : 0
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1]
    const curr = sorted[i]
    if (prev !== undefined && curr !== undefined && board.priorityOrder(prev, curr) !== 0) levels++
  }
  return levels
}

// ============================================================================
// Invariants
// ============================================================================

/**
 * Throws InvariantViolationError unless occupancy and per-task counts agree,
 * every held slot is inside its holder's working period, and each status
 * matches its count.
 */
export function checkInvariants<P>(board: Board<P>, phase: string): void {
  const counts = new Map<TaskId, number>()
  board.occupancy.forEach((occupant, slot) => {
    if (occupant === null) return
    const task = board.tasks.get(occupant)
    if (!task) throw new InvariantViolationError(`[${phase}] slot ${slot} held by unknown task '${occupant}'`)
    if (!task.window.has(slot)) {
      throw new InvariantViolationError(`[${phase}] '${occupant}' holds slot ${slot} outside its working period`)
    }
    counts.set(occupant, (counts.get(occupant) ?? 0) + 1)
  })

  for (const task of board.tasks.values()) {
    const held = counts.get(task.id) ?? 0
    if (held !== task.claimed) {
      throw new InvariantViolationError(`[${phase}] '${task.id}' counts ${task.claimed} claims but holds ${held} slots`)
    }
    if (task.claimed > task.duration) {
      throw new InvariantViolationError(`[${phase}] '${task.id}' holds ${task.claimed} slots for a duration of ${task.duration}`)
    }
    if ((task.status === 'satisfied') !== (task.claimed === task.duration)) {
      throw new InvariantViolationError(`[${phase}] '${task.id}' is ${task.status} with ${task.claimed}/${task.duration} slots`)
    }
  }
}
