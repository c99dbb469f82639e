/**
 * Schedule
 *
 * One scheduling run: Slicer → Window Resolver → Claim → Triage → Shuffle.
 * The run is a pure function of its input; all mutable state lives on a
 * board created here and dropped when the result is built. Caller records
 * are never modified.
 */

import type { LocalDateTime } from './time-date'
import { parseDateTime, compareDateTimes } from './time-date'
import type {
  ActivePeriod, Cadence, PriorityOrder, ScheduleResult,
  Slot, TaskId, TaskInput, TaskOutcome, TriageReport,
} from './types'
import { higherFirst } from './types'
import { ValidationError, InvariantViolationError } from './errors'
import { sliceSlots, assertSlotMinutes, assertCadence } from './slicer'
import { resolveWorkingPeriod } from './working-period'
import { claim } from './claim'
import { triage } from './triage'
import { shuffle } from './shuffle'
import { createBoard, heldSlots, type Board } from './internal/board'
import { createRandom, randomSeed, assertSeed } from './internal/random'

// ============================================================================
// Types
// ============================================================================

export type ScheduleInput<P = number> = {
  activePeriods: ActivePeriod[]
  tasks: TaskInput<P>[]
  /** "Now": no slot starts before this */
  horizonStart: LocalDateTime
  slotMinutes: number
  cadence?: Cadence
  /** Required unless every priority is a number; numbers default to higher-first */
  priorityOrder?: PriorityOrder<P>
  /** Fixed seed for a reproducible shuffle; drawn fresh when absent */
  seed?: number
}

// ============================================================================
// Validation
// ============================================================================

/** Parses a caller datetime and returns it in canonical `YYYY-MM-DDTHH:MM:SS` form. */
function normalizeDateTime(value: string, label: string): LocalDateTime {
  const parsed = parseDateTime(value)
  if (!parsed.ok) throw new ValidationError(`${label}: ${parsed.error.message}`)
  return parsed.value
}

function numericOrder(a: unknown, b: unknown): number {
  if (typeof a !== 'number' || typeof b !== 'number') {
    throw new ValidationError('A priority order is required for non-numeric priorities')
  }
  return higherFirst(a, b)
}

type ValidatedInput<P> = {
  activePeriods: ActivePeriod[]
  tasks: TaskInput<P>[]
  horizonStart: LocalDateTime
  priorityOrder: PriorityOrder<P>
}

/**
 * Checks the whole input before any work starts and returns copies whose
 * datetimes are all canonical, so later string comparisons are exact.
 */
function validateInput<P>(input: ScheduleInput<P>): ValidatedInput<P> {
  if (input.tasks.length === 0) {
    throw new ValidationError('At least one task is required')
  }
  assertSlotMinutes(input.slotMinutes)
  if (input.cadence) assertCadence(input.cadence)
  if (input.seed !== undefined) assertSeed(input.seed)
  const horizonStart = normalizeDateTime(input.horizonStart, 'horizonStart')

  const activePeriods = input.activePeriods.map((p, i) => ({
    start: normalizeDateTime(p.start, `activePeriods[${i}].start`),
    end: normalizeDateTime(p.end, `activePeriods[${i}].end`),
  }))

  const seen = new Set<TaskId>()
  const tasks: TaskInput<P>[] = []
  for (const task of input.tasks) {
    if (seen.has(task.id)) throw new ValidationError(`Duplicate task id '${task.id}'`)
    seen.add(task.id)

    if (!Number.isInteger(task.duration) || task.duration < 1) {
      throw new ValidationError(`Task '${task.id}' duration must be a positive whole number of slots, got ${task.duration}`)
    }
    const start = normalizeDateTime(task.start, `Task '${task.id}' start`)
    const due = normalizeDateTime(task.due, `Task '${task.id}' due`)
    if (compareDateTimes(due, start) < 0) {
      throw new ValidationError(`Task '${task.id}' is due (${due}) before it starts (${start})`)
    }
    if (!input.priorityOrder && (typeof task.priority !== 'number' || Number.isNaN(task.priority))) {
      throw new ValidationError(`Task '${task.id}' has a non-numeric priority and no priority order was given`)
    }
    tasks.push({ ...task, start, due })
  }

  return {
    activePeriods,
    tasks,
    horizonStart,
    priorityOrder: input.priorityOrder ?? numericOrder,
  }
}

function horizonEndOf<P>(tasks: TaskInput<P>[]): LocalDateTime {
  let end = tasks[0]?.due
  if (end === undefined) throw new ValidationError('At least one task is required')
  for (const task of tasks) {
    if (task.due > end) end = task.due
  }
  return end
}

// ============================================================================
// Result Assembly
// ============================================================================

export function buildOutcomes<P>(board: Board<P>): TaskOutcome[] {
  return [...board.tasks.values()].map(task => {
    if (task.status === 'unsatisfied') {
      throw new InvariantViolationError(`'${task.id}' finished the run still unsatisfied`)
    }
    return {
      id: task.id,
      status: task.status,
      duration: task.duration,
      claimed: task.claimed,
      shortfall: task.duration - task.claimed,
      slots: heldSlots(board, task.id),
      workingPeriod: [...task.workingPeriod],
    }
  })
}

export function buildSlots<P>(board: Board<P>, slots: Slot[]): Slot[] {
  return slots.map(slot => ({ ...slot, taskId: board.occupancy[slot.index] ?? null }))
}

// ============================================================================
// Schedule
// ============================================================================

export function schedule<P = number>(input: ScheduleInput<P>): ScheduleResult {
  const { activePeriods, tasks, horizonStart, priorityOrder } = validateInput(input)
  const { slotMinutes, cadence } = input

  const slots = sliceSlots({
    horizonStart,
    horizonEnd: horizonEndOf(tasks),
    activePeriods,
    slotMinutes,
    ...(cadence ? { cadence } : {}),
  })

  const board = createBoard(
    slots.length,
    tasks.map(task => ({
      id: task.id,
      duration: task.duration,
      priority: task.priority,
      workingPeriod: resolveWorkingPeriod(task, slots, horizonStart),
    })),
    priorityOrder
  )

  const short = claim(board)
  const report: TriageReport = triage(board, short)

  const seed = input.seed ?? randomSeed()
  shuffle(board, createRandom(seed))

  return {
    slots: buildSlots(board, slots),
    tasks: buildOutcomes(board),
    seed,
    triage: report,
  }
}

/** Ids of the tasks that ended the run short of their duration. */
export function unsatisfiedTasks(result: ScheduleResult): TaskId[] {
  return result.tasks.filter(t => t.status === 'unschedulable').map(t => t.id)
}
