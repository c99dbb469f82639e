/**
 * Shared Types
 *
 * Re-exports branded time types and defines the domain types every
 * allocation phase works with.
 */

import type { LocalDateTime } from './time-date'

export type { LocalDate, LocalTime, LocalDateTime } from './time-date'

// ============================================================================
// Branded ID Types
// ============================================================================

declare const __taskId: unique symbol

export type TaskId = string & { readonly [__taskId]: true }

// ============================================================================
// Priority
// ============================================================================

/**
 * Orders two priorities by scheduling precedence.
 * Positive when `a` is more favored than `b`, negative when less, zero when tied.
 */
export type PriorityOrder<P> = (a: P, b: P) => number

/** Numerically higher priorities are favored. Equal infinities tie. */
export const higherFirst: PriorityOrder<number> = (a, b) => (a > b ? 1 : a < b ? -1 : 0)

/** Numerically lower priorities are favored (1 beats 2). */
export const lowerFirst: PriorityOrder<number> = (a, b) => (a < b ? 1 : a > b ? -1 : 0)

// ============================================================================
// Inputs
// ============================================================================

export type ActivePeriod = {
  start: LocalDateTime
  end: LocalDateTime
}

export type TaskInput<P = number> = {
  id: TaskId
  /** Required slot units, integer ≥ 1 */
  duration: number
  start: LocalDateTime
  due: LocalDateTime
  priority: P
}

/** Work/break rhythm laid inside every active period */
export type Cadence = {
  /** Work slots between long breaks */
  breakInterval: number
  shortBreakMinutes: number
  longBreakMinutes: number
}

// ============================================================================
// Outputs
// ============================================================================

export type Slot = {
  index: number
  start: LocalDateTime
  end: LocalDateTime
  taskId: TaskId | null
}

export type TaskStatus = 'unsatisfied' | 'satisfied' | 'unschedulable'

export type TaskOutcome = {
  id: TaskId
  status: Exclude<TaskStatus, 'unsatisfied'>
  duration: number
  claimed: number
  shortfall: number
  /** Slot indices held, ascending */
  slots: number[]
  workingPeriod: number[]
}

export type TriageReport = {
  passes: number
  captures: number
}

export type ScheduleResult = {
  slots: Slot[]
  tasks: TaskOutcome[]
  seed: number
  triage: TriageReport
}
