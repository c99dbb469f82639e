/**
 * Window Resolver
 *
 * Maps each task's [start, due] range onto the slot sequence. A slot belongs
 * to a task's working period when it lies entirely inside
 * [max(horizonStart, task.start), task.due].
 */

import type { LocalDateTime } from './time-date'
import { maxDateTime } from './time-date'
import type { Slot, TaskInput } from './types'
import { ValidationError } from './errors'

export function resolveWorkingPeriod<P>(
  task: TaskInput<P>,
  slots: Slot[],
  horizonStart: LocalDateTime
): number[] {
  const from = maxDateTime(horizonStart, task.start)
  const period: number[] = []
  for (const slot of slots) {
    if (slot.start >= from && slot.end <= task.due) period.push(slot.index)
  }
  return period
}

/**
 * Slots needed to finish the remaining effort, rounded up to whole slots.
 * Work already logged beyond the estimate counts as done.
 */
export function slotsRequired(estimatedMinutes: number, workedMinutes: number, slotMinutes: number): number {
  if (!Number.isFinite(estimatedMinutes) || estimatedMinutes < 0) {
    throw new ValidationError(`Estimated minutes must be non-negative, got ${estimatedMinutes}`)
  }
  if (!Number.isFinite(workedMinutes) || workedMinutes < 0) {
    throw new ValidationError(`Worked minutes must be non-negative, got ${workedMinutes}`)
  }
  if (!Number.isFinite(slotMinutes) || slotMinutes <= 0) {
    throw new ValidationError(`Slot length must be positive, got ${slotMinutes}`)
  }
  const remaining = estimatedMinutes - workedMinutes
  if (remaining <= 0) return 0
  return Math.ceil(remaining / slotMinutes)
}
