/**
 * Slicer
 *
 * Builds the ordered slot sequence for a scheduling horizon. Slots are laid
 * out from the start of each active period, back to back or on a Pomodoro
 * cadence, and only those that fit inside both the period and the horizon
 * are kept.
 */

import type { LocalDate, LocalTime, LocalDateTime } from './time-date'
import { addDays, addMinutes, compareDates, compareDateTimes, makeDateTime } from './time-date'
import type { ActivePeriod, Cadence, Slot } from './types'
import { LONG_BREAK, tick, type Pomodoro } from './pomodoro'
import { EmptyHorizonError, InvalidRangeError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type SliceOptions = {
  horizonStart: LocalDateTime
  horizonEnd: LocalDateTime
  activePeriods: ActivePeriod[]
  slotMinutes: number
  cadence?: Cadence
}

type Span = { start: LocalDateTime; end: LocalDateTime }

// ============================================================================
// Validation
// ============================================================================

export function assertSlotMinutes(slotMinutes: number): void {
  if (!Number.isInteger(slotMinutes) || slotMinutes < 1) {
    throw new ValidationError(`Slot length must be a positive whole number of minutes, got ${slotMinutes}`)
  }
}

export function assertCadence(cadence: Cadence): void {
  if (!Number.isInteger(cadence.breakInterval) || cadence.breakInterval < 1) {
    throw new ValidationError(`Cadence break interval must be a positive integer, got ${cadence.breakInterval}`)
  }
  for (const [label, minutes] of [
    ['short break', cadence.shortBreakMinutes],
    ['long break', cadence.longBreakMinutes],
  ] as const) {
    if (!Number.isInteger(minutes) || minutes < 0) {
      throw new ValidationError(`Cadence ${label} must be a non-negative whole number of minutes, got ${minutes}`)
    }
  }
}

/**
 * Returns the periods sorted by start. Throws when a period ends before it
 * starts or when two periods overlap.
 */
export function normalizeActivePeriods(periods: ActivePeriod[]): ActivePeriod[] {
  for (const p of periods) {
    if (compareDateTimes(p.end, p.start) < 0) {
      throw new InvalidRangeError(`Active period ends before it starts: ${p.start} – ${p.end}`)
    }
  }

  const sorted = [...periods].sort((a, b) => compareDateTimes(a.start, b.start))
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1]
    const curr = sorted[i]
    if (prev && curr && compareDateTimes(curr.start, prev.end) < 0) {
      throw new InvalidRangeError(`Active periods overlap: ${prev.start} – ${prev.end} and ${curr.start} – ${curr.end}`)
    }
  }
  return sorted
}

// ============================================================================
// Layout
// ============================================================================

/** Lays slots over one period. A slot that would run past the period end is dropped. */
export function layoutSlots(period: ActivePeriod, slotMinutes: number, cadence?: Cadence): Span[] {
  assertSlotMinutes(slotMinutes)
  if (!cadence) {
    const spans: Span[] = []
    let cursor = period.start
    for (;;) {
      const end = addMinutes(cursor, slotMinutes)
      if (end > period.end) break
      spans.push({ start: cursor, end })
      cursor = end
    }
    return spans
  }

  assertCadence(cadence)
  const spans: Span[] = []
  let cursor = period.start
  let state: Pomodoro = LONG_BREAK
  for (;;) {
    state = tick(state, cadence.breakInterval)
    if (state.kind === 'work') {
      const end = addMinutes(cursor, slotMinutes)
      if (end > period.end) break
      spans.push({ start: cursor, end })
      cursor = end
    } else {
      const rest = state.kind === 'break' ? cadence.shortBreakMinutes : cadence.longBreakMinutes
      cursor = addMinutes(cursor, rest)
      if (cursor >= period.end) break
    }
  }
  return spans
}

/** One active period per calendar day from `from` to `to` inclusive. */
export function dailyActivePeriods(
  from: LocalDate,
  to: LocalDate,
  dayStart: LocalTime,
  dayEnd: LocalTime
): ActivePeriod[] {
  if (dayEnd < dayStart) {
    throw new InvalidRangeError(`Daily window ends before it starts: ${dayStart} – ${dayEnd}`)
  }
  const periods: ActivePeriod[] = []
  for (let d = from; compareDates(d, to) <= 0; d = addDays(d, 1)) {
    periods.push({ start: makeDateTime(d, dayStart), end: makeDateTime(d, dayEnd) })
  }
  return periods
}

// ============================================================================
// Slicing
// ============================================================================

export function sliceSlots(options: SliceOptions): Slot[] {
  const { horizonStart, horizonEnd, slotMinutes, cadence } = options
  assertSlotMinutes(slotMinutes)
  if (cadence) assertCadence(cadence)
  const periods = normalizeActivePeriods(options.activePeriods)

  const slots: Slot[] = []
  for (const period of periods) {
    if (period.end <= horizonStart || period.start >= horizonEnd) continue
    for (const span of layoutSlots(period, slotMinutes, cadence)) {
      if (span.start < horizonStart || span.end > horizonEnd) continue
      slots.push({ index: slots.length, start: span.start, end: span.end, taskId: null })
    }
  }

  if (slots.length === 0) {
    throw new EmptyHorizonError(`No slots fit between ${horizonStart} and ${horizonEnd}`)
  }
  return slots
}
