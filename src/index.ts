/**
 * slotplanner
 *
 * Public API exports
 */

// Error system (base class, codes and subclasses)
export {
  SlotplannerError, SlotplannerErrorCode,
  ValidationError, ParseError, InvalidRangeError, EmptyHorizonError,
  InvariantViolationError,
} from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date (branded types + utilities)
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime,
  dateOf, timeOf,
  addDays, daysBetween, addMinutes, minutesBetween,
  compareDates, compareDateTimes,
} from './time-date'

// Domain types
export type {
  TaskId, PriorityOrder, ActivePeriod, TaskInput, Cadence,
  Slot, TaskStatus, TaskOutcome, TriageReport, ScheduleResult,
} from './types'
export { higherFirst, lowerFirst } from './types'

// Pomodoro cadence
export type { Pomodoro } from './pomodoro'
export { tick, untick, work, shortBreak, LONG_BREAK } from './pomodoro'

// Slicer & window resolver
export type { SliceOptions } from './slicer'
export { sliceSlots, layoutSlots, dailyActivePeriods, normalizeActivePeriods } from './slicer'
export { resolveWorkingPeriod, slotsRequired } from './working-period'

// Scheduling run
export type { ScheduleInput } from './schedule'
export { schedule, unsatisfiedTasks } from './schedule'

// Strategic shuffling
export type { ShuffleGoal, ShuffleMaximizingOptions, ShuffleMaximizingResult } from './strategy'
export { shuffleMaximizing } from './strategy'

// High-level API (planner object with events)
export type {
  Planner, PlannerConfig, ScheduleRequest, PlannerEvents, PlannerEvent,
} from './public-api'
export { createPlanner } from './public-api'
