/**
 * Public API Module
 *
 * Consumer-facing planner that binds a slot configuration to the scheduling
 * run and reports results through event handlers. The planner keeps only
 * configuration and handlers; every call recomputes from its own input.
 */

import type { LocalDateTime } from './time-date'
import type {
  ActivePeriod, Cadence, PriorityOrder, ScheduleResult, TaskId, TaskInput, TaskOutcome,
} from './types'
import { ValidationError } from './errors'
import { assertCadence, assertSlotMinutes } from './slicer'
import { schedule as runSchedule, unsatisfiedTasks } from './schedule'
import {
  shuffleMaximizing as runShuffleMaximizing,
  type ShuffleGoal, type ShuffleMaximizingOptions, type ShuffleMaximizingResult,
} from './strategy'

// ============================================================================
// Types
// ============================================================================

export type PlannerConfig<P = number> = {
  slotMinutes: number
  cadence?: Cadence
  priorityOrder?: PriorityOrder<P>
}

export type ScheduleRequest<P = number> = {
  activePeriods: ActivePeriod[]
  tasks: TaskInput<P>[]
  horizonStart: LocalDateTime
  seed?: number
}

export type PlannerEvents = {
  scheduled: ScheduleResult
  shortfall: TaskOutcome
}

export type PlannerEvent = keyof PlannerEvents

export type Planner<P = number> = {
  readonly config: Readonly<PlannerConfig<P>>
  schedule(request: ScheduleRequest<P>): ScheduleResult
  shuffleMaximizing(result: ScheduleResult, goal: ShuffleGoal, options: ShuffleMaximizingOptions): ShuffleMaximizingResult
  unsatisfiedTasks(result: ScheduleResult): TaskId[]
  on<K extends PlannerEvent>(event: K, handler: (payload: PlannerEvents[K]) => void): void
}

// ============================================================================
// Factory
// ============================================================================

export function createPlanner<P = number>(config: PlannerConfig<P>): Planner<P> {
  if (!config || typeof config !== 'object') {
    throw new ValidationError('Planner config is required')
  }
  assertSlotMinutes(config.slotMinutes)
  if (config.cadence) assertCadence(config.cadence)
  if (config.priorityOrder !== undefined && typeof config.priorityOrder !== 'function') {
    throw new ValidationError('priorityOrder must be a comparison function')
  }

  const frozenConfig: Readonly<PlannerConfig<P>> = Object.freeze({ ...config })

  // Event handlers
  const eventHandlers: { [K in PlannerEvent]: Array<(payload: PlannerEvents[K]) => void> } = {
    scheduled: [],
    shortfall: [],
  }

  function emit<K extends PlannerEvent>(event: K, payload: PlannerEvents[K]): boolean {
    let hadErrors = false
    for (const handler of eventHandlers[event]) {
      try { handler(payload) } catch (e) { hadErrors = true; console.error(`Event handler error on '${event}':`, e) }
    }
    return !hadErrors
  }

  function on<K extends PlannerEvent>(event: K, handler: (payload: PlannerEvents[K]) => void): void {
    if (!(event in eventHandlers)) throw new ValidationError(`Unknown event '${event}'`)
    eventHandlers[event].push(handler)
  }

  function schedule(request: ScheduleRequest<P>): ScheduleResult {
    const result = runSchedule<P>({
      ...request,
      slotMinutes: frozenConfig.slotMinutes,
      ...(frozenConfig.cadence ? { cadence: frozenConfig.cadence } : {}),
      ...(frozenConfig.priorityOrder ? { priorityOrder: frozenConfig.priorityOrder } : {}),
    })

    emit('scheduled', Object.freeze({ ...result }))
    for (const outcome of result.tasks) {
      if (outcome.status === 'unschedulable') emit('shortfall', Object.freeze({ ...outcome }))
    }
    return result
  }

  function shuffleMaximizing(
    result: ScheduleResult,
    goal: ShuffleGoal,
    options: ShuffleMaximizingOptions
  ): ShuffleMaximizingResult {
    return runShuffleMaximizing(result, goal, options)
  }

  return {
    config: frozenConfig,
    schedule,
    shuffleMaximizing,
    unsatisfiedTasks,
    on,
  }
}
