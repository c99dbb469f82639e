/**
 * Segment 11: Public API Tests
 *
 * The planner facade: configuration, delegation and event handlers.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createPlanner, type ScheduleRequest } from '../src/public-api'
import { ValidationError } from '../src/errors'
import { lowerFirst, type ScheduleResult, type TaskId, type TaskOutcome } from '../src/types'
import type { LocalDateTime } from '../src/time-date'

function at(h: number): LocalDateTime {
  return `2025-01-15T${String(h).padStart(2, '0')}:00:00` as LocalDateTime
}

function request(): ScheduleRequest {
  return {
    activePeriods: [{ start: at(9), end: at(19) }],
    horizonStart: at(8),
    seed: 4,
    tasks: [
      { id: 'A' as TaskId, duration: 7, start: at(9), due: at(19), priority: 2 },
      { id: 'B' as TaskId, duration: 1, start: at(13), due: at(15), priority: 3 },
      { id: 'C' as TaskId, duration: 3, start: at(14), due: at(19), priority: 1 },
    ],
  }
}

describe('Segment 11: Public API', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  describe('createPlanner', () => {
    it('keeps a frozen copy of its configuration', () => {
      const config = { slotMinutes: 60 }
      const planner = createPlanner(config)
      config.slotMinutes = 15
      expect(planner.config.slotMinutes).toBe(60)
      expect(Object.isFrozen(planner.config)).toBe(true)
    })

    it('rejects a bad slot length', () => {
      expect(() => createPlanner({ slotMinutes: 2.5 }))
        .toThrow('Slot length must be a positive whole number of minutes, got 2.5')
    })

    it('rejects a bad cadence', () => {
      expect(() => createPlanner({
        slotMinutes: 25,
        cadence: { breakInterval: 0, shortBreakMinutes: 5, longBreakMinutes: 15 },
      })).toThrow(ValidationError)
    })
  })

  describe('schedule', () => {
    it('runs with the configured slot length', () => {
      const planner = createPlanner({ slotMinutes: 60 })
      const result = planner.schedule(request())
      expect(result.slots).toHaveLength(10)
      expect(planner.unsatisfiedTasks(result)).toEqual(['C'])
    })

    it('uses the configured priority order', () => {
      const planner = createPlanner({ slotMinutes: 60, priorityOrder: lowerFirst })
      const result = planner.schedule(request())
      expect(result.tasks.find(t => t.id === 'C')?.status).toBe('satisfied')
    })

    it('keeps no state between calls', () => {
      const planner = createPlanner({ slotMinutes: 60 })
      const first = planner.schedule(request())
      const second = planner.schedule(request())
      expect(second).toEqual(first)
    })

    it('delegates strategic shuffling', () => {
      const planner = createPlanner({ slotMinutes: 60 })
      const result = planner.schedule(request())
      const best = planner.shuffleMaximizing(result, () => 0, { attempts: 3, seed: 1 })
      expect(best.result).toBe(result)
      expect(best.attempts).toBe(3)
    })
  })

  describe('events', () => {
    it('emits the result and one shortfall per short task', () => {
      const planner = createPlanner({ slotMinutes: 60 })
      const scheduled: ScheduleResult[] = []
      const shortfalls: TaskOutcome[] = []
      planner.on('scheduled', r => scheduled.push(r))
      planner.on('shortfall', t => shortfalls.push(t))

      const result = planner.schedule(request())
      expect(scheduled).toHaveLength(1)
      expect(scheduled[0]?.slots).toEqual(result.slots)
      expect(shortfalls.map(t => [t.id, t.shortfall])).toEqual([['C', 1]])
    })

    it('hands handlers a frozen payload', () => {
      const planner = createPlanner({ slotMinutes: 60 })
      let frozen = false
      planner.on('scheduled', r => { frozen = Object.isFrozen(r) })
      planner.schedule(request())
      expect(frozen).toBe(true)
    })

    it('reports a throwing handler and keeps going', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {})
      const planner = createPlanner({ slotMinutes: 60 })
      const failure = new Error('handler failed')
      const seen: string[] = []
      planner.on('shortfall', () => { throw failure })
      planner.on('shortfall', t => seen.push(t.id))

      expect(() => planner.schedule(request())).not.toThrow()
      expect(seen).toEqual(['C'])
      expect(spy).toHaveBeenCalledWith("Event handler error on 'shortfall':", failure)
    })

    it('rejects an unknown event', () => {
      const planner = createPlanner({ slotMinutes: 60 })
      // @ts-expect-error unknown event name
      expect(() => planner.on('finished', () => {})).toThrow("Unknown event 'finished'")
    })
  })
})
