/**
 * Segment 05: Allocation Board Tests
 *
 * The per-run occupancy state every phase mutates, and the invariant checks
 * run at each phase boundary.
 */

import { describe, it, expect } from 'vitest'
import {
  assign, evict, swap, heldSlots, fits, priorityLevels, checkInvariants,
} from '../src/internal/board'
import { InvariantViolationError } from '../src/errors'
import { boardOf, layout, taskId } from './helpers/schedule-invariants'

const X = taskId('X')
const Y = taskId('Y')

function twoTaskBoard() {
  return boardOf(4, [
    { id: 'X', duration: 2, priority: 1, workingPeriod: [0, 1, 2] },
    { id: 'Y', duration: 1, priority: 2, workingPeriod: [2, 3] },
  ])
}

describe('Segment 05: Allocation Board', () => {
  describe('createBoard', () => {
    it('starts empty with every task unsatisfied', () => {
      const board = twoTaskBoard()
      expect(layout(board)).toEqual(['-', '-', '-', '-'])
      expect([...board.tasks.values()].map(t => [t.id, t.claimed, t.status, t.order])).toEqual([
        ['X', 0, 'unsatisfied', 0],
        ['Y', 0, 'unsatisfied', 1],
      ])
    })

    it('marks a task with an empty working period unschedulable', () => {
      const board = boardOf(2, [{ id: 'Z', duration: 3, priority: 0, workingPeriod: [] }])
      expect(board.tasks.get(taskId('Z'))?.status).toBe('unschedulable')
    })

    it('copies the working period it was given', () => {
      const period = [0, 1]
      const board = boardOf(2, [{ id: 'Z', duration: 1, priority: 0, workingPeriod: period }])
      period.push(5)
      expect(board.tasks.get(taskId('Z'))?.workingPeriod).toEqual([0, 1])
    })
  })

  describe('assign', () => {
    it('fills a slot and satisfies the task at its duration', () => {
      const board = twoTaskBoard()
      assign(board, 0, X)
      expect(board.tasks.get(X)?.status).toBe('unsatisfied')
      assign(board, 1, X)
      expect(board.tasks.get(X)?.claimed).toBe(2)
      expect(board.tasks.get(X)?.status).toBe('satisfied')
      expect(board.journal).toEqual([
        { kind: 'assign', slot: 0, taskId: 'X' },
        { kind: 'assign', slot: 1, taskId: 'X' },
      ])
    })

    it('refuses a slot that is already held', () => {
      const board = twoTaskBoard()
      assign(board, 2, X)
      expect(() => assign(board, 2, Y)).toThrow("Slot 2 is already held by 'X', cannot assign 'Y'")
    })

    it('refuses a slot outside the working period', () => {
      const board = twoTaskBoard()
      expect(() => assign(board, 3, X)).toThrow(InvariantViolationError)
    })

    it('refuses to exceed the duration', () => {
      const board = twoTaskBoard()
      assign(board, 2, Y)
      expect(() => assign(board, 3, Y)).toThrow("'Y' already holds its full duration of 1")
    })

    it('refuses a slot past the horizon', () => {
      const board = twoTaskBoard()
      expect(() => assign(board, 9, X)).toThrow('Slot 9 is outside the horizon')
    })
  })

  describe('evict', () => {
    it('frees the slot and returns the loser as unsatisfied', () => {
      const board = twoTaskBoard()
      assign(board, 2, Y)
      const loser = evict(board, 2)
      expect(loser.id).toBe('Y')
      expect(loser.claimed).toBe(0)
      expect(loser.status).toBe('unsatisfied')
      expect(layout(board)).toEqual(['-', '-', '-', '-'])
    })

    it('refuses an empty slot', () => {
      const board = twoTaskBoard()
      expect(() => evict(board, 1)).toThrow('Slot 1 has no occupant to evict')
    })
  })

  describe('swap and queries', () => {
    it('exchanges occupants without touching counts', () => {
      const board = twoTaskBoard()
      assign(board, 0, X)
      assign(board, 3, Y)
      swap(board, 0, 1)
      expect(layout(board)).toEqual(['-', 'X', '-', 'Y'])
      expect(heldSlots(board, X)).toEqual([1])
      expect(board.tasks.get(X)?.claimed).toBe(1)
    })

    it('lets an empty slot fit anywhere', () => {
      const board = twoTaskBoard()
      expect(fits(board, null, 3)).toBe(true)
      expect(fits(board, X, 3)).toBe(false)
      expect(fits(board, Y, 3)).toBe(true)
    })

    it('counts distinct priority levels', () => {
      const board = boardOf(1, [
        { id: 'a', duration: 1, priority: 2, workingPeriod: [0] },
        { id: 'b', duration: 1, priority: 2, workingPeriod: [0] },
        { id: 'c', duration: 1, priority: 5, workingPeriod: [0] },
        { id: 'd', duration: 1, priority: 1, workingPeriod: [0] },
      ])
      expect(priorityLevels(board)).toBe(3)
    })
  })

  describe('checkInvariants', () => {
    it('passes a consistent board', () => {
      const board = twoTaskBoard()
      assign(board, 0, X)
      assign(board, 2, Y)
      expect(() => checkInvariants(board, 'test')).not.toThrow()
    })

    it('catches a slot written behind the counts', () => {
      const board = twoTaskBoard()
      board.occupancy[0] = X
      expect(() => checkInvariants(board, 'test')).toThrow("[test] 'X' counts 0 claims but holds 1 slots")
    })

    it('catches a held slot outside the working period', () => {
      const board = twoTaskBoard()
      assign(board, 0, X)
      swap(board, 0, 3)
      expect(() => checkInvariants(board, 'shuffle')).toThrow("[shuffle] 'X' holds slot 3 outside its working period")
    })

    it('catches a status that disagrees with the count', () => {
      const board = twoTaskBoard()
      const y = board.tasks.get(Y)
      if (y) y.status = 'satisfied'
      expect(() => checkInvariants(board, 'test')).toThrow("[test] 'Y' is satisfied with 0/1 slots")
    })
  })
})
