/**
 * Segment 08: Shuffler Tests
 *
 * Legality-preserving swaps over a settled board.
 */

import { describe, it, expect } from 'vitest'
import { claim } from '../src/claim'
import { triage } from '../src/triage'
import { shuffle, swapCandidates } from '../src/shuffle'
import { assign, checkInvariants } from '../src/internal/board'
import { createRandom, type RandomSource } from '../src/internal/random'
import { boardOf, claimedCounts, layout, taskId, WORKED } from './helpers/schedule-invariants'

// ============================================================================
// Test Helpers
// ============================================================================

function settledWorkedBoard() {
  const board = boardOf(10, WORKED)
  triage(board, claim(board))
  return board
}

const alwaysFirst: RandomSource = { nextInt: min => min }
const alwaysLast: RandomSource = { nextInt: (_min, max) => max }

describe('Segment 08: Shuffler', () => {
  describe('swapCandidates', () => {
    it('includes the slot itself and every slot both occupants fit', () => {
      const board = settledWorkedBoard()
      expect(swapCandidates(board, 0)).toEqual([0, 1, 2, 3, 5, 8, 9])
      expect(swapCandidates(board, 4)).toEqual([4, 5])
      expect(swapCandidates(board, 6)).toEqual([6, 7, 8, 9])
    })

    it('only looks to the right', () => {
      const board = settledWorkedBoard()
      expect(swapCandidates(board, 9)).toEqual([9])
    })

    it('treats an empty slot as fitting anywhere', () => {
      const board = boardOf(3, [{ id: 'X', duration: 1, priority: 0, workingPeriod: [1, 2] }])
      assign(board, 1, taskId('X'))
      expect(swapCandidates(board, 0)).toEqual([0, 2])
      expect(swapCandidates(board, 1)).toEqual([1, 2])
    })
  })

  describe('shuffle', () => {
    it('leaves the board alone when the draw keeps every slot in place', () => {
      const board = settledWorkedBoard()
      const before = layout(board)
      shuffle(board, alwaysFirst)
      expect(layout(board)).toEqual(before)
    })

    it('swaps with the drawn candidate', () => {
      const board = boardOf(3, [
        { id: 'X', duration: 1, priority: 0, workingPeriod: [0, 1, 2] },
        { id: 'Y', duration: 1, priority: 0, workingPeriod: [0, 1, 2] },
      ])
      assign(board, 0, taskId('X'))
      assign(board, 1, taskId('Y'))

      shuffle(board, alwaysLast)
      expect(layout(board)).toEqual(['-', 'X', 'Y'])
      expect(board.journal.slice(2)).toEqual([
        { kind: 'swap', left: 0, right: 2 },
        { kind: 'swap', left: 1, right: 2 },
      ])
    })

    it('draws nothing when a slot has no partner', () => {
      const board = boardOf(1, [{ id: 'X', duration: 1, priority: 0, workingPeriod: [0] }])
      assign(board, 0, taskId('X'))
      const refuse: RandomSource = {
        nextInt: () => { throw new Error('unexpected draw') },
      }
      expect(() => shuffle(board, refuse)).not.toThrow()
    })

    it('keeps counts and working periods intact', () => {
      for (let seed = 0; seed < 20; seed++) {
        const board = settledWorkedBoard()
        const counts = claimedCounts(board)
        shuffle(board, createRandom(seed))
        expect(claimedCounts(board)).toEqual(counts)
        expect(() => checkInvariants(board, 'test')).not.toThrow()
        expect(board.occupancy[4] === 'B' || board.occupancy[5] === 'B').toBe(true)
      }
    })

    it('repeats itself for the same seed', () => {
      const first = settledWorkedBoard()
      const second = settledWorkedBoard()
      shuffle(first, createRandom(42))
      shuffle(second, createRandom(42))
      expect(layout(first)).toEqual(layout(second))
    })
  })

  describe('createRandom', () => {
    it('stays within the requested bounds', () => {
      const random = createRandom(7)
      for (let i = 0; i < 200; i++) {
        const n = random.nextInt(2, 5)
        expect(n).toBeGreaterThanOrEqual(2)
        expect(n).toBeLessThanOrEqual(5)
      }
    })

    it('rejects a seed that is not a safe integer', () => {
      expect(() => createRandom(1.5)).toThrow('Seed must be a safe integer, got 1.5')
    })
  })
})
