/**
 * Shuffler
 *
 * Randomizes which slots each task holds without changing how many it holds.
 * Walking left to right, slot i trades places with a uniformly chosen slot
 * j ≥ i (possibly itself) for which both occupants stay inside their working
 * periods after the exchange.
 */

import { checkInvariants, fits, swap, type Board } from './internal/board'
import type { RandomSource } from './internal/random'

/** Slots that slot `i` may legally trade with, `i` included. */
export function swapCandidates<P>(board: Board<P>, i: number): number[] {
  const left = board.occupancy[i] ?? null
  const candidates = [i]
  for (let j = i + 1; j < board.occupancy.length; j++) {
    const right = board.occupancy[j] ?? null
    if (fits(board, left, j) && fits(board, right, i)) candidates.push(j)
  }
  return candidates
}

export function shuffle<P>(board: Board<P>, random: RandomSource): void {
  for (let i = 0; i < board.occupancy.length; i++) {
    const candidates = swapCandidates(board, i)
    if (candidates.length < 2) continue
    const j = candidates[random.nextInt(0, candidates.length - 1)] ?? i
    if (j !== i) swap(board, i, j)
  }
  checkInvariants(board, 'shuffle')
}
