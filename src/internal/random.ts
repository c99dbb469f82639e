/**
 * Seeded Random Source
 *
 * Thin wrapper over pure-rand so every random draw in a run comes from one
 * explicit, reproducible generator.
 */

import { randomInt } from 'node:crypto'
import { xoroshiro128plus, unsafeUniformIntDistribution } from 'pure-rand'
import { ValidationError } from '../errors'

export type RandomSource = {
  /** Uniform integer in [min, max], both inclusive */
  nextInt(min: number, max: number): number
}

export function assertSeed(seed: number): void {
  if (!Number.isSafeInteger(seed)) {
    throw new ValidationError(`Seed must be a safe integer, got ${seed}`)
  }
}

export function createRandom(seed: number): RandomSource {
  assertSeed(seed)
  const rng = xoroshiro128plus(seed)
  return {
    nextInt(min: number, max: number): number {
      return unsafeUniformIntDistribution(min, max, rng)
    },
  }
}

/** Fresh seed for callers that do not need reproducible runs. */
export function randomSeed(): number {
  return randomInt(0, 0x7fffffff)
}
