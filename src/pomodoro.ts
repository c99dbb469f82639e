/**
 * Pomodoro Cadence
 *
 * The work/break state machine used to lay slots out with breaks between them.
 * A day starts in `longBreak`; the first tick begins a run of work slots that
 * counts down to the next long break.
 */

import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type Pomodoro =
  | { kind: 'work'; remaining: number }
  | { kind: 'break'; remaining: number }
  | { kind: 'longBreak' }

export const LONG_BREAK: Pomodoro = { kind: 'longBreak' }

export function work(remaining: number): Pomodoro {
  return { kind: 'work', remaining }
}

export function shortBreak(remaining: number): Pomodoro {
  return { kind: 'break', remaining }
}

function assertInterval(breakInterval: number): void {
  if (!Number.isInteger(breakInterval) || breakInterval < 1) {
    throw new ValidationError(`Break interval must be a positive integer, got ${breakInterval}`)
  }
}

// ============================================================================
// Transitions
// ============================================================================

export function tick(state: Pomodoro, breakInterval: number): Pomodoro {
  assertInterval(breakInterval)
  switch (state.kind) {
    case 'work':
      return state.remaining === 0 ? LONG_BREAK : shortBreak(state.remaining - 1)
    case 'break':
      return work(state.remaining)
    case 'longBreak':
      return work(breakInterval - 1)
  }
}

/** Inverse of `tick` for every state reachable with the same interval. */
export function untick(state: Pomodoro, breakInterval: number): Pomodoro {
  assertInterval(breakInterval)
  switch (state.kind) {
    case 'longBreak':
      return work(0)
    case 'break':
      return work(state.remaining + 1)
    case 'work':
      return state.remaining >= breakInterval - 1 ? LONG_BREAK : shortBreak(state.remaining)
  }
}
