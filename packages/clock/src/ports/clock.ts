import type { Milliseconds, Seconds } from "./time"

/**
 * Clock is the only source of "now" for code that computes expirations.
 *
 * @remarks
 * Inject a FakeClock in tests to move time without timers.
 */
export interface Clock {
  /** Current time as a Date object. */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export function secondsToMs(seconds: Seconds): Milliseconds {
  return seconds * 1000
}

/** Whole seconds remaining until `deadlineMs`, rounded up. Never negative. */
export function remainingSeconds(clock: Clock, deadlineMs: Milliseconds): Seconds {
  return Math.max(0, Math.ceil((deadlineMs - clock.nowMs()) / 1000))
}
