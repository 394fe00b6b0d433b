import { performance } from 'node:perf_hooks'

/**
 * Source of monotonic time in seconds. Wall-clock time is never used for
 * dwell timers or cooldowns.
 */
export interface Clock {
  now(): number
}

export const monotonicClock: Clock = {
  now: () => performance.now() / 1000,
}

/**
 * Clock driven by hand. Used by tests and by replaying recorded sessions.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) { }

  now(): number {
    return this.current
  }

  set(seconds: number): void {
    this.current = seconds
  }

  advance(seconds: number): number {
    this.current += seconds
    return this.current
  }
}

/**
 * Format a duration in seconds as s.mmm for log lines.
 */
export const formatSeconds = (seconds: number): string => {
  if (!Number.isFinite(seconds)) return '-'
  return `${seconds.toFixed(3)}s`
}
