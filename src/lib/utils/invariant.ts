/**
 * Invariant - fail-fast assertions for construction-time misuse.
 *
 * In development a violation throws. In production it is logged and the
 * caller carries on with its own fallback; an engine tick must never throw.
 *
 * Example:
 *   invariant(labels.length > 0, 'Pursuit layout needs at least one target')
 */

import { logger } from '../../shared/utils/logger'

const isDev = () => process.env.NODE_ENV === 'development'

/**
 * Returns whether the condition held, so production callers can branch on it.
 */
export function invariant(condition: unknown, message: string): boolean {
  if (condition) return true

  const error = new Error(`Invariant violation: ${message}`)
  if (isDev()) {
    throw error
  }
  logger.error(error)
  return false
}

/**
 * Assert we never reach this code path. Used for exhaustive switches over
 * closed unions.
 */
export function invariantUnreachable(value: never, message?: string): never {
  throw new Error(message ?? `Unreachable code reached with value: ${JSON.stringify(value)}`)
}
