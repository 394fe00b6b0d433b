/**
 * Engine configuration - defaults and normalization
 */

import type { EngineConfig } from '../../types/engine'
import { QuestionKind } from '../../types/question'
import { logger } from '../../shared/utils/logger'

// =============================================================================
// FIXED TIMING (not user-tunable)
// =============================================================================
export const ENGINE_CONSTANTS = {
  /** Minimum buffered samples before the pursuit engine decides anything */
  minDecisionSamples: 12,
  /** Submission must beat the option threshold by this margin */
  submitThresholdMargin: 0.06,
  /** Dwell progress stays at 0 for this long after entering an area */
  dwellGraceMs: 700,
} as const

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  windowMs: 1250,
  corrThreshold: 0.73,
  toggleStableSamples: 18,
  submitStableSamples: 30,
  useLagCompensation: true,
  maxLagMs: 180,
  optionFrequencyHz: 0.25,
  submitFrequencyHz: 0.28,
  proximitySigmaPx: 220,
  proximityWeight: 0.15,
  toggleCooldownMs: 1300,
  submitCooldownMs: 1400,
  allowEmptySubmit: false,
  dwellThresholdMs: 1500,
  blinkThresholdMs: 500,
}

/**
 * Question-kind defaults, layered between DEFAULT_ENGINE_CONFIG and user
 * overrides. Likert submits on a shorter run.
 */
export const KIND_DEFAULTS: Record<QuestionKind, Partial<EngineConfig>> = {
  [QuestionKind.YesNo]: {},
  [QuestionKind.MultipleChoice]: {},
  [QuestionKind.Likert]: { submitStableSamples: 20 },
}

type NumericKey = {
  [K in keyof EngineConfig]: EngineConfig[K] extends number ? K : never
}[keyof EngineConfig]

interface NumericRule {
  min: number
  max?: number
  integer?: boolean
}

const NUMERIC_RULES: Record<NumericKey, NumericRule> = {
  windowMs: { min: 1, integer: true },
  corrThreshold: { min: -1, max: 1 },
  toggleStableSamples: { min: 1, integer: true },
  submitStableSamples: { min: 1, integer: true },
  maxLagMs: { min: 0, integer: true },
  optionFrequencyHz: { min: 0 },
  submitFrequencyHz: { min: 0 },
  proximitySigmaPx: { min: 1 },
  proximityWeight: { min: 0, max: 1 },
  toggleCooldownMs: { min: 0, integer: true },
  submitCooldownMs: { min: 0, integer: true },
  dwellThresholdMs: { min: 0, integer: true },
  blinkThresholdMs: { min: 0, integer: true },
}

const NUMERIC_KEYS = Object.keys(NUMERIC_RULES) as NumericKey[]

function normalizeNumber(key: NumericKey, value: unknown): number {
  const rule = NUMERIC_RULES[key]
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    if (value !== undefined) {
      logger.warn(`[EngineConfig] ${key}=${String(value)} is not a finite number, using ${DEFAULT_ENGINE_CONFIG[key]}`)
    }
    return DEFAULT_ENGINE_CONFIG[key]
  }

  let next = rule.integer ? Math.trunc(value) : value
  if (next < rule.min) next = rule.min
  if (rule.max !== undefined && next > rule.max) next = rule.max
  if (next !== value) {
    logger.warn(`[EngineConfig] ${key}=${value} adjusted to ${next}`)
  }
  return next
}

/**
 * Merge overrides onto the defaults. Never throws: bad values fall back or
 * get clamped, and each adjustment is logged.
 */
export function normalizeEngineConfig(overrides?: Partial<EngineConfig>): EngineConfig {
  const normalized: EngineConfig = { ...DEFAULT_ENGINE_CONFIG }

  for (const key of NUMERIC_KEYS) {
    normalized[key] = normalizeNumber(key, overrides?.[key])
  }

  const useLag = overrides?.useLagCompensation
  normalized.useLagCompensation = typeof useLag === 'boolean' ? useLag : DEFAULT_ENGINE_CONFIG.useLagCompensation
  const allowEmpty = overrides?.allowEmptySubmit
  normalized.allowEmptySubmit = typeof allowEmpty === 'boolean' ? allowEmpty : DEFAULT_ENGINE_CONFIG.allowEmptySubmit

  if (normalized.dwellThresholdMs < ENGINE_CONSTANTS.dwellGraceMs) {
    logger.warn(
      `[EngineConfig] dwellThresholdMs=${normalized.dwellThresholdMs} is shorter than the ${ENGINE_CONSTANTS.dwellGraceMs}ms grace period; activations will show no progress`
    )
  }

  return normalized
}

/** Option activation threshold plus the submit margin. */
export const submitThreshold = (config: Pick<EngineConfig, 'corrThreshold'>) =>
  config.corrThreshold + ENGINE_CONSTANTS.submitThresholdMargin

export const correlationWeight = (config: Pick<EngineConfig, 'proximityWeight'>) =>
  1 - config.proximityWeight
