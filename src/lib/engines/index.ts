/**
 * Engine factory - one engine per question, picked by activation mode
 */

import { ActivationMode, type ActivationEngine, type ActivationHandler, type EngineConfig, type HitTest } from '../../types/engine'
import type { PursuitLayout } from '../../types/motion'
import { invariantUnreachable } from '../utils/invariant'
import { PursuitEngine } from './pursuit-engine'
import { DwellEngine } from './dwell-engine'
import { BlinkEngine } from './blink-engine'

export interface EngineSetup {
  mode: ActivationMode
  config: EngineConfig
  onActivate: ActivationHandler
  /** Required by dwell and blink */
  hitTest?: HitTest
  /** Required by pursuit */
  layout?: PursuitLayout
  startedAt?: number
}

const NOTHING_HIT: HitTest = () => null

export function createActivationEngine(setup: EngineSetup): ActivationEngine {
  const { mode, config, onActivate } = setup
  switch (mode) {
    case ActivationMode.Pursuit:
      if (!setup.layout) {
        throw new Error('Pursuit mode needs a layout of moving targets')
      }
      return new PursuitEngine({ layout: setup.layout, config, onActivate, startedAt: setup.startedAt })
    case ActivationMode.Dwell:
      return new DwellEngine({ config, onActivate, hitTest: setup.hitTest ?? NOTHING_HIT })
    case ActivationMode.Blink:
      return new BlinkEngine({ config, onActivate, hitTest: setup.hitTest ?? NOTHING_HIT })
    default:
      return invariantUnreachable(mode, `Unknown activation mode: ${String(mode)}`)
  }
}

export { PursuitEngine, type PursuitEngineOptions, type TargetPositions } from './pursuit-engine'
export { DwellEngine, type DwellEngineOptions } from './dwell-engine'
export { BlinkEngine, type BlinkEngineOptions } from './blink-engine'
export {
  DEFAULT_ENGINE_CONFIG,
  ENGINE_CONSTANTS,
  KIND_DEFAULTS,
  normalizeEngineConfig,
  submitThreshold,
  correlationWeight,
} from './engine-config'
