/**
 * Dwell Engine
 *
 * Activates an area after gaze rests inside it for dwellThresholdMs. Progress
 * is held at 0 for a grace period so glances do not start a visible fill.
 * Staying on the same area repeats the activation every threshold.
 */

import type { BlinkSample, GazeSample } from '../../types/gaze'
import {
  ActivationMode,
  type ActivationEngine,
  type ActivationHandler,
  type AreaId,
  type DwellFeedback,
  type EngineConfig,
  type HitTest,
} from '../../types/engine'
import { clamp01 } from '../core/math'
import { areasEqual, areaKey, isInactiveArea } from '../layout/areas'
import { logger } from '../../shared/utils/logger'
import { ENGINE_CONSTANTS } from './engine-config'

const log = logger.scoped('DwellEngine')

export interface DwellEngineOptions {
  config: EngineConfig
  hitTest: HitTest
  onActivate: ActivationHandler
}

export class DwellEngine implements ActivationEngine {
  readonly mode = ActivationMode.Dwell

  private area: AreaId | null = null
  private startedAt = 0
  private progress = 0

  constructor(private readonly options: DwellEngineOptions) { }

  handleGaze(sample: GazeSample): void {
    const area = this.options.hitTest(sample.x, sample.y)

    if (isInactiveArea(area)) {
      this.clear()
      return
    }

    if (!areasEqual(this.area, area)) {
      this.area = area
      this.startedAt = sample.t
      this.progress = 0
      return
    }

    const { dwellThresholdMs } = this.options.config
    const graceMs = ENGINE_CONSTANTS.dwellGraceMs
    const elapsedMs = (sample.t - this.startedAt) * 1000

    if (elapsedMs < graceMs) {
      this.progress = 0
      return
    }

    const effectiveMs = Math.max(1, dwellThresholdMs - graceMs)
    this.progress = clamp01((elapsedMs - graceMs) / effectiveMs)

    if (elapsedMs >= dwellThresholdMs) {
      log.debug(`activate ${areaKey(area)} after ${Math.round(elapsedMs)}ms`)
      this.options.onActivate(area, sample.t)
      this.startedAt = sample.t
      this.progress = 0
    }
  }

  handleGazeLost(_atSec: number): void {
    this.clear()
  }

  handleBlink(_sample: BlinkSample): void {
    // Dwell ignores blinks
  }

  private clear(): void {
    this.area = null
    this.progress = 0
  }

  getFeedback(): DwellFeedback {
    return { mode: ActivationMode.Dwell, area: this.area, progress: this.progress }
  }

  reset(): void {
    this.clear()
    this.startedAt = 0
  }
}
