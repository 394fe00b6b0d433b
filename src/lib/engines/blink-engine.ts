/**
 * Blink Engine
 *
 * Edge-triggered: a blink held for blinkThresholdMs activates whatever area
 * was under gaze, once per blink. Gaze is not reported while the eyes are
 * closed, so the last known gaze point is used.
 */

import type { BlinkSample, GazeSample, Point } from '../../types/gaze'
import {
  ActivationMode,
  type ActivationEngine,
  type ActivationHandler,
  type BlinkFeedback,
  type EngineConfig,
  type HitTest,
} from '../../types/engine'
import { areaKey, isInactiveArea } from '../layout/areas'
import { logger } from '../../shared/utils/logger'

const log = logger.scoped('BlinkEngine')

export interface BlinkEngineOptions {
  config: EngineConfig
  hitTest: HitTest
  onActivate: ActivationHandler
}

export class BlinkEngine implements ActivationEngine {
  readonly mode = ActivationMode.Blink

  private isBlinking = false
  private onsetAt = 0
  private fired = false
  private lastGaze: Point | null = null

  constructor(private readonly options: BlinkEngineOptions) { }

  handleGaze(sample: GazeSample): void {
    this.lastGaze = { x: sample.x, y: sample.y }
  }

  handleGazeLost(_atSec: number): void {
    this.lastGaze = null
  }

  handleBlink(sample: BlinkSample): void {
    if (sample.blinking && !this.isBlinking) {
      this.isBlinking = true
      this.onsetAt = sample.t
      this.fired = false
      return
    }

    if (sample.blinking && this.isBlinking) {
      const heldMs = (sample.t - this.onsetAt) * 1000
      if (heldMs >= this.options.config.blinkThresholdMs && !this.fired) {
        this.activateUnderGaze(sample.t)
        this.fired = true
      }
      return
    }

    if (!sample.blinking && this.isBlinking) {
      this.isBlinking = false
      this.fired = false
    }
  }

  private activateUnderGaze(atSec: number): void {
    if (!this.lastGaze) return
    const area = this.options.hitTest(this.lastGaze.x, this.lastGaze.y)
    if (isInactiveArea(area)) return

    log.debug(`activate ${areaKey(area)}`)
    this.options.onActivate(area, atSec)
  }

  getFeedback(): BlinkFeedback {
    return { mode: ActivationMode.Blink, isBlinking: this.isBlinking, fired: this.fired }
  }

  reset(): void {
    this.isBlinking = false
    this.fired = false
    this.onsetAt = 0
    this.lastGaze = null
  }
}
