/**
 * Pursuit Engine
 *
 * Smooth-pursuit activation: the respondent follows one moving target with
 * their eyes, and the gaze trace is scored against every target trace over a
 * rolling window. Scores mix temporal correlation with Gaussian proximity.
 *
 * Per sample:
 *   1. buffer gaze + target positions, prune to windowMs
 *   2. after 12 samples, score each option and the submit target
 *   3. count consecutive wins (stability) per option and for submit
 *   4. fire submit first, otherwise the option, outside their cooldowns
 */

import type { BlinkSample, GazeSample, Point } from '../../types/gaze'
import type { PursuitLayout } from '../../types/motion'
import {
  ActivationMode,
  type ActivationEngine,
  type ActivationHandler,
  type EngineConfig,
  type PursuitFeedback,
} from '../../types/engine'
import { positionAt } from '../core/motion'
import {
  RollingWindow,
  pearson,
  maxLaggedPearson,
  estimateMaxLagSamples,
  mappedProximity,
} from '../core/signal'
import { optionArea, SUBMIT_AREA } from '../layout/areas'
import { invariant } from '../utils/invariant'
import { logger } from '../../shared/utils/logger'
import { formatSeconds } from '../../shared/utils/time'
import { ENGINE_CONSTANTS, correlationWeight, submitThreshold } from './engine-config'

const log = logger.scoped('PursuitEngine')

export interface PursuitEngineOptions {
  layout: PursuitLayout
  config: EngineConfig
  onActivate: ActivationHandler
  /** Motion epoch in monotonic seconds; targets are at phase 0 here */
  startedAt?: number
}

export interface TargetPositions {
  targets: Record<string, Point>
  submit: Point
}

export class PursuitEngine implements ActivationEngine {
  readonly mode = ActivationMode.Pursuit

  private readonly labels: string[]
  private readonly window: RollingWindow
  private readonly startedAt: number

  private candidate: string | null = null
  private candidateCount = 0
  private submitCount = 0
  private toggleBlockedUntil = Number.NEGATIVE_INFINITY
  private submitBlockedUntil = Number.NEGATIVE_INFINITY

  private lastScores: Record<string, number> = {}
  private lastSubmitScore = 0

  constructor(private readonly options: PursuitEngineOptions) {
    const labels = options.layout.targets.map(target => target.label)
    invariant(labels.length > 0, 'Pursuit layout needs at least one target')
    invariant(new Set(labels).size === labels.length, `Duplicate pursuit labels: [${labels.join(', ')}]`)

    this.labels = [...new Set(labels)]
    this.window = new RollingWindow(options.config.windowMs, this.labels)
    this.startedAt = options.startedAt ?? 0
    this.resetScores()
  }

  private get config(): EngineConfig {
    return this.options.config
  }

  /**
   * Positions of every target at monotonic time `t`. Renderers call this with
   * the same clock so what is drawn is what is scored.
   */
  targetsAt(t: number): TargetPositions {
    const elapsed = t - this.startedAt
    const targets: Record<string, Point> = {}
    for (const target of this.options.layout.targets) {
      targets[target.label] = positionAt(target.motion, elapsed)
    }
    return { targets, submit: positionAt(this.options.layout.submit, elapsed) }
  }

  handleGaze(sample: GazeSample): void {
    const { targets, submit } = this.targetsAt(sample.t)
    const accepted = this.window.push({
      t: sample.t,
      gaze: { x: sample.x, y: sample.y },
      targets,
      submit,
    })
    if (!accepted) {
      log.debug(`Dropped out-of-order sample at ${formatSeconds(sample.t)}`)
      return
    }

    if (this.window.length < ENGINE_CONSTANTS.minDecisionSamples) return
    this.decide(sample.t)
  }

  /**
   * Tracking lost: stability evidence is void. The window is kept; a
   * resumed trace must rebuild its counters from scratch.
   */
  handleGazeLost(_atSec: number): void {
    this.candidate = null
    this.candidateCount = 0
    this.submitCount = 0
  }

  handleBlink(_sample: BlinkSample): void {
    // Blinks carry no pursuit evidence
  }

  private maxLagSamples(): number {
    return estimateMaxLagSamples(this.window.timestamps, this.config.maxLagMs)
  }

  private correlate(a: readonly number[], b: readonly number[], maxLag: number): number {
    return this.config.useLagCompensation ? maxLaggedPearson(a, b, maxLag) : pearson(a, b)
  }

  private mix(corr: number, proximity: number): number {
    return correlationWeight(this.config) * corr + this.config.proximityWeight * proximity
  }

  /**
   * Score of one option: mean of X and Y correlation, mixed with proximity.
   */
  optionScore(label: string, maxLag = this.maxLagSamples()): number {
    const gaze = this.window.gazeTrace()
    const target = this.window.targetTrace(label)
    if (!target) return 0

    const corr = 0.5 * (this.correlate(gaze.x, target.x, maxLag) + this.correlate(gaze.y, target.y, maxLag))
    const proximity = mappedProximity(gaze.x, gaze.y, target.x, target.y, this.config.proximitySigmaPx)
    return this.mix(corr, proximity)
  }

  /**
   * Submit score: X-axis correlation only, since the submit target moves
   * horizontally, plus the same proximity term.
   */
  submitScore(maxLag = this.maxLagSamples()): number {
    const gaze = this.window.gazeTrace()
    const submit = this.window.submitTrace()

    const corr = this.correlate(gaze.x, submit.x, maxLag)
    const proximity = mappedProximity(gaze.x, gaze.y, submit.x, submit.y, this.config.proximitySigmaPx)
    return this.mix(corr, proximity)
  }

  private decide(now: number): void {
    const maxLag = this.config.useLagCompensation ? this.maxLagSamples() : 0

    let bestLabel: string | null = null
    let bestScore = Number.NEGATIVE_INFINITY
    for (const label of this.labels) {
      const score = this.optionScore(label, maxLag)
      this.lastScores[label] = score
      if (score > bestScore) {
        bestScore = score
        bestLabel = label
      }
    }

    const optionCandidate = bestLabel !== null && bestScore >= this.config.corrThreshold ? bestLabel : null
    if (optionCandidate === null) {
      this.candidate = null
      this.candidateCount = 0
    } else if (optionCandidate === this.candidate) {
      this.candidateCount += 1
    } else {
      this.candidate = optionCandidate
      this.candidateCount = 1
    }

    const submitScore = this.submitScore(maxLag)
    this.lastSubmitScore = submitScore
    this.submitCount = submitScore >= submitThreshold(this.config) ? this.submitCount + 1 : 0

    // Submission wins the tick over selection
    if (now >= this.submitBlockedUntil && this.submitCount >= this.config.submitStableSamples) {
      this.resetCounters()
      log.debug(`submit at ${formatSeconds(now)} (score ${submitScore.toFixed(3)})`)
      if (this.options.onActivate(SUBMIT_AREA, now)) {
        this.submitBlockedUntil = now + this.config.submitCooldownMs / 1000
      }
      return
    }

    if (
      now >= this.toggleBlockedUntil &&
      this.candidate !== null &&
      this.candidateCount >= this.config.toggleStableSamples
    ) {
      const label = this.candidate
      this.resetCounters()
      log.debug(`option ${label} at ${formatSeconds(now)} (score ${bestScore.toFixed(3)})`)
      this.options.onActivate(optionArea(label), now)
      this.toggleBlockedUntil = now + this.config.toggleCooldownMs / 1000
    }
  }

  private resetCounters(): void {
    this.candidate = null
    this.candidateCount = 0
    this.submitCount = 0
  }

  private resetScores(): void {
    this.lastScores = Object.fromEntries(this.labels.map(label => [label, 0]))
    this.lastSubmitScore = 0
  }

  get bufferedSamples(): number {
    return this.window.length
  }

  getFeedback(): PursuitFeedback {
    return {
      mode: ActivationMode.Pursuit,
      scores: { ...this.lastScores },
      submitScore: this.lastSubmitScore,
      candidate: this.candidate,
      candidateCount: this.candidateCount,
      submitCount: this.submitCount,
    }
  }

  reset(): void {
    this.window.clear()
    this.resetCounters()
    this.resetScores()
    this.toggleBlockedUntil = Number.NEGATIVE_INFINITY
    this.submitBlockedUntil = Number.NEGATIVE_INFINITY
  }
}
