/**
 * Question Session
 *
 * Runtime for one question: owns the engine picked by the activation mode,
 * the selection policy, and the feedback store. Tracker frames go in;
 * question events come out through `onEvent`. Drop the session with the
 * question; nothing carries over.
 */

import type { Point, Size, TrackerFrame } from '../../types/gaze'
import type { PursuitLayout } from '../../types/motion'
import {
  ActivationMode,
  EngineEventType,
  type ActivationEngine,
  type AreaId,
  type EngineConfig,
  type EngineEvent,
  type HitTest,
} from '../../types/engine'
import type { QuestionDefinition, QuestionResult } from '../../types/question'
import {
  createActivationEngine,
  normalizeEngineConfig,
  KIND_DEFAULTS,
  PursuitEngine,
  type TargetPositions,
} from '../../lib/engines'
import { buildPursuitLayout, resolveLabels } from '../../lib/core/motion'
import { mapGazeToWidget, isFinitePoint } from '../../lib/core/coordinates/gaze-mapping'
import { SelectionPolicy } from '../../lib/policy/selection-policy'
import {
  createActivationFeedbackStore,
  type ActivationFeedbackStoreApi,
} from '../../stores/activation-feedback-store'
import { monotonicClock, formatSeconds, type Clock } from '../../shared/utils/time'
import { logger } from '../../shared/utils/logger'

const log = logger.scoped('QuestionSession')

export interface QuestionSessionOptions {
  question: QuestionDefinition
  /** Widget size in pixels */
  widget: Size
  /** Screen size when gaze arrives in screen pixels; omit for widget-local gaze */
  screen?: Size
  config?: Partial<EngineConfig>
  /** Area lookup for dwell and blink questions */
  hitTest?: HitTest
  /** Replaces the preset pursuit layout */
  layout?: PursuitLayout
  clock?: Clock
  onEvent?: (event: EngineEvent) => void
}

export class QuestionSession {
  readonly question: QuestionDefinition
  readonly labels: string[]
  readonly config: EngineConfig
  readonly feedback: ActivationFeedbackStoreApi

  private engine: ActivationEngine | null
  private readonly policy: SelectionPolicy
  private readonly clock: Clock
  private readonly startedAt: number
  private submittedAt: number | null = null

  constructor(private readonly options: QuestionSessionOptions) {
    const { question } = options
    this.question = question
    this.clock = options.clock ?? monotonicClock
    this.startedAt = this.clock.now()
    this.labels = resolveLabels(question.kind, question.labels)
    this.config = normalizeEngineConfig({ ...KIND_DEFAULTS[question.kind], ...options.config })

    this.policy = new SelectionPolicy({
      kind: question.kind,
      labels: this.labels,
      allowEmptySubmit: this.config.allowEmptySubmit,
    })
    this.feedback = createActivationFeedbackStore(question.mode)

    if (question.mode !== ActivationMode.Pursuit && !options.hitTest) {
      log.warn(`${question.mode} question "${question.text}" has no hit test; nothing can be activated`)
    }

    this.engine = createActivationEngine({
      mode: question.mode,
      config: this.config,
      onActivate: this.handleActivation,
      hitTest: options.hitTest,
      layout: question.mode === ActivationMode.Pursuit ? this.pursuitLayout() : undefined,
      startedAt: this.startedAt,
    })

    log.debug(`started ${question.kind}/${question.mode} "${question.text}"`)
  }

  private pursuitLayout(): PursuitLayout {
    if (this.options.layout) return this.options.layout
    return buildPursuitLayout(this.question.kind, this.labels, this.options.widget, {
      optionFrequencyHz: this.config.optionFrequencyHz,
      submitFrequencyHz: this.config.submitFrequencyHz,
    })
  }

  get isActive(): boolean {
    return this.engine !== null && this.submittedAt === null
  }

  /**
   * One tracker frame. Blink state goes first so a blink that starts on this
   * frame is known before gaze handling. A missing gaze during a blink is a
   * blink gap, not lost tracking.
   */
  handleFrame(frame: TrackerFrame): void {
    const t = this.clock.now()
    this.handleBlink(frame.blinking, t)
    if (frame.gaze) {
      this.handleGaze(frame.gaze, t)
    } else if (!frame.blinking) {
      this.handleGazeLost(t)
    }
  }

  handleGaze(point: Point | null, t = this.clock.now()): void {
    const engine = this.engine
    if (!engine || !this.isActive) return

    const mapped = this.mapGaze(point)
    if (!mapped) {
      this.handleGazeLost(t)
      return
    }

    engine.handleGaze({ t, x: mapped.x, y: mapped.y })
    this.publish(engine, true)
  }

  handleGazeLost(t = this.clock.now()): void {
    const engine = this.engine
    if (!engine || !this.isActive) return

    engine.handleGazeLost(t)
    this.publish(engine, false)
  }

  handleBlink(blinking: boolean, t = this.clock.now()): void {
    const engine = this.engine
    if (!engine || !this.isActive) return

    engine.handleBlink({ t, blinking })
    this.publish(engine, this.feedback.getState().tracking)
  }

  private mapGaze(point: Point | null): Point | null {
    if (this.options.screen) {
      return mapGazeToWidget(point, this.options.screen, this.options.widget)
    }
    return isFinitePoint(point) ? { x: point.x, y: point.y } : null
  }

  private publish(engine: ActivationEngine, tracking: boolean): void {
    const state = this.feedback.getState()
    state.applyFeedback(engine.getFeedback())
    if (state.tracking !== tracking) state.setTracking(tracking)
  }

  private handleActivation = (area: AreaId, atSec: number): boolean => {
    const event = this.policy.apply(area, atSec)
    if (!event) return false

    if (event.type === EngineEventType.Submit) {
      this.submittedAt = atSec
      log.info(`"${this.question.text}" answered after ${formatSeconds(atSec - this.startedAt)}`)
    }

    const state = this.feedback.getState()
    state.recordEvent(event)
    state.setSelected(this.selectedLabels())

    try {
      this.options.onEvent?.(event)
    } catch (error) {
      log.error('onEvent listener failed:', error)
    }
    return true
  }

  private selectedLabels(): string[] {
    const answer = this.policy.currentAnswer()
    if (Array.isArray(answer)) return answer
    return answer === '' ? [] : [answer]
  }

  /**
   * Where pursuit targets are at `t`, for drawing. Null for other modes.
   */
  targetsAt(t = this.clock.now()): TargetPositions | null {
    return this.engine instanceof PursuitEngine ? this.engine.targetsAt(t) : null
  }

  result(): QuestionResult {
    return {
      kind: this.question.kind,
      mode: this.question.mode,
      answer: this.policy.answer,
      reactionTimeSec: this.submittedAt === null ? null : this.submittedAt - this.startedAt,
      toggles: this.policy.toggles,
      resets: this.policy.resets,
      clicks: [...this.policy.clicks],
    }
  }

  dispose(): void {
    if (!this.engine) return
    this.engine.reset()
    this.engine = null
    log.debug(`disposed "${this.question.text}"`)
  }
}
