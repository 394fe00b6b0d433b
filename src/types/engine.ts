/**
 * Activation engine types - areas, activations and the events the policy layer emits
 */

import type { GazeSample, BlinkSample } from './gaze'

export enum ActivationMode {
  Dwell = 'dwell',
  Blink = 'blink',
  Pursuit = 'pursuit'
}

export enum AreaType {
  Option = 'option',
  Submit = 'submit',
  Reset = 'reset',
  Rest = 'rest'
}

export type AreaId =
  | { type: AreaType.Option; label: string }
  | { type: AreaType.Submit }
  | { type: AreaType.Reset }
  | { type: AreaType.Rest }

export type HitTest = (x: number, y: number) => AreaId | null

/**
 * Receives an activation. Returning false refuses it; the engine then skips
 * cooldowns tied to that action.
 */
export type ActivationHandler = (area: AreaId, atSec: number) => boolean

export enum EngineEventType {
  Toggle = 'toggle',
  Select = 'select',
  Reset = 'reset',
  Submit = 'submit'
}

export type Answer = string | string[]

export type EngineEvent =
  | { type: EngineEventType.Toggle; label: string; selected: boolean }
  | { type: EngineEventType.Select; label: string }
  | { type: EngineEventType.Reset }
  | { type: EngineEventType.Submit; answer: Answer }

export interface EngineConfig {
  windowMs: number
  corrThreshold: number
  toggleStableSamples: number
  submitStableSamples: number
  useLagCompensation: boolean
  maxLagMs: number
  optionFrequencyHz: number
  submitFrequencyHz: number
  proximitySigmaPx: number
  proximityWeight: number
  toggleCooldownMs: number
  submitCooldownMs: number
  allowEmptySubmit: boolean
  dwellThresholdMs: number
  blinkThresholdMs: number
}

export interface PursuitFeedback {
  mode: ActivationMode.Pursuit
  scores: Record<string, number>
  submitScore: number
  candidate: string | null
  candidateCount: number
  submitCount: number
}

export interface DwellFeedback {
  mode: ActivationMode.Dwell
  area: AreaId | null
  progress: number
}

export interface BlinkFeedback {
  mode: ActivationMode.Blink
  isBlinking: boolean
  fired: boolean
}

export type EngineFeedback = PursuitFeedback | DwellFeedback | BlinkFeedback

/**
 * Common surface of the three modalities. Engines ignore input kinds they do
 * not use (a dwell engine ignores blinks).
 */
export interface ActivationEngine {
  readonly mode: ActivationMode
  handleGaze(sample: GazeSample): void
  handleGazeLost(atSec: number): void
  handleBlink(sample: BlinkSample): void
  getFeedback(): EngineFeedback
  reset(): void
}
