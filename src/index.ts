export * from './types'
export {
  createActivationEngine,
  PursuitEngine,
  DwellEngine,
  BlinkEngine,
  DEFAULT_ENGINE_CONFIG,
  ENGINE_CONSTANTS,
  KIND_DEFAULTS,
  normalizeEngineConfig,
  type EngineSetup,
  type TargetPositions,
} from './lib/engines'
export { positionAt, samplePath, buildPursuitLayout, resolveLabels, DEFAULT_LABELS } from './lib/core/motion'
export { pearson, maxLaggedPearson, bestLag, estimateMaxLagSamples, gaussianProximity, mappedProximity, RollingWindow } from './lib/core/signal'
export { mapGazeToWidget } from './lib/core/coordinates/gaze-mapping'
export { createHitTest, isPointInRect, type AreaRegion, type Rect } from './lib/layout/hit-testing'
export { optionArea, SUBMIT_AREA, RESET_AREA, REST_AREA, areaKey } from './lib/layout/areas'
export { SelectionPolicy } from './lib/policy/selection-policy'
export { createActivationFeedbackStore, selectHighlightedLabel, type ActivationFeedbackStore } from './stores/activation-feedback-store'
export { QuestionSession, type QuestionSessionOptions } from './features/session/question-session'
export { monotonicClock, ManualClock, type Clock } from './shared/utils/time'
