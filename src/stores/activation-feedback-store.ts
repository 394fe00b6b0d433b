/**
 * Activation Feedback Store
 *
 * Per-question Zustand store the UI reads for highlighting: last scores,
 * the current candidate, dwell progress, blink state and selection. Nothing
 * here feeds back into decisions.
 */

import { createStore } from 'zustand/vanilla'
import { immer } from 'zustand/middleware/immer'
import {
  ActivationMode,
  AreaType,
  EngineEventType,
  type AreaId,
  type EngineEvent,
  type EngineFeedback,
} from '../types/engine'

interface ActivationFeedbackState {
  mode: ActivationMode
  /** False while the tracker reports no gaze */
  tracking: boolean
  scores: Record<string, number>
  submitScore: number
  candidate: string | null
  dwellArea: AreaId | null
  dwellProgress: number
  isBlinking: boolean
  selected: string[]
  lastEvent: EngineEvent | null
  eventCount: number
}

interface ActivationFeedbackActions {
  applyFeedback: (feedback: EngineFeedback) => void
  setTracking: (tracking: boolean) => void
  setSelected: (labels: string[]) => void
  recordEvent: (event: EngineEvent) => void
  reset: () => void
}

export type ActivationFeedbackStore = ActivationFeedbackState & ActivationFeedbackActions

/**
 * Immer freezes what it stores; keep callers' objects out of the store.
 */
const copyEvent = (event: EngineEvent): EngineEvent =>
  event.type === EngineEventType.Submit && Array.isArray(event.answer)
    ? { ...event, answer: [...event.answer] }
    : { ...event }

const initialState = (mode: ActivationMode): ActivationFeedbackState => ({
  mode,
  tracking: false,
  scores: {},
  submitScore: 0,
  candidate: null,
  dwellArea: null,
  dwellProgress: 0,
  isBlinking: false,
  selected: [],
  lastEvent: null,
  eventCount: 0,
})

export const createActivationFeedbackStore = (mode: ActivationMode) =>
  createStore<ActivationFeedbackStore>()(
    immer((set) => ({
      ...initialState(mode),

      applyFeedback: (feedback) => {
        set(state => {
          switch (feedback.mode) {
            case ActivationMode.Pursuit:
              state.scores = { ...feedback.scores }
              state.submitScore = feedback.submitScore
              state.candidate = feedback.candidate
              break
            case ActivationMode.Dwell:
              state.dwellArea = feedback.area ? { ...feedback.area } : null
              state.dwellProgress = feedback.progress
              break
            case ActivationMode.Blink:
              state.isBlinking = feedback.isBlinking
              break
          }
        })
      },

      setTracking: (tracking) => set(state => {
        state.tracking = tracking
      }),

      setSelected: (labels) => set(state => {
        state.selected = [...labels]
      }),

      recordEvent: (event) => set(state => {
        state.lastEvent = copyEvent(event)
        state.eventCount += 1
      }),

      reset: () => set(initialState(mode)),
    }))
  )

export type ActivationFeedbackStoreApi = ReturnType<typeof createActivationFeedbackStore>

/**
 * Label to highlight: the pursuit candidate, or the option being dwelt on.
 */
export const selectHighlightedLabel = (state: ActivationFeedbackState): string | null => {
  if (state.candidate !== null) return state.candidate
  if (state.dwellArea && state.dwellArea.type === AreaType.Option) return state.dwellArea.label
  return null
}
