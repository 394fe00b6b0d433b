import type { ActivationMode, Answer } from './engine'

export enum QuestionKind {
  YesNo = 'yesno',
  MultipleChoice = 'mcq',
  Likert = 'likert'
}

export interface QuestionDefinition {
  kind: QuestionKind
  text: string
  labels: string[]
  mode: ActivationMode
}

export interface ClickRecord {
  index: number
  atSec: number
  action: string
}

export interface QuestionResult {
  kind: QuestionKind
  mode: ActivationMode
  answer: Answer | null
  reactionTimeSec: number | null
  toggles: number
  resets: number
  clicks: ClickRecord[]
}
