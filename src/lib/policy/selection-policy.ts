/**
 * Selection Policy
 *
 * Turns area activations into question events. Multi-select questions keep
 * a set and emit toggles; single-select questions keep one label and emit
 * selects. Both end with one submit carrying the answer.
 */

import {
  AreaType,
  EngineEventType,
  type Answer,
  type AreaId,
  type EngineEvent,
} from '../../types/engine'
import { QuestionKind, type ClickRecord } from '../../types/question'
import { invariantUnreachable } from '../utils/invariant'

export interface SelectionPolicyOptions {
  kind: QuestionKind
  labels: readonly string[]
  allowEmptySubmit: boolean
}

export const isMultiSelect = (kind: QuestionKind) => kind === QuestionKind.MultipleChoice

export class SelectionPolicy {
  readonly multiSelect: boolean

  private readonly labels: readonly string[]
  private readonly selected = new Set<string>()
  private submittedAnswer: Answer | null = null
  private toggleCount = 0
  private resetCount = 0
  private readonly clickLog: ClickRecord[] = []

  constructor(private readonly options: SelectionPolicyOptions) {
    this.multiSelect = isMultiSelect(options.kind)
    this.labels = [...options.labels]
  }

  /**
   * Apply one activation. Returns the resulting event, or null when the
   * activation is refused (rest zone, unknown label, empty submit, or the
   * question is already answered).
   */
  apply(area: AreaId, atSec: number): EngineEvent | null {
    if (this.submittedAnswer !== null) return null

    const event = this.eventFor(area)
    if (event) {
      this.clickLog.push({ index: this.clickLog.length + 1, atSec, action: describeEvent(event) })
    }
    return event
  }

  private eventFor(area: AreaId): EngineEvent | null {
    switch (area.type) {
      case AreaType.Option:
        return this.choose(area.label)
      case AreaType.Reset:
        return this.clearSelection()
      case AreaType.Submit:
        return this.submit()
      case AreaType.Rest:
        return null
      default:
        return invariantUnreachable(area)
    }
  }

  private choose(label: string): EngineEvent | null {
    if (!this.labels.includes(label)) return null

    if (this.multiSelect) {
      const nowSelected = !this.selected.has(label)
      if (nowSelected) this.selected.add(label)
      else this.selected.delete(label)
      this.toggleCount += 1
      return { type: EngineEventType.Toggle, label, selected: nowSelected }
    }

    if (!this.selected.has(label)) {
      this.selected.clear()
      this.selected.add(label)
      this.toggleCount += 1
    }
    return { type: EngineEventType.Select, label }
  }

  private clearSelection(): EngineEvent | null {
    if (this.selected.size === 0) return null
    this.selected.clear()
    this.resetCount += 1
    return { type: EngineEventType.Reset }
  }

  private submit(): EngineEvent | null {
    if (this.selected.size === 0 && !this.options.allowEmptySubmit) return null
    const answer = this.currentAnswer()
    this.submittedAnswer = answer
    return { type: EngineEventType.Submit, answer }
  }

  /**
   * Multi-select answers list labels in presentation order; single-select
   * answers are the label, or '' when empty.
   */
  currentAnswer(): Answer {
    const ordered = this.labels.filter(label => this.selected.has(label))
    if (this.multiSelect) return ordered
    return ordered[0] ?? ''
  }

  get hasSelection(): boolean {
    return this.selected.size > 0
  }

  get answer(): Answer | null {
    return this.submittedAnswer
  }

  get toggles(): number {
    return this.toggleCount
  }

  get resets(): number {
    return this.resetCount
  }

  get clicks(): readonly ClickRecord[] {
    return this.clickLog
  }
}

function describeEvent(event: EngineEvent): string {
  switch (event.type) {
    case EngineEventType.Toggle:
      return `toggle:${event.label}`
    case EngineEventType.Select:
      return `select:${event.label}`
    case EngineEventType.Reset:
      return 'reset'
    case EngineEventType.Submit:
      return 'submit'
    default:
      return invariantUnreachable(event)
  }
}
