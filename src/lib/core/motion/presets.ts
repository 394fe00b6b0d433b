/**
 * Pursuit layout presets
 *
 * Builds the moving targets of each question kind for a given widget size.
 * Geometry matches the rendered orbits, so positions fed to the engine are
 * the ones the respondent sees.
 */

import type { Size, Point } from '../../../types/gaze'
import { MotionShape, type MotionSpec, type OscillationMotion, type PursuitLayout } from '../../../types/motion'
import { QuestionKind } from '../../../types/question'
import { clamp } from '../math'
import { invariant } from '../../utils/invariant'

export interface PresetOptions {
    optionFrequencyHz: number
    submitFrequencyHz: number
    /** Orbit size as a fraction of the widget's smaller side */
    orbitScale?: number
}

export const DEFAULT_LABELS: Record<QuestionKind, readonly string[]> = {
    [QuestionKind.YesNo]: ['yes', 'no'],
    [QuestionKind.MultipleChoice]: ['A', 'B', 'C', 'D'],
    [QuestionKind.Likert]: ['1', '2', '3', '4', '5'],
}

const DEFAULT_ORBIT_SCALE: Record<QuestionKind, number> = {
    [QuestionKind.YesNo]: 0.36,
    [QuestionKind.MultipleChoice]: 0.36,
    [QuestionKind.Likert]: 0.34,
}

const SUBMIT_AMPLITUDE_MIN = 220
const SUBMIT_AMPLITUDE_RATIO = 0.30
const SUBMIT_CENTER_RATIO = 0.88

interface Box {
    left: number
    top: number
    width: number
    height: number
}

// Inclusive pixel-grid edges, as the widget toolkit reports them
const boxBottom = (b: Box) => b.top + b.height - 1
const boxCenterY = (b: Box) => Math.trunc((b.top + boxBottom(b)) / 2)

function submitBox(w: number, h: number, minWidth: number, widthRatio: number, minHeight: number, heightRatio: number): Box {
    const width = Math.trunc(Math.max(minWidth, w * widthRatio))
    const height = Math.trunc(Math.max(minHeight, h * heightRatio))
    const centerY = Math.trunc(h * SUBMIT_CENTER_RATIO)
    return {
        left: Math.trunc(w * 0.5 - width / 2),
        top: Math.trunc(centerY - height / 2),
        width,
        height,
    }
}

function submitMotion(w: number, lineY: number, frequencyHz: number): OscillationMotion {
    return {
        shape: MotionShape.Oscillation,
        center: { x: w * 0.5, y: lineY },
        amplitudeX: Math.max(SUBMIT_AMPLITUDE_MIN, w * SUBMIT_AMPLITUDE_RATIO),
        amplitudeY: 0,
        frequencyHz,
        clockwise: true,
    }
}

/**
 * Labels for a question kind. A list of the wrong length is a layout error;
 * outside development the kind's default labels are used instead.
 */
export function resolveLabels(kind: QuestionKind, labels?: readonly string[]): string[] {
    const defaults = DEFAULT_LABELS[kind]
    if (!labels) return [...defaults]
    const ok = invariant(
        labels.length === defaults.length && new Set(labels).size === labels.length,
        `${kind} needs ${defaults.length} distinct labels, got [${labels.join(', ')}]`
    )
    return ok ? [...labels] : [...defaults]
}

function yesNoLayout(labels: string[], size: Size, opts: Required<PresetOptions>): PursuitLayout {
    const w = Math.max(1, size.width)
    const h = Math.max(1, size.height)

    const orbitSize = Math.max(260, Math.min(w, h) * opts.orbitScale)
    const halfWidth = orbitSize * 0.5
    const halfHeight = orbitSize * 0.6
    const margin = Math.trunc(orbitSize * 0.72) + 32
    const midY = h * 0.54

    const rect = (center: Point, clockwise: boolean): MotionSpec => ({
        shape: MotionShape.Rectangle,
        center,
        halfWidth,
        halfHeight,
        frequencyHz: opts.optionFrequencyHz,
        clockwise,
    })

    const submit = submitBox(w, h, 380, 0.28, 90, 0.095)
    return {
        targets: [
            { label: labels[0], motion: rect({ x: margin, y: midY }, false) },
            { label: labels[1], motion: rect({ x: w - margin, y: midY }, true) },
        ],
        submit: submitMotion(w, boxCenterY(submit), opts.submitFrequencyHz),
    }
}

function multipleChoiceLayout(labels: string[], size: Size, opts: Required<PresetOptions>): PursuitLayout {
    const w = Math.max(1, size.width)
    const h = Math.max(1, size.height)

    const orbitSize = Math.max(280, Math.min(w, h) * opts.orbitScale)
    const radius = orbitSize * 0.5
    const margin = Math.trunc(orbitSize * 0.72) + 32

    // Bottom row stays above the submit line on small screens
    const topY = margin
    const bottomY = Math.min(Math.max(margin + orbitSize * 0.6, h * 0.66), h * 0.76)
    const leftX = margin
    const rightX = w - margin

    const f = opts.optionFrequencyHz
    const submit = submitBox(w, h, 700, 0.5, 105, 0.11)
    return {
        targets: [
            { label: labels[0], motion: { shape: MotionShape.Circle, center: { x: leftX, y: topY }, radius, frequencyHz: f, clockwise: true } },
            { label: labels[1], motion: { shape: MotionShape.Circle, center: { x: rightX, y: topY }, radius, frequencyHz: f, clockwise: false } },
            { label: labels[2], motion: { shape: MotionShape.Square, center: { x: leftX, y: bottomY }, halfSize: radius, frequencyHz: f, clockwise: true } },
            { label: labels[3], motion: { shape: MotionShape.Square, center: { x: rightX, y: bottomY }, halfSize: radius, frequencyHz: f, clockwise: false } },
        ],
        submit: submitMotion(w, boxCenterY(submit), opts.submitFrequencyHz),
    }
}

/**
 * Five orbits around the question panel: two on the middle row, three on top.
 */
function likertLayout(labels: string[], size: Size, opts: Required<PresetOptions>): PursuitLayout {
    const w = Math.max(1, size.width)
    const h = Math.max(1, size.height)

    const baseShift = Math.max(44, Math.trunc(h * 0.06))
    const shift = Math.min(Math.max(baseShift, Math.trunc(h * 0.08)), Math.trunc(h * 0.18))

    const qWidth = Math.trunc(w * 0.52)
    const qHeight = Math.trunc(h * 0.22)
    const question: Box = {
        left: Math.trunc((w - qWidth) / 2),
        top: Math.trunc(Math.trunc(h * 0.36) - Math.trunc(qHeight / 2) + shift),
        width: qWidth,
        height: qHeight,
    }

    const orbitSize = Math.max(240, Math.min(w, h) * opts.orbitScale)
    const topSize = orbitSize * 0.75
    const midSize = orbitSize * 0.8
    const topClear = topSize * 0.65
    const midClear = midSize * 0.65

    const submit = submitBox(w, h, 700, 0.5, 105, 0.11)
    const margin = Math.trunc(orbitSize * 0.7) + 32

    const leftX = Math.max(60, Math.min(margin, w * 0.3))
    const rightX = Math.min(w - 60, Math.max(w - margin, w * 0.7))
    const midX = w * 0.5

    const topYMin = topClear + 20
    const topYMax = Math.max(topYMin, question.top - topClear - 18)
    const topY = clamp(margin + shift, topYMin, topYMax)

    const midYMin = boxBottom(question) + midClear + 18
    const midYMax = Math.max(midYMin, Math.min(submit.top - midClear - 18, h * 0.74))
    const midY = clamp(h * 0.62 + shift, midYMin, midYMax)

    const f = opts.optionFrequencyHz
    return {
        targets: [
            { label: labels[0], motion: { shape: MotionShape.Circle, center: { x: leftX, y: midY }, radius: midSize * 0.45, frequencyHz: f, clockwise: false } },
            { label: labels[1], motion: { shape: MotionShape.Square, center: { x: leftX, y: topY }, halfSize: topSize * 0.45, frequencyHz: f, clockwise: true } },
            { label: labels[2], motion: { shape: MotionShape.Triangle, center: { x: midX, y: topY }, radius: topSize * 0.5, frequencyHz: f, clockwise: true } },
            { label: labels[3], motion: { shape: MotionShape.Circle, center: { x: rightX, y: topY }, radius: topSize * 0.45, frequencyHz: f, clockwise: false } },
            { label: labels[4], motion: { shape: MotionShape.Square, center: { x: rightX, y: midY }, halfSize: midSize * 0.45, frequencyHz: f, clockwise: true } },
        ],
        submit: submitMotion(w, boxCenterY(submit) + Math.trunc(h * 0.03), opts.submitFrequencyHz),
    }
}

/**
 * Targets and submit target for a pursuit question of the given kind.
 */
export function buildPursuitLayout(
    kind: QuestionKind,
    labels: readonly string[] | undefined,
    size: Size,
    options: PresetOptions
): PursuitLayout {
    const resolved = resolveLabels(kind, labels)
    const opts: Required<PresetOptions> = {
        ...options,
        orbitScale: options.orbitScale ?? DEFAULT_ORBIT_SCALE[kind],
    }

    switch (kind) {
        case QuestionKind.YesNo:
            return yesNoLayout(resolved, size, opts)
        case QuestionKind.MultipleChoice:
            return multipleChoiceLayout(resolved, size, opts)
        case QuestionKind.Likert:
            return likertLayout(resolved, size, opts)
    }
}
