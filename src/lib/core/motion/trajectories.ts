/**
 * Motion Model
 *
 * Deterministic target trajectories. Every position is a pure function of
 * elapsed time so rendering and scoring always agree and nothing drifts.
 */

import type { Point } from '../../../types/gaze'
import {
    MotionShape,
    type MotionSpec,
    type CircleMotion,
    type TriangleMotion,
    type OscillationMotion,
} from '../../../types/motion'
import { lerpPoint } from '../math'
import { invariantUnreachable } from '../../utils/invariant'

const SQRT3_2 = Math.sqrt(3) / 2

/**
 * Normalized progress through one period, in [0, 1).
 */
export function cycleProgress(t: number, frequencyHz: number): number {
    const u = (t * frequencyHz) % 1
    return u < 0 ? u + 1 : u
}

function circlePosition(spec: CircleMotion, t: number): Point {
    const s = spec.clockwise ? 1 : -1
    const angle = s * 2 * Math.PI * spec.frequencyHz * t
    return {
        x: spec.center.x + spec.radius * Math.cos(angle),
        y: spec.center.y + spec.radius * Math.sin(angle),
    }
}

/**
 * Perimeter walk top -> right -> bottom -> left starting at the top-left corner.
 */
function rectanglePosition(
    center: Point,
    halfWidth: number,
    halfHeight: number,
    t: number,
    frequencyHz: number,
    clockwise: boolean
): Point {
    let u = cycleProgress(t, frequencyHz)
    if (!clockwise) u = (1 - u) % 1

    const p = u * 4
    const x0 = center.x - halfWidth
    const x1 = center.x + halfWidth
    const y0 = center.y - halfHeight
    const y1 = center.y + halfHeight

    if (p < 1) return { x: x0 + (x1 - x0) * p, y: y0 }
    if (p < 2) return { x: x1, y: y0 + (y1 - y0) * (p - 1) }
    if (p < 3) return { x: x1 - (x1 - x0) * (p - 2), y: y1 }
    return { x: x0, y: y1 - (y1 - y0) * (p - 3) }
}

function triangleVertices(spec: Pick<TriangleMotion, 'center' | 'radius'>): [Point, Point, Point] {
    const { center: c, radius: r } = spec
    return [
        { x: c.x, y: c.y - r },
        { x: c.x + SQRT3_2 * r, y: c.y + 0.5 * r },
        { x: c.x - SQRT3_2 * r, y: c.y + 0.5 * r },
    ]
}

function trianglePosition(spec: TriangleMotion, t: number): Point {
    const [v0, v1, v2] = triangleVertices(spec)
    const verts = spec.clockwise ? [v0, v1, v2] : [v0, v2, v1]

    const p = cycleProgress(t, spec.frequencyHz) * 3
    if (p < 1) return lerpPoint(verts[0], verts[1], p)
    if (p < 2) return lerpPoint(verts[1], verts[2], p - 1)
    return lerpPoint(verts[2], verts[0], p - 2)
}

function oscillationPosition(spec: OscillationMotion, t: number): Point {
    const s = spec.clockwise ? 1 : -1
    const phase = Math.sin(s * 2 * Math.PI * spec.frequencyHz * t)
    return {
        x: spec.center.x + spec.amplitudeX * phase,
        y: spec.center.y + spec.amplitudeY * phase,
    }
}

/**
 * Target position at `t` seconds after motion start.
 */
export function positionAt(spec: MotionSpec, t: number): Point {
    switch (spec.shape) {
        case MotionShape.Circle:
            return circlePosition(spec, t)
        case MotionShape.Square:
            return rectanglePosition(spec.center, spec.halfSize, spec.halfSize, t, spec.frequencyHz, spec.clockwise)
        case MotionShape.Rectangle:
            return rectanglePosition(spec.center, spec.halfWidth, spec.halfHeight, t, spec.frequencyHz, spec.clockwise)
        case MotionShape.Triangle:
            return trianglePosition(spec, t)
        case MotionShape.Oscillation:
            return oscillationPosition(spec, t)
        default:
            return invariantUnreachable(spec, 'Unknown motion shape')
    }
}

/**
 * Outline of one full period, `steps` points evenly spaced in time.
 * A motion with no frequency has a single-point path.
 */
export function samplePath(spec: MotionSpec, steps = 64): Point[] {
    if (!(spec.frequencyHz > 0) || steps < 1) return [positionAt(spec, 0)]
    const period = 1 / spec.frequencyHz
    const points: Point[] = []
    for (let i = 0; i < steps; i++) {
        points.push(positionAt(spec, (i / steps) * period))
    }
    return points
}
