/**
 * Linear interpolation utilities
 */

import type { Point } from '../../../types/gaze'

/**
 * Linear interpolation between two values.
 * @param t Interpolation factor (0-1)
 */
export function lerp(a: number, b: number, t: number): number {
    return a + (b - a) * t
}

/**
 * Component-wise interpolation between two points.
 */
export function lerpPoint(a: Point, b: Point, t: number): Point {
    return { x: lerp(a.x, b.x, t), y: lerp(a.y, b.y, t) }
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value))
}

export function clamp01(value: number): number {
    return clamp(value, 0, 1)
}
