/**
 * Gaze mapping - screen space to widget space
 *
 * The tracker reports calibrated screen pixels. Widgets score and hit-test in
 * their own pixels, scaled proportionally and truncated to whole pixels.
 */

import type { Point, Size } from '../../../types/gaze'

const isUsableSize = (size: Size) =>
    Number.isFinite(size.width) && Number.isFinite(size.height) && size.width > 0 && size.height > 0

/**
 * Map a screen-space gaze point into widget coordinates.
 * Returns null when there is no gaze or either size is degenerate; callers
 * treat null as lost tracking.
 */
export function mapGazeToWidget(gaze: Point | null, screen: Size, widget: Size): Point | null {
    if (!gaze || !Number.isFinite(gaze.x) || !Number.isFinite(gaze.y)) return null
    if (!isUsableSize(screen) || !isUsableSize(widget)) return null

    return {
        x: Math.trunc((gaze.x / screen.width) * widget.width),
        y: Math.trunc((gaze.y / screen.height) * widget.height),
    }
}

export function isFinitePoint(point: Point | null | undefined): point is Point {
    return !!point && Number.isFinite(point.x) && Number.isFinite(point.y)
}
