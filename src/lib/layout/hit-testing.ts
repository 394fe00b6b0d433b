/**
 * Hit testing for question layouts
 *
 * A layout is an ordered list of rectangular regions; the first region that
 * contains the point wins, so overlapping regions resolve by order.
 */

import type { AreaId, HitTest } from '../../types/engine'

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

export interface AreaRegion {
  area: AreaId
  rect: Rect
}

/**
 * Pixel-grid containment: left/top edges inside, right/bottom edges outside.
 */
export function isPointInRect(pointX: number, pointY: number, rect: Rect): boolean {
  return (
    pointX >= rect.x &&
    pointX < rect.x + rect.width &&
    pointY >= rect.y &&
    pointY < rect.y + rect.height
  )
}

export function createHitTest(regions: readonly AreaRegion[]): HitTest {
  const snapshot = regions.map(r => ({ area: r.area, rect: { ...r.rect } }))
  return (x: number, y: number) => {
    for (const region of snapshot) {
      if (isPointInRect(x, y, region.rect)) return region.area
    }
    return null
  }
}
