/**
 * Area helpers - constructors and comparisons for the closed AreaId union
 */

import { AreaType, type AreaId } from '../../types/engine'

export const SUBMIT_AREA: AreaId = { type: AreaType.Submit }
export const RESET_AREA: AreaId = { type: AreaType.Reset }
export const REST_AREA: AreaId = { type: AreaType.Rest }

export const optionArea = (label: string): AreaId => ({ type: AreaType.Option, label })

/**
 * Stable string form, used for logs and click records.
 */
export function areaKey(area: AreaId): string {
  return area.type === AreaType.Option ? `option:${area.label}` : area.type
}

export function areasEqual(a: AreaId | null, b: AreaId | null): boolean {
  if (a === null || b === null) return a === b
  return areaKey(a) === areaKey(b)
}

/**
 * Areas that can never be activated: nothing under gaze, or the rest zone.
 */
export function isInactiveArea(area: AreaId | null): area is { type: AreaType.Rest } | null {
  return area === null || area.type === AreaType.Rest
}
