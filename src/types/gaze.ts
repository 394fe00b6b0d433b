/**
 * Gaze input types
 *
 * Timestamps are monotonic seconds. Coordinates are widget-local pixels unless
 * a type says otherwise.
 */

export interface Point {
  x: number
  y: number
}

export interface Size {
  width: number
  height: number
}

export interface GazeSample extends Point {
  t: number
}

export interface BlinkSample {
  t: number
  blinking: boolean
}

/**
 * One frame from the upstream tracker.
 * `gaze` is null while the face is lost or the eyes are closed.
 */
export interface TrackerFrame {
  gaze: Point | null
  blinking: boolean
}
