import type { Point } from './gaze'

export enum MotionShape {
  Circle = 'circle',
  Square = 'square',
  Rectangle = 'rectangle',
  Triangle = 'triangle',
  Oscillation = 'oscillation'
}

interface MotionBase {
  center: Point
  frequencyHz: number
  clockwise: boolean
}

export interface CircleMotion extends MotionBase {
  shape: MotionShape.Circle
  radius: number
}

export interface SquareMotion extends MotionBase {
  shape: MotionShape.Square
  halfSize: number
}

export interface RectangleMotion extends MotionBase {
  shape: MotionShape.Rectangle
  halfWidth: number
  halfHeight: number
}

/** Equilateral, vertex up; `radius` is the circumradius. */
export interface TriangleMotion extends MotionBase {
  shape: MotionShape.Triangle
  radius: number
}

/** Sinusoidal back-and-forth through `center`. */
export interface OscillationMotion extends MotionBase {
  shape: MotionShape.Oscillation
  amplitudeX: number
  amplitudeY: number
}

export type MotionSpec =
  | CircleMotion
  | SquareMotion
  | RectangleMotion
  | TriangleMotion
  | OscillationMotion

export interface PursuitTarget {
  label: string
  motion: MotionSpec
}

export interface PursuitLayout {
  targets: PursuitTarget[]
  submit: MotionSpec
}
