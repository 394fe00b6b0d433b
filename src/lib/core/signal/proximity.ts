/**
 * Proximity Module - Gaussian spatial closeness between gaze and a target
 */

import { mean } from '../math'

const MIN_SIGMA = 1

/**
 * exp(-d^2 / 2 sigma^2) per distance; sigma is floored at 1px.
 */
export function gaussianProximity(distances: readonly number[], sigma: number): number[] {
    const s = Math.max(MIN_SIGMA, sigma)
    const twoSigmaSq = 2 * s * s
    return distances.map(d => Math.exp(-(d * d) / twoSigmaSq))
}

export function euclideanDistances(
    ax: readonly number[],
    ay: readonly number[],
    bx: readonly number[],
    by: readonly number[]
): number[] {
    const n = Math.min(ax.length, ay.length, bx.length, by.length)
    const out: number[] = new Array(n)
    for (let i = 0; i < n; i++) {
        out[i] = Math.hypot(ax[i] - bx[i], ay[i] - by[i])
    }
    return out
}

/**
 * Mean proximity over the window mapped from (0, 1] to (-1, 1], so it mixes
 * on the same scale as a correlation.
 */
export function mappedProximity(
    gx: readonly number[],
    gy: readonly number[],
    tx: readonly number[],
    ty: readonly number[],
    sigma: number
): number {
    const prox = mean(gaussianProximity(euclideanDistances(gx, gy, tx, ty), sigma))
    return 2 * prox - 1
}
