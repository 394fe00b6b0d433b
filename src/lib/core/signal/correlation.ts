/**
 * Correlation Module
 *
 * Pearson correlation between a gaze trace and a target trace, with an
 * optional bounded lag search to absorb perceptual/motor latency.
 * Degenerate inputs (too short, constant) correlate as 0.
 */

import { clamp, diff, median } from '../math'

/** Fewer overlapping samples than this leave correlation undefined (0). */
export const MIN_CORRELATION_SAMPLES = 3

const NORM_FLOOR = 1e-9
const FALLBACK_SAMPLE_PERIOD_SEC = 1 / 30
const MIN_TIMESTAMPS_FOR_PERIOD = 6

export interface LagResult {
    lag: number
    correlation: number
}

function alignRight(a: readonly number[], b: readonly number[]): [readonly number[], readonly number[]] {
    if (a.length === b.length) return [a, b]
    const m = Math.min(a.length, b.length)
    return [a.slice(a.length - m), b.slice(b.length - m)]
}

/**
 * Pearson correlation of two series. Series of unequal length are truncated
 * to their common tail.
 */
export function pearson(a: readonly number[], b: readonly number[]): number {
    if (a.length < MIN_CORRELATION_SAMPLES || b.length < MIN_CORRELATION_SAMPLES) return 0
    const [aa, bb] = alignRight(a, b)
    const n = aa.length

    let meanA = 0
    let meanB = 0
    for (let i = 0; i < n; i++) {
        meanA += aa[i]
        meanB += bb[i]
    }
    meanA /= n
    meanB /= n

    let dot = 0
    let sumA = 0
    let sumB = 0
    for (let i = 0; i < n; i++) {
        const da = aa[i] - meanA
        const db = bb[i] - meanB
        dot += da * db
        sumA += da * da
        sumB += db * db
    }

    const denom = Math.sqrt(sumA) * Math.sqrt(sumB)
    if (denom < NORM_FLOOR) return 0
    // Rounding can push the ratio just past +/-1
    return clamp(dot / denom, -1, 1)
}

/**
 * Best lag in [-maxLagSamples, maxLagSamples]. A positive lag compares
 * a[lag:] with b[:-lag], i.e. `a` trails `b` by `lag` samples.
 *
 * Returns null when no lag leaves at least 3 overlapping samples.
 */
export function bestLag(
    a: readonly number[],
    b: readonly number[],
    maxLagSamples: number
): LagResult | null {
    if (a.length < MIN_CORRELATION_SAMPLES || b.length < MIN_CORRELATION_SAMPLES) return null
    const [aa, bb] = alignRight(a, b)
    const m = aa.length
    const maxLag = Math.max(0, Math.trunc(maxLagSamples))

    let best: LagResult | null = null
    for (let k = -maxLag; k <= maxLag; k++) {
        const overlap = m - Math.abs(k)
        if (overlap < MIN_CORRELATION_SAMPLES) continue

        const c = k >= 0
            ? pearson(aa.slice(k), bb.slice(0, m - k))
            : pearson(aa.slice(0, m + k), bb.slice(-k))

        if (best === null || c > best.correlation) {
            best = { lag: k, correlation: c }
        }
    }

    return best
}

/**
 * Maximum Pearson correlation over the symmetric lag range, 0 when no lag
 * qualifies. With `maxLagSamples` of 0 this is exactly `pearson(a, b)`.
 */
export function maxLaggedPearson(
    a: readonly number[],
    b: readonly number[],
    maxLagSamples: number
): number {
    if (Math.max(0, Math.trunc(maxLagSamples)) === 0) return pearson(a, b)
    return bestLag(a, b, maxLagSamples)?.correlation ?? 0
}

/**
 * Sample period from the median timestamp delta. Falls back to 30 Hz with
 * fewer than 6 timestamps or a degenerate median.
 */
export function estimateSamplePeriod(timestamps: readonly number[]): number {
    if (timestamps.length < MIN_TIMESTAMPS_FOR_PERIOD) return FALLBACK_SAMPLE_PERIOD_SEC
    const dt = median(diff(timestamps))
    return dt > 1e-6 ? dt : FALLBACK_SAMPLE_PERIOD_SEC
}

export function estimateMaxLagSamples(timestamps: readonly number[], maxLagMs: number): number {
    const period = estimateSamplePeriod(timestamps)
    return Math.round(Math.max(0, maxLagMs / 1000) / period)
}
