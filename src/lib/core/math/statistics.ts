/**
 * Small descriptive statistics over plain number arrays
 */

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0
    let sum = 0
    for (const v of values) sum += v
    return sum / values.length
}

export function median(values: readonly number[]): number {
    if (values.length === 0) return 0
    const sorted = [...values].sort((a, b) => a - b)
    const mid = Math.floor(sorted.length / 2)
    if (sorted.length % 2 === 0) {
        return (sorted[mid - 1] + sorted[mid]) / 2
    }
    return sorted[mid]
}

/**
 * Consecutive differences: out[i] = values[i + 1] - values[i]
 */
export function diff(values: readonly number[]): number[] {
    const out: number[] = []
    for (let i = 1; i < values.length; i++) {
        out.push(values[i] - values[i - 1])
    }
    return out
}
