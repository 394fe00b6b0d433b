/**
 * Binary search utilities
 */

/**
 * Binary search for the smallest index where the value is greater than or equal to target.
 * Returns arr.length if all values are less than target.
 *
 * @param arr Sorted array of numbers (ascending)
 */
export function binarySearchGE(arr: readonly number[], target: number): number {
    if (arr.length === 0) return 0

    let lo = 0
    let hi = arr.length - 1
    let result = arr.length

    while (lo <= hi) {
        const mid = Math.floor((lo + hi) / 2)
        if (arr[mid] >= target) {
            result = mid
            hi = mid - 1
        } else {
            lo = mid + 1
        }
    }

    return result
}
