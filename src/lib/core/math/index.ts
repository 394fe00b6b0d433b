export { lerp, lerpPoint, clamp, clamp01 } from './lerp'
export { binarySearchGE } from './search'
export { mean, median, diff } from './statistics'
