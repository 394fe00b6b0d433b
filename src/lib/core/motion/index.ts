export { positionAt, samplePath, cycleProgress } from './trajectories'
export { buildPursuitLayout, resolveLabels, DEFAULT_LABELS, type PresetOptions } from './presets'
