export * from './gaze'
export * from './motion'
export * from './engine'
export * from './question'
