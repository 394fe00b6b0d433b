export * from './correlation'
export * from './proximity'
export { RollingWindow, type WindowEntry, type Trace } from './rolling-window'
