// Everything here is safe to load inside a workflow sandbox: no file system, no process.
export * from './config'
export * from './context'
export * from './errors'
export * from './executor'
export * from './logger'
export * from './registry'
export * from './task'
export * from './types'
