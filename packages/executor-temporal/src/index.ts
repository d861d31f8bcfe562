export * from './client'
export * from './factory'
export * from './workflow'
