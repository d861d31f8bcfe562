export * from './config-loader'
export * from './workflow'
