// Safe to import from workflow code: nothing here loads the Temporal client or Node-only modules.
export * from './activity'
export * from './executor'
export * from './runtime'
