export * from './schemas'
export * from './registry'
export * from './execute'
