export * from './lock-registry'
export * from './keyed-mutex'
export * from './in-memory-lock-registry'
export * from './guarded-lock-registry'
export * from './registry-factory'
