export * from './types'
export * from './errors'
export * from './format'
export * from './registry'
