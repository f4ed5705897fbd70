/**
 * PNG codec backed by pngjs
 */

export * from './types'
export * from './decoder'
export * from './encoder'
export * from './codec'
