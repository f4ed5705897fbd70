/**
 * BMP (Windows bitmap) decoder
 *
 * Uncompressed 1, 4, 8, 24 and 32 bpp; bottom-up and top-down rows.
 */

export * from './types'
export * from './decoder'
export * from './codec'
