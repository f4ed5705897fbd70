/**
 * ICO (Windows icon) codec
 *
 * Features:
 * - All frames in directory order, or the largest one
 * - PNG entries through a pluggable PNG decoder
 * - BMP DIB entries with AND mask transparency
 */

export * from './types'
export * from './decoder'
export * from './dib'
export * from './composite'
export * from './codec'
