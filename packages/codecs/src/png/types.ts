import type { ImageData } from '@icoframe/core'

/**
 * PNG file signature
 */
export const PNG_SIGNATURE = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

/**
 * Anything that turns a complete PNG stream into RGBA pixels
 */
export type PngDecoder = (data: Uint8Array) => ImageData
