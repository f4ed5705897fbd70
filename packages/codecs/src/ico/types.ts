/**
 * ICO format types and constants
 */

import type { PngDecoder } from '../png/types'

export const ICO_TYPE = 1 // Icon
export const ICONDIR_SIZE = 6
export const ICONDIRENTRY_SIZE = 16

/**
 * ICONDIR header structure
 */
export interface IconDir {
	reserved: number // Ignored
	type: number // Must be 1
	count: number // Number of images, signed 16-bit
}

/**
 * ICONDIRENTRY structure
 */
export interface IconDirEntry {
	width: number // 0 means 256
	height: number // 0 means 256
	colorCount: number // 0 if >= 256 colors
	reserved: number
	planes: number
	bitCount: number
	bytesInRes: number // Size of image data
	imageOffset: number // Absolute file offset of image data
}

/**
 * Parsed ICO file
 */
export interface IcoImage {
	entries: IconDirEntry[]
	images: Uint8Array[] // Raw image data (PNG or BMP DIB), same order as entries
}

/**
 * The two standalone BMP files rebuilt from one icon DIB
 */
export interface SynthesizedBitmaps {
	xor: Uint8Array // Color image
	and: Uint8Array // 1 bpp transparency mask
}

export interface DecodeIcoOptions {
	/**
	 * Decoder for PNG-compressed entries, pngjs when omitted
	 */
	decodePng?: PngDecoder
}

/**
 * Directory dimension byte to pixels
 */
export function entrySize(value: number): number {
	return value === 0 ? 256 : value
}
