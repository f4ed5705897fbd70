/**
 * BMP format types and constants
 */

export const FILE_HEADER_SIZE = 14
export const INFO_HEADER_SIZE = 40 // BITMAPINFOHEADER

/**
 * DIB header sizes the decoder accepts: BITMAPINFOHEADER, V4 and V5
 */
export const SUPPORTED_DIB_SIZES: readonly number[] = [40, 108, 124]

/**
 * Compression types
 */
export const BI_RGB = 0
export const BI_RLE8 = 1
export const BI_RLE4 = 2
export const BI_BITFIELDS = 3

/**
 * BITMAPFILEHEADER
 */
export interface BitmapFileHeader {
	signature: number // 0x4d42, "BM"
	fileSize: number
	reserved1: number
	reserved2: number
	pixelOffset: number // Offset to pixel rows from the start of the file
}

/**
 * BITMAPINFOHEADER (leading 40 bytes of every supported DIB header)
 */
export interface BitmapInfoHeader {
	size: number // Header size in bytes
	width: number
	height: number // Negative for top-down rows
	planes: number
	bitCount: number // Bits per pixel
	compression: number
	sizeImage: number
	xPelsPerMeter: number
	yPelsPerMeter: number
	colorsUsed: number // 0 means 1 << bitCount for indexed depths
	colorsImportant: number
}

/**
 * Palette entry, alpha always 255 when read from a BMP color table
 */
export interface PaletteColor {
	r: number
	g: number
	b: number
	a: number
}

/**
 * Palette-indexed bitmap (1, 4 and 8 bpp)
 */
export interface IndexedBitmap {
	kind: 'indexed'
	width: number
	height: number
	palette: PaletteColor[]
	indices: Uint8Array // One palette index per pixel, top row first
}

/**
 * Direct color bitmap (24 and 32 bpp)
 */
export interface DirectBitmap {
	kind: 'direct'
	width: number
	height: number
	data: Uint8Array // RGBA, top row first
}

export type DecodedBitmap = IndexedBitmap | DirectBitmap

/**
 * Byte length of one pixel row, padded to 4 bytes
 */
export function rowStride(width: number, bitCount: number): number {
	return Math.floor((width * bitCount + 31) / 32) * 4
}
