import { CodecError, type ColorModel, type ImageData, type ImageInfo } from '@icoframe/core'
import { ensureAvailable, toDataView } from '../binary'
import {
	BI_BITFIELDS,
	BI_RGB,
	BI_RLE4,
	BI_RLE8,
	type BitmapFileHeader,
	type BitmapInfoHeader,
	type DecodedBitmap,
	FILE_HEADER_SIZE,
	INFO_HEADER_SIZE,
	type PaletteColor,
	rowStride,
	SUPPORTED_DIB_SIZES,
} from './types'

const OPAQUE_BLACK: PaletteColor = { r: 0, g: 0, b: 0, a: 255 }

/**
 * Read and validate the 14-byte file header
 */
export function readFileHeader(data: Uint8Array): BitmapFileHeader {
	if (data.length < 2 || data[0] !== 0x42 || data[1] !== 0x4d) {
		throw new CodecError('InvalidSignature', 'Invalid BMP signature')
	}
	ensureAvailable(data, 0, FILE_HEADER_SIZE, 'BMP file header')

	const view = toDataView(data)
	return {
		signature: view.getUint16(0, true),
		fileSize: view.getUint32(2, true),
		reserved1: view.getUint16(6, true),
		reserved2: view.getUint16(8, true),
		pixelOffset: view.getUint32(10, true),
	}
}

/**
 * Read the leading BITMAPINFOHEADER fields of a DIB header at offset
 *
 * Also used on the headerless DIBs stored inside icons.
 */
export function readInfoHeader(data: Uint8Array, offset = 0): BitmapInfoHeader {
	ensureAvailable(data, offset, INFO_HEADER_SIZE, 'DIB header')

	const view = toDataView(data)
	const header: BitmapInfoHeader = {
		size: view.getUint32(offset, true),
		width: view.getInt32(offset + 4, true),
		height: view.getInt32(offset + 8, true),
		planes: view.getUint16(offset + 12, true),
		bitCount: view.getUint16(offset + 14, true),
		compression: view.getUint32(offset + 16, true),
		sizeImage: view.getUint32(offset + 20, true),
		xPelsPerMeter: view.getInt32(offset + 24, true),
		yPelsPerMeter: view.getInt32(offset + 28, true),
		colorsUsed: view.getUint32(offset + 32, true),
		colorsImportant: view.getUint32(offset + 36, true),
	}

	if (header.width <= 0) {
		throw new CodecError('InvalidDimensions', `Invalid BMP width: ${header.width}`)
	}
	if (header.height === 0) {
		throw new CodecError('InvalidDimensions', 'Invalid BMP height: 0')
	}

	return header
}

function validateInfoHeader(header: BitmapInfoHeader): void {
	if (!SUPPORTED_DIB_SIZES.includes(header.size)) {
		throw new CodecError('UnsupportedDibHeaderSize', `Unsupported DIB header size: ${header.size}`)
	}

	if (header.compression !== BI_RGB) {
		if (header.compression === BI_RLE8 || header.compression === BI_RLE4) {
			throw new CodecError('UnsupportedCompression', 'RLE compression not supported')
		}
		if (header.compression === BI_BITFIELDS) {
			throw new CodecError('UnsupportedCompression', 'BITFIELDS compression not supported')
		}
		throw new CodecError('UnsupportedCompression', `Unsupported compression: ${header.compression}`)
	}
}

function bmpColorModel(bitCount: number): ColorModel {
	if (bitCount <= 8) return 'indexed'
	return bitCount === 32 ? 'rgba' : 'rgb'
}

/**
 * Read dimensions and color model from the BMP headers
 */
export function readBmpInfo(data: Uint8Array): ImageInfo {
	readFileHeader(data)
	const info = readInfoHeader(data, FILE_HEADER_SIZE)
	validateInfoHeader(info)

	return {
		format: 'bmp',
		width: info.width,
		height: Math.abs(info.height),
		bitCount: info.bitCount,
		colorModel: bmpColorModel(info.bitCount),
	}
}

/**
 * Read a BGRX color table, alpha forced opaque
 */
function readPalette(data: Uint8Array, offset: number, count: number): PaletteColor[] {
	ensureAvailable(data, offset, count * 4, 'BMP color table')

	const palette: PaletteColor[] = []
	for (let i = 0; i < count; i++) {
		const p = offset + i * 4
		palette.push({ r: data[p + 2]!, g: data[p + 1]!, b: data[p]!, a: 255 })
	}
	return palette
}

interface RowLayout {
	offset: number
	stride: number
	height: number
	topDown: boolean
}

/**
 * Visit stored rows in file order with the image row they belong to
 */
function forEachRow(
	data: Uint8Array,
	layout: RowLayout,
	visit: (row: Uint8Array, y: number) => void
): void {
	const { offset, stride, height, topDown } = layout
	for (let i = 0; i < height; i++) {
		const start = offset + i * stride
		visit(data.subarray(start, start + stride), topDown ? i : height - 1 - i)
	}
}

/**
 * Check the whole pixel block is present before any output is allocated
 */
function ensurePixelData(data: Uint8Array, layout: RowLayout): void {
	ensureAvailable(data, layout.offset, layout.stride * layout.height, 'BMP pixel data')
}

function decodeIndexedRows(
	data: Uint8Array,
	layout: RowLayout,
	width: number,
	bitCount: number
): Uint8Array {
	const indices = new Uint8Array(width * layout.height)

	forEachRow(data, layout, (row, y) => {
		const out = y * width
		switch (bitCount) {
			case 1:
				for (let x = 0; x < width; x++) {
					indices[out + x] = (row[x >> 3]! >> (7 - (x & 7))) & 1
				}
				break
			case 4:
				for (let x = 0; x < width; x++) {
					const byte = row[x >> 1]!
					indices[out + x] = x & 1 ? byte & 0x0f : byte >> 4
				}
				break
			default:
				indices.set(row.subarray(0, width), out)
		}
	})

	return indices
}

function decodeDirectRows(
	data: Uint8Array,
	layout: RowLayout,
	width: number,
	bitCount: number
): Uint8Array {
	const output = new Uint8Array(width * layout.height * 4)

	forEachRow(data, layout, (row, y) => {
		const out = y * width * 4
		if (bitCount === 32) {
			// BGRA -> RGBA, alpha as stored
			output.set(row.subarray(0, width * 4), out)
			for (let i = out; i < out + width * 4; i += 4) {
				const b = output[i]!
				output[i] = output[i + 2]!
				output[i + 2] = b
			}
			return
		}

		for (let x = 0; x < width; x++) {
			const src = x * 3
			const dst = out + x * 4
			output[dst] = row[src + 2]!
			output[dst + 1] = row[src + 1]!
			output[dst + 2] = row[src]!
			output[dst + 3] = 255
		}
	})

	return output
}

/**
 * Decode a BMP file to its pixel rows and color model
 */
export function decodeBitmap(data: Uint8Array): DecodedBitmap {
	const fileHeader = readFileHeader(data)
	const info = readInfoHeader(data, FILE_HEADER_SIZE)
	validateInfoHeader(info)

	// Negative height marks a top-down bitmap
	const topDown = info.height < 0
	const width = info.width
	const height = Math.abs(info.height)
	const layout: RowLayout = {
		offset: fileHeader.pixelOffset,
		stride: rowStride(width, info.bitCount),
		height,
		topDown,
	}

	switch (info.bitCount) {
		case 1:
		case 4:
		case 8: {
			const colorCount = info.colorsUsed || 1 << info.bitCount
			const palette = readPalette(data, FILE_HEADER_SIZE + info.size, colorCount)
			ensurePixelData(data, layout)
			const indices = decodeIndexedRows(data, layout, width, info.bitCount)
			return { kind: 'indexed', width, height, palette, indices }
		}

		case 16:
			throw new CodecError('UnsupportedColorDepth', '16-bit BMP pixel data is not supported')

		case 24:
		case 32:
			ensurePixelData(data, layout)
			return { kind: 'direct', width, height, data: decodeDirectRows(data, layout, width, info.bitCount) }

		default:
			throw new CodecError('UnsupportedColorDepth', `Unsupported bits per pixel: ${info.bitCount}`)
	}
}

/**
 * Expand a decoded bitmap to RGBA
 *
 * Indices past the end of the palette come out opaque black.
 */
export function bitmapToImageData(bitmap: DecodedBitmap): ImageData {
	const { width, height } = bitmap
	if (bitmap.kind === 'direct') {
		return { width, height, data: bitmap.data }
	}

	const data = new Uint8Array(width * height * 4)
	for (let i = 0; i < bitmap.indices.length; i++) {
		const color = bitmap.palette[bitmap.indices[i]!] ?? OPAQUE_BLACK
		data[i * 4] = color.r
		data[i * 4 + 1] = color.g
		data[i * 4 + 2] = color.b
		data[i * 4 + 3] = color.a
	}
	return { width, height, data }
}

/**
 * Decode BMP file to ImageData
 */
export function decodeBmp(data: Uint8Array): ImageData {
	return bitmapToImageData(decodeBitmap(data))
}
