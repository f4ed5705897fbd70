import { CodecError } from '@icoframe/core'
import { ensureAvailable, toDataView } from '../binary'
import { readInfoHeader } from '../bmp/decoder'
import { FILE_HEADER_SIZE, INFO_HEADER_SIZE, rowStride } from '../bmp/types'
import { entrySize, type IconDirEntry, type SynthesizedBitmaps } from './types'

// Mask palette: index 0 black, index 1 white, both opaque (BGRX)
const MASK_PALETTE = new Uint8Array([0x00, 0x00, 0x00, 0xff, 0xff, 0xff, 0xff, 0xff])

function writeFileHeader(view: DataView, fileSize: number, pixelOffset: number): void {
	view.setUint8(0, 0x42) // B
	view.setUint8(1, 0x4d) // M
	view.setUint32(2, fileSize, true)
	view.setUint16(6, 0, true)
	view.setUint16(8, 0, true)
	view.setUint32(10, pixelOffset, true)
}

/**
 * Rebuild the XOR and AND bitmaps of an icon DIB as two complete BMP files
 *
 * An icon DIB is an info header, an optional color table, the XOR rows and the AND rows,
 * with the header height counting both row blocks. Both results decode with decodeBitmap.
 */
export function synthesizeBitmaps(entry: IconDirEntry, payload: Uint8Array): SynthesizedBitmaps {
	const info = readInfoHeader(payload)
	if (info.size < INFO_HEADER_SIZE) {
		throw new CodecError('UnsupportedDibHeaderSize', `Unsupported DIB header size: ${info.size}`)
	}
	ensureAvailable(payload, 0, info.size, 'icon DIB header')

	const body = payload.subarray(info.size)
	const width = entrySize(entry.width)
	const height = entrySize(entry.height)
	const imageHeight = Math.trunc(info.height / 2)

	let paletteSize = info.colorsUsed * 4
	if (paletteSize === 0 && info.bitCount < 16) {
		paletteSize = (1 << info.bitCount) * 4
	}

	const xorSize = paletteSize + rowStride(width, info.bitCount) * height
	ensureAvailable(body, 0, xorSize, 'icon XOR bitmap')

	// XOR: original header with the height halved, color table and rows verbatim
	const xor = new Uint8Array(FILE_HEADER_SIZE + info.size + xorSize)
	const xorView = toDataView(xor)
	writeFileHeader(xorView, xor.length, FILE_HEADER_SIZE + info.size + paletteSize)
	xor.set(payload.subarray(0, info.size), FILE_HEADER_SIZE)
	xorView.setInt32(FILE_HEADER_SIZE + 8, imageHeight, true)
	xor.set(body.subarray(0, xorSize), FILE_HEADER_SIZE + info.size)

	// AND: fresh 1 bpp header, fixed black/white palette, the remaining bytes as rows
	const maskRows = body.subarray(xorSize)
	const maskOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE + MASK_PALETTE.length
	const and = new Uint8Array(maskOffset + maskRows.length)
	const andView = toDataView(and)
	writeFileHeader(andView, and.length, maskOffset)
	andView.setUint32(FILE_HEADER_SIZE, INFO_HEADER_SIZE, true)
	andView.setInt32(FILE_HEADER_SIZE + 4, info.width, true)
	andView.setInt32(FILE_HEADER_SIZE + 8, imageHeight, true)
	andView.setUint16(FILE_HEADER_SIZE + 12, 1, true) // planes
	andView.setUint16(FILE_HEADER_SIZE + 14, 1, true) // bit count
	and.set(MASK_PALETTE, FILE_HEADER_SIZE + INFO_HEADER_SIZE)
	and.set(maskRows, maskOffset)

	return { xor, and }
}
