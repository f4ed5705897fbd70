import { CodecError, type ImageData, type ImageInfo } from '@icoframe/core'
import { ensureAvailable, toDataView } from '../binary'
import { decodeBitmap, readInfoHeader } from '../bmp/decoder'
import { decodePng, readPngInfo } from '../png/decoder'
import { applyAndMask } from './composite'
import { synthesizeBitmaps } from './dib'
import {
	type DecodeIcoOptions,
	entrySize,
	ICO_TYPE,
	ICONDIR_SIZE,
	ICONDIRENTRY_SIZE,
	type IcoImage,
	type IconDir,
	type IconDirEntry,
} from './types'

/**
 * Read and validate the ICONDIR header
 */
export function readIconDir(data: Uint8Array): IconDir {
	ensureAvailable(data, 0, ICONDIR_SIZE, 'ICO header')

	const view = toDataView(data)
	const header: IconDir = {
		reserved: view.getUint16(0, true),
		type: view.getInt16(2, true),
		count: view.getInt16(4, true),
	}

	if (header.type !== ICO_TYPE) {
		throw new CodecError('InvalidContainerHeader', `Invalid ICO file: image type should be 1, got ${header.type}`)
	}
	if (header.count <= 0) {
		throw new CodecError('InvalidContainerHeader', `Invalid ICO file: image count ${header.count}`)
	}

	return header
}

/**
 * Read count ICONDIRENTRY records following the header
 */
export function readDirectory(data: Uint8Array, count: number): IconDirEntry[] {
	ensureAvailable(data, ICONDIR_SIZE, count * ICONDIRENTRY_SIZE, 'ICO directory')

	const view = toDataView(data)
	const entries: IconDirEntry[] = []
	for (let i = 0; i < count; i++) {
		const offset = ICONDIR_SIZE + i * ICONDIRENTRY_SIZE
		entries.push({
			width: view.getUint8(offset),
			height: view.getUint8(offset + 1),
			colorCount: view.getUint8(offset + 2),
			reserved: view.getUint8(offset + 3),
			planes: view.getUint16(offset + 4, true),
			bitCount: view.getUint16(offset + 6, true),
			bytesInRes: view.getUint32(offset + 8, true),
			imageOffset: view.getUint32(offset + 12, true),
		})
	}
	return entries
}

/**
 * Slice an entry's image data out of the bytes that follow the directory
 *
 * imageOffset is absolute, buffer starts right after the directory table.
 */
export function locatePayload(entry: IconDirEntry, buffer: Uint8Array, count: number): Uint8Array {
	const offset = entry.imageOffset - (ICONDIR_SIZE + ICONDIRENTRY_SIZE * count)
	ensureAvailable(buffer, offset, entry.bytesInRes, 'ICO image data')
	return buffer.subarray(offset, offset + entry.bytesInRes)
}

/**
 * Parse ICO file structure
 */
export function parseIco(data: Uint8Array): IcoImage {
	const header = readIconDir(data)
	const entries = readDirectory(data, header.count)
	const buffer = data.subarray(ICONDIR_SIZE + ICONDIRENTRY_SIZE * header.count)

	return {
		entries,
		images: entries.map((entry) => locatePayload(entry, buffer, header.count)),
	}
}

/**
 * PNG entries carry "PNG" in bytes 1-3, everything else is a BMP DIB
 */
export function isPngPayload(data: Uint8Array): boolean {
	return data.length >= 4 && data[1] === 0x50 && data[2] === 0x4e && data[3] === 0x47
}

/**
 * Decode one icon DIB: XOR and AND bitmaps through the BMP decoder, then composite
 */
export function decodeIconDib(entry: IconDirEntry, data: Uint8Array): ImageData {
	const { xor, and } = synthesizeBitmaps(entry, data)
	return applyAndMask(decodeBitmap(xor), decodeBitmap(and))
}

/**
 * Decode a single ICO image (PNG or BMP DIB)
 */
export function decodeIcoImage(
	data: Uint8Array,
	entry: IconDirEntry,
	options: DecodeIcoOptions = {}
): ImageData {
	if (!isPngPayload(data)) {
		return decodeIconDib(entry, data)
	}

	const decode = options.decodePng ?? decodePng
	try {
		return decode(data)
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err)
		throw new CodecError('PngDecode', `PNG image in ICO failed to decode: ${message}`, { cause: err })
	}
}

/**
 * Decode every image in an ICO, in directory order
 */
export function decodeIcoFrames(data: Uint8Array, options: DecodeIcoOptions = {}): ImageData[] {
	const ico = parseIco(data)
	return ico.entries.map((entry, i) => decodeIcoImage(ico.images[i]!, entry, options))
}

/**
 * Index of the entry with the most pixels (first one on ties)
 */
export function largestEntryIndex(entries: IconDirEntry[]): number {
	let largestIdx = 0
	let largestSize = 0

	for (let i = 0; i < entries.length; i++) {
		const entry = entries[i]!
		const size = entrySize(entry.width) * entrySize(entry.height)

		if (size > largestSize) {
			largestSize = size
			largestIdx = i
		}
	}

	return largestIdx
}

/**
 * Decode ICO to ImageData
 * Returns the largest image in the ICO file
 */
export function decodeIco(data: Uint8Array, options: DecodeIcoOptions = {}): ImageData {
	const ico = parseIco(data)
	const index = largestEntryIndex(ico.entries)
	return decodeIcoImage(ico.images[index]!, ico.entries[index]!, options)
}

/**
 * Describe the largest image from the directory and its payload header
 *
 * DIB entries always carry an AND mask, so they report rgba.
 */
export function readIcoInfo(data: Uint8Array): ImageInfo {
	const ico = parseIco(data)
	const payload = ico.images[largestEntryIndex(ico.entries)]!

	if (isPngPayload(payload)) {
		return { ...readPngInfo(payload), format: 'ico' }
	}

	const info = readInfoHeader(payload)
	return {
		format: 'ico',
		width: info.width,
		height: Math.abs(Math.trunc(info.height / 2)),
		bitCount: info.bitCount,
		colorModel: 'rgba',
	}
}
