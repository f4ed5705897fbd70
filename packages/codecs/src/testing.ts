/**
 * Byte-level builders for ICO and icon DIB fixtures
 */

import { rowStride } from './bmp/types'
import { ICONDIR_SIZE, ICONDIRENTRY_SIZE } from './ico/types'

export type Bgr = [b: number, g: number, r: number]

export interface IconDibSpec {
	width: number
	height: number // Image height, negative for top-down rows
	bitCount: number
	palette?: Bgr[]
	colorsUsed?: number
	xorRows: number[][] // Stored order, unpadded
	andRows: number[][] // Stored order, unpadded
	headerSize?: number // 40 unless a V4 (108) or V5 (124) header is wanted
}

/**
 * Headerless DIB as stored in an icon: info header (doubled height), color table,
 * XOR rows, AND rows
 */
export function iconDib(spec: IconDibSpec): Uint8Array {
	const palette = spec.palette ?? []
	const xorStride = rowStride(spec.width, spec.bitCount)
	const andStride = rowStride(spec.width, 1)
	const headerSize = spec.headerSize ?? 40
	const paletteOffset = headerSize
	const xorOffset = paletteOffset + palette.length * 4
	const andOffset = xorOffset + spec.xorRows.length * xorStride
	const out = new Uint8Array(andOffset + spec.andRows.length * andStride)
	const view = new DataView(out.buffer)

	view.setUint32(0, headerSize, true)
	view.setInt32(4, spec.width, true)
	view.setInt32(8, spec.height * 2, true)
	view.setUint16(12, 1, true)
	view.setUint16(14, spec.bitCount, true)
	view.setUint32(32, spec.colorsUsed ?? 0, true)

	palette.forEach(([b, g, r], i) => {
		out.set([b, g, r, 0], paletteOffset + i * 4)
	})
	spec.xorRows.forEach((row, i) => {
		out.set(row, xorOffset + i * xorStride)
	})
	spec.andRows.forEach((row, i) => {
		out.set(row, andOffset + i * andStride)
	})
	return out
}

export interface IcoEntrySpec {
	width: number // Pixels, 256 is stored as 0
	height: number
	bitCount?: number
	data: Uint8Array
}

export interface IcoFileOptions {
	type?: number
	count?: number // Override the header count
	order?: number[] // Payload placement order, directory order when omitted
}

/**
 * Assemble an ICO file from its entries
 */
export function icoFile(entries: IcoEntrySpec[], options: IcoFileOptions = {}): Uint8Array {
	const order = options.order ?? entries.map((_, i) => i)
	const dataStart = ICONDIR_SIZE + entries.length * ICONDIRENTRY_SIZE
	const total = entries.reduce((sum, entry) => sum + entry.data.length, dataStart)
	const out = new Uint8Array(total)
	const view = new DataView(out.buffer)

	view.setUint16(0, 0, true)
	view.setUint16(2, options.type ?? 1, true)
	view.setUint16(4, options.count ?? entries.length, true)

	let offset = dataStart
	for (const index of order) {
		const entry = entries[index]
		if (!entry) throw new RangeError(`No entry ${index}`)

		const dir = ICONDIR_SIZE + index * ICONDIRENTRY_SIZE
		view.setUint8(dir, entry.width & 0xff)
		view.setUint8(dir + 1, entry.height & 0xff)
		view.setUint16(dir + 4, 1, true)
		view.setUint16(dir + 6, entry.bitCount ?? 32, true)
		view.setUint32(dir + 8, entry.data.length, true)
		view.setUint32(dir + 12, offset, true)

		out.set(entry.data, offset)
		offset += entry.data.length
	}
	return out
}
