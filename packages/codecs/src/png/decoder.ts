import { CodecError, type ColorModel, type ImageData, type ImageInfo } from '@icoframe/core'
import { PNG } from 'pngjs'
import { ensureAvailable, toDataView } from '../binary'
import { PNG_SIGNATURE } from './types'

// IHDR color type -> channels per pixel and color model
const COLOR_TYPES: Record<number, [channels: number, model: ColorModel]> = {
	0: [1, 'gray'],
	2: [3, 'rgb'],
	3: [1, 'indexed'],
	4: [2, 'gray-alpha'],
	6: [4, 'rgba'],
}

/**
 * Decode PNG to ImageData (8-bit RGBA, any source color type)
 */
export function decodePng(data: Uint8Array): ImageData {
	const png = PNG.sync.read(Buffer.from(data.buffer, data.byteOffset, data.byteLength))
	return {
		width: png.width,
		height: png.height,
		data: new Uint8Array(png.data.buffer, png.data.byteOffset, png.data.byteLength),
	}
}

/**
 * Read dimensions and color model from the IHDR chunk
 */
export function readPngInfo(data: Uint8Array): ImageInfo {
	if (!PNG_SIGNATURE.every((byte, i) => data[i] === byte)) {
		throw new CodecError('InvalidSignature', 'Invalid PNG signature')
	}
	// signature + chunk length + "IHDR" + width, height, bit depth, color type
	ensureAvailable(data, 0, 26, 'PNG header')

	const view = toDataView(data)
	if (String.fromCharCode(data[12]!, data[13]!, data[14]!, data[15]!) !== 'IHDR') {
		throw new CodecError('PngDecode', 'PNG does not start with an IHDR chunk')
	}

	const bitDepth = data[24]!
	const colorType = data[25]!
	const layout = COLOR_TYPES[colorType]
	if (!layout) {
		throw new CodecError('PngDecode', `Unknown PNG color type: ${colorType}`)
	}

	return {
		format: 'png',
		width: view.getUint32(16),
		height: view.getUint32(20),
		bitCount: bitDepth * layout[0],
		colorModel: layout[1],
	}
}
