import type { ImageData, ImageDecoder, ImageInfo } from '@icoframe/core'
import { decodePng, readPngInfo } from './decoder'

/**
 * PNG codec implementation
 */
export const PngCodec: ImageDecoder = {
	format: 'png',

	decode(data: Uint8Array): ImageData {
		return decodePng(data)
	},

	info(data: Uint8Array): ImageInfo {
		return readPngInfo(data)
	},
}
