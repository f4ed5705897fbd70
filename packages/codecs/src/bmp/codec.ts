import type { ImageData, ImageDecoder, ImageInfo } from '@icoframe/core'
import { decodeBmp, readBmpInfo } from './decoder'

/**
 * BMP codec implementation
 */
export const BmpCodec: ImageDecoder = {
	format: 'bmp',

	decode(data: Uint8Array): ImageData {
		return decodeBmp(data)
	},

	info(data: Uint8Array): ImageInfo {
		return readBmpInfo(data)
	},
}
