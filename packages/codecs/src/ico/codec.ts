import type { ImageData, ImageDecoder, ImageInfo } from '@icoframe/core'
import { decodeIco, readIcoInfo } from './decoder'

/**
 * ICO codec implementation (largest frame)
 */
export const IcoCodec: ImageDecoder = {
	format: 'ico',

	decode(data: Uint8Array): ImageData {
		return decodeIco(data)
	},

	info(data: Uint8Array): ImageInfo {
		return readIcoInfo(data)
	},
}
