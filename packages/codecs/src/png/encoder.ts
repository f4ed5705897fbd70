import type { ImageData } from '@icoframe/core'
import { PNG } from 'pngjs'

/**
 * Encode ImageData as an RGBA PNG
 */
export function encodePng(image: ImageData): Uint8Array {
	const png = new PNG({ width: image.width, height: image.height })
	png.data = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength)
	return new Uint8Array(PNG.sync.write(png, { colorType: 6 }))
}
