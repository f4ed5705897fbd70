/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255), not premultiplied
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Formats the built-in decoders understand
 */
export type ImageFormat = 'bmp' | 'png' | 'ico'

/**
 * How the stored pixels describe color, before expansion to RGBA
 */
export type ColorModel = 'indexed' | 'gray' | 'gray-alpha' | 'rgb' | 'rgba'

/**
 * Header-only description of an image
 */
export interface ImageInfo {
	readonly format: ImageFormat
	readonly width: number
	readonly height: number
	readonly bitCount: number // Bits per stored pixel
	readonly colorModel: ColorModel
}

/**
 * Decode-only codec
 */
export interface ImageDecoder {
	readonly format: ImageFormat
	decode(data: Uint8Array): ImageData
	/** Read dimensions and color model from the headers without decoding pixels */
	info?(data: Uint8Array): ImageInfo
}

export type Rgba = [r: number, g: number, b: number, a: number]

/**
 * Create empty (fully transparent) ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * Get pixel at (x, y)
 */
export function getPixel(image: ImageData, x: number, y: number): Rgba {
	if (x < 0 || y < 0 || x >= image.width || y >= image.height) {
		throw new RangeError(`Pixel (${x}, ${y}) outside ${image.width}x${image.height} image`)
	}
	const idx = (y * image.width + x) * 4
	const px = image.data.subarray(idx, idx + 4)
	return [px[0] ?? 0, px[1] ?? 0, px[2] ?? 0, px[3] ?? 0]
}
