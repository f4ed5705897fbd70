import { detectFormat } from './format'
import type { ImageData, ImageDecoder, ImageFormat, ImageInfo } from './types'

const decoders = new Map<ImageFormat, ImageDecoder>()

/**
 * Register a decoder for its format
 *
 * Idempotent: registering the same decoder again is a no-op. A different decoder for an
 * already registered format replaces the previous one.
 * Returns true when the registry changed.
 */
export function registerDecoder(decoder: ImageDecoder): boolean {
	if (decoders.get(decoder.format) === decoder) return false
	decoders.set(decoder.format, decoder)
	return true
}

/**
 * Remove a registered decoder
 */
export function unregisterDecoder(format: ImageFormat): boolean {
	return decoders.delete(format)
}

/**
 * Look up the decoder registered for a format
 */
export function getDecoder(format: ImageFormat): ImageDecoder | undefined {
	return decoders.get(format)
}

/**
 * Formats with a registered decoder
 */
export function registeredFormats(): ImageFormat[] {
	return [...decoders.keys()]
}

function decoderFor(data: Uint8Array): ImageDecoder {
	const format = detectFormat(data)
	if (!format) {
		throw new Error('Unknown image format')
	}
	const decoder = decoders.get(format)
	if (!decoder) {
		throw new Error(`No decoder registered for format: ${format}`)
	}
	return decoder
}

/**
 * Decode image bytes with the decoder registered for their detected format
 */
export function decodeImage(data: Uint8Array): ImageData {
	return decoderFor(data).decode(data)
}

/**
 * Read image headers with the decoder registered for their detected format
 */
export function readImageInfo(data: Uint8Array): ImageInfo {
	const decoder = decoderFor(data)
	if (!decoder.info) {
		throw new Error(`Decoder for ${decoder.format} cannot read headers only`)
	}
	return decoder.info(data)
}
