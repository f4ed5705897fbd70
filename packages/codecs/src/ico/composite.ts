import { CodecError, createImageData, type ImageData } from '@icoframe/core'
import type { DecodedBitmap } from '../bmp/types'
import { bitmapToImageData } from '../bmp/decoder'

// Mask palette index of a transparent pixel; index 0 is opaque
const TRANSPARENT_INDEX = 1

/**
 * Combine an icon's color bitmap with its AND mask
 *
 * The result starts fully transparent; the XOR pixel is copied wherever the mask is
 * opaque.
 */
export function applyAndMask(xor: DecodedBitmap, mask: DecodedBitmap): ImageData {
	if (mask.kind !== 'indexed' || mask.palette.length !== 2) {
		throw new CodecError('InvalidDimensions', 'AND mask must be a two color indexed bitmap')
	}
	if (mask.width !== xor.width || mask.height !== xor.height) {
		throw new CodecError(
			'InvalidDimensions',
			`AND mask is ${mask.width}x${mask.height}, image is ${xor.width}x${xor.height}`
		)
	}

	const color = bitmapToImageData(xor)
	const output = createImageData(xor.width, xor.height)

	for (let i = 0; i < mask.indices.length; i++) {
		if (mask.indices[i] === TRANSPARENT_INDEX) continue
		output.data.set(color.data.subarray(i * 4, i * 4 + 4), i * 4)
	}

	return output
}
