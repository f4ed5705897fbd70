import { afterEach, describe, expect, test } from 'vitest'
import {
	CodecError,
	createImageData,
	decodeImage,
	detectFormat,
	getDecoder,
	getPixel,
	type ImageData,
	type ImageDecoder,
	isCodecError,
	readImageInfo,
	registerDecoder,
	registeredFormats,
	unregisterDecoder,
} from './index'

describe('core', () => {
	test('types export correctly', () => {
		const img: ImageData = { width: 1, height: 1, data: new Uint8Array(4) }
		expect(img.width).toBe(1)
	})

	test('createImageData starts fully transparent', () => {
		const img = createImageData(3, 2)
		expect(img.data.length).toBe(3 * 2 * 4)
		expect(img.data.every((v) => v === 0)).toBe(true)
	})

	test('getPixel reads RGBA at (x, y)', () => {
		const img: ImageData = {
			width: 2,
			height: 2,
			data: new Uint8Array([0, 0, 0, 0, 10, 20, 30, 40, 1, 2, 3, 4, 0, 0, 0, 0]),
		}
		expect(getPixel(img, 1, 0)).toEqual([10, 20, 30, 40])
		expect(getPixel(img, 0, 1)).toEqual([1, 2, 3, 4])
	})

	test('getPixel rejects coordinates outside the image', () => {
		const img = createImageData(2, 2)
		expect(() => getPixel(img, 2, 0)).toThrow(RangeError)
		expect(() => getPixel(img, 0, -1)).toThrow(RangeError)
	})
})

describe('CodecError', () => {
	test('carries its code and cause', () => {
		const cause = new Error('inner')
		const err = new CodecError('PngDecode', 'outer', { cause })
		expect(err).toBeInstanceOf(Error)
		expect(err.name).toBe('CodecError')
		expect(err.code).toBe('PngDecode')
		expect(err.message).toBe('outer')
		expect(err.cause).toBe(cause)
	})

	test('isCodecError narrows by code', () => {
		const err = new CodecError('TruncatedData', 'short')
		expect(isCodecError(err)).toBe(true)
		expect(isCodecError(err, 'TruncatedData')).toBe(true)
		expect(isCodecError(err, 'InvalidSignature')).toBe(false)
		expect(isCodecError(new Error('plain'))).toBe(false)
	})
})

describe('detectFormat', () => {
	test('detects png, bmp and ico', () => {
		expect(detectFormat(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))).toBe('png')
		expect(detectFormat(new Uint8Array([0x42, 0x4d, 0, 0]))).toBe('bmp')
		expect(detectFormat(new Uint8Array([0, 0, 1, 0, 2, 0]))).toBe('ico')
	})

	test('ico with zero images is not detected', () => {
		expect(detectFormat(new Uint8Array([0, 0, 1, 0, 0, 0]))).toBeNull()
	})

	test('unknown data', () => {
		expect(detectFormat(new Uint8Array([1, 2, 3]))).toBeNull()
		expect(detectFormat(new Uint8Array(0))).toBeNull()
	})
})

describe('decoder registry', () => {
	const fake: ImageDecoder = {
		format: 'bmp',
		decode: () => ({ width: 1, height: 1, data: new Uint8Array([1, 2, 3, 4]) }),
	}

	afterEach(() => {
		unregisterDecoder('bmp')
	})

	test('registration is idempotent', () => {
		expect(registerDecoder(fake)).toBe(true)
		expect(registerDecoder(fake)).toBe(false)
		expect(registeredFormats()).toEqual(['bmp'])
		expect(getDecoder('bmp')).toBe(fake)
	})

	test('a different decoder replaces the registered one', () => {
		const other: ImageDecoder = { ...fake }
		registerDecoder(fake)
		expect(registerDecoder(other)).toBe(true)
		expect(getDecoder('bmp')).toBe(other)
	})

	test('decodeImage dispatches on detected format', () => {
		registerDecoder(fake)
		const image = decodeImage(new Uint8Array([0x42, 0x4d]))
		expect(Array.from(image.data)).toEqual([1, 2, 3, 4])
	})

	test('decodeImage fails without a decoder', () => {
		expect(() => decodeImage(new Uint8Array([0x42, 0x4d]))).toThrow(
			'No decoder registered for format: bmp'
		)
		expect(() => decodeImage(new Uint8Array([7]))).toThrow('Unknown image format')
	})

	test('readImageInfo uses the decoder header reader', () => {
		registerDecoder({
			...fake,
			info: () => ({ format: 'bmp', width: 3, height: 2, bitCount: 8, colorModel: 'indexed' }),
		})
		expect(readImageInfo(new Uint8Array([0x42, 0x4d]))).toEqual({
			format: 'bmp',
			width: 3,
			height: 2,
			bitCount: 8,
			colorModel: 'indexed',
		})
	})

	test('readImageInfo fails when the decoder has no header reader', () => {
		registerDecoder(fake)
		expect(() => readImageInfo(new Uint8Array([0x42, 0x4d]))).toThrow(
			'Decoder for bmp cannot read headers only'
		)
	})
})
