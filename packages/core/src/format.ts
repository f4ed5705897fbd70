import type { ImageFormat } from './types'

interface Magic {
	bytes: number[]
	mask?: number[]
	offset?: number
}

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ImageFormat, Magic> = {
	bmp: { bytes: [0x42, 0x4d] }, // "BM"
	png: { bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
	// reserved = 0, type = 1 (icon); the count byte that follows must be non-zero
	ico: { bytes: [0x00, 0x00, 0x01, 0x00] },
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: Magic): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	for (let i = 0; i < magic.bytes.length; i++) {
		const byte = data[offset + i] ?? 0
		const expected = magic.bytes[i] ?? 0
		const mask = magic.mask?.[i] ?? 0xff
		if ((byte & mask) !== (expected & mask)) return false
	}
	return true
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.png)) return 'png'
	if (matchMagic(data, MAGIC_BYTES.bmp)) return 'bmp'
	if (matchMagic(data, MAGIC_BYTES.ico) && data.length >= 6 && (data[4] || data[5])) return 'ico'
	return null
}
