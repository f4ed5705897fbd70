import { CodecError } from '@icoframe/core'

/**
 * Little-endian view over a byte slice (respects byteOffset of subarrays)
 */
export function toDataView(data: Uint8Array): DataView {
	return new DataView(data.buffer, data.byteOffset, data.byteLength)
}

/**
 * Throw TruncatedData unless [offset, offset + length) lies inside data
 */
export function ensureAvailable(data: Uint8Array, offset: number, length: number, what: string): void {
	if (offset < 0 || length < 0 || offset + length > data.length) {
		throw new CodecError(
			'TruncatedData',
			`Truncated ${what}: need bytes ${offset}..${offset + length}, have ${data.length}`
		)
	}
}
