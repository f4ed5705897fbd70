import { registerDecoder } from '@icoframe/core'
import { BmpCodec } from './bmp/codec'
import { IcoCodec } from './ico/codec'
import { PngCodec } from './png/codec'

/**
 * Register the BMP, PNG and ICO decoders with the core registry
 *
 * Call once during setup; calling again changes nothing. Importing this package has no
 * registration side effects.
 */
export function registerBuiltinDecoders(): void {
	for (const decoder of [BmpCodec, PngCodec, IcoCodec]) {
		registerDecoder(decoder)
	}
}
