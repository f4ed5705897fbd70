/**
 * Failure kinds reported by the decoders
 */
export type CodecErrorCode =
	| 'InvalidContainerHeader'
	| 'TruncatedData'
	| 'UnsupportedDibHeaderSize'
	| 'UnsupportedCompression'
	| 'UnsupportedColorDepth'
	| 'InvalidDimensions'
	| 'InvalidSignature'
	| 'PngDecode'

/**
 * Error thrown by every codec in this project
 *
 * `code` identifies the failure; for `PngDecode` the PNG decoder's own error is kept
 * untouched as `cause`.
 */
export class CodecError extends Error {
	override readonly name = 'CodecError'

	constructor(
		readonly code: CodecErrorCode,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options)
	}
}

/**
 * Narrow an unknown value to a CodecError, optionally of one code
 */
export function isCodecError(err: unknown, code?: CodecErrorCode): err is CodecError {
	return err instanceof CodecError && (code === undefined || err.code === code)
}
