/**
 * Error kinds raised by codecs.
 *
 * - `format`: the bytes violate the container's structure (bad signature,
 *   truncation, inconsistent dimensions, out-of-range palette index, a size
 *   that overflows or exceeds the allocation ceiling).
 * - `unsupported`: the bytes are well-formed but use a variant the codec does
 *   not implement. Callers may skip such inputs instead of treating them as corrupt.
 * - `io`: the underlying byte source or sink failed. The original error is kept as `cause`.
 */
export type CodecErrorKind = 'format' | 'unsupported' | 'io'

export abstract class CodecError extends Error {
	abstract readonly kind: CodecErrorKind

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = new.target.name
	}
}

export class FormatError extends CodecError {
	readonly kind = 'format'
}

export class UnsupportedError extends CodecError {
	readonly kind = 'unsupported'
}

export class IoError extends CodecError {
	readonly kind = 'io'

	constructor(message: string, cause: unknown) {
		super(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause })
	}
}

export function isCodecError(err: unknown): err is CodecError {
	return err instanceof CodecError
}
