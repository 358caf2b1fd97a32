import { CodecError, FormatError, IoError } from './errors'

/**
 * Positional byte source supplied by the caller.
 *
 * `read` may return fewer than `length` bytes only at the end of the data.
 * The returned array may be a view into the source's own storage.
 */
export interface ByteSource {
	readonly size: number
	read(position: number, length: number): Uint8Array
}

/**
 * Byte sink supplied by the caller.
 *
 * A chunk is only valid during the `write` call; sinks that keep data must copy it.
 */
export interface ByteSink {
	write(chunk: Uint8Array): void
}

/**
 * Wrap an in-memory buffer as a ByteSource
 */
export function bufferSource(data: Uint8Array): ByteSource {
	return {
		size: data.length,
		read(position: number, length: number): Uint8Array {
			return data.subarray(position, Math.min(data.length, position + length))
		},
	}
}

/**
 * Sink that collects everything written to it
 */
export class BufferSink implements ByteSink {
	private chunks: Uint8Array[] = []
	private length = 0

	write(chunk: Uint8Array): void {
		this.chunks.push(chunk.slice())
		this.length += chunk.length
	}

	get size(): number {
		return this.length
	}

	toUint8Array(): Uint8Array {
		const result = new Uint8Array(this.length)
		let offset = 0
		for (const chunk of this.chunks) {
			result.set(chunk, offset)
			offset += chunk.length
		}
		return result
	}
}

/**
 * Write a chunk, reporting sink failures as IoError
 */
export function writeChunk(sink: ByteSink, chunk: Uint8Array): void {
	try {
		sink.write(chunk)
	} catch (err) {
		if (err instanceof CodecError) throw err
		throw new IoError('Failed to write output', err)
	}
}

const BLOCK_SIZE = 64 * 1024

/**
 * Sequential little-endian reader over a ByteSource.
 *
 * Reads go through a block cache so byte-at-a-time parsing does not hit the
 * source for every byte.
 */
export class ByteReader {
	private offset = 0
	private block: Uint8Array = new Uint8Array(0)
	private blockStart = 0

	constructor(private readonly source: ByteSource) {}

	get position(): number {
		return this.offset
	}

	get size(): number {
		return this.source.size
	}

	/** Bytes left between the current position and the end of the source */
	get remaining(): number {
		return Math.max(0, this.source.size - this.offset)
	}

	seek(position: number): void {
		if (position < 0 || position > this.source.size) {
			throw new FormatError(`Offset ${position} is outside the data (${this.source.size} bytes)`)
		}
		this.offset = position
	}

	skip(count: number): void {
		this.seek(this.offset + count)
	}

	readU8(): number {
		const start = this.ensure(1)
		this.offset += 1
		return this.block[start]
	}

	readU16LE(): number {
		const start = this.ensure(2)
		this.offset += 2
		return this.block[start] | (this.block[start + 1] << 8)
	}

	readI16LE(): number {
		const val = this.readU16LE()
		return val > 0x7fff ? val - 0x10000 : val
	}

	readU32LE(): number {
		const start = this.ensure(4)
		this.offset += 4
		const b = this.block
		return (b[start] | (b[start + 1] << 8) | (b[start + 2] << 16) | (b[start + 3] << 24)) >>> 0
	}

	readI32LE(): number {
		const val = this.readU32LE()
		return val > 0x7fffffff ? val - 0x100000000 : val
	}

	/**
	 * Read `length` bytes. The result is a view that stays valid until the next read.
	 */
	readBytes(length: number): Uint8Array {
		const start = this.ensure(length)
		this.offset += length
		return this.block.subarray(start, start + length)
	}

	/**
	 * Make `length` bytes at the current position available in the block and
	 * return their index within it
	 */
	private ensure(length: number): number {
		const start = this.offset - this.blockStart
		if (start >= 0 && start + length <= this.block.length) return start

		const wanted = Math.min(Math.max(length, BLOCK_SIZE), this.remaining)
		const block = wanted > 0 ? this.pull(this.offset, wanted) : new Uint8Array(0)
		if (block.length < length) {
			throw new FormatError(
				`Unexpected end of data at offset ${this.offset} (needed ${length} bytes, ${block.length} available)`
			)
		}
		this.block = block
		this.blockStart = this.offset
		return 0
	}

	private pull(position: number, length: number): Uint8Array {
		try {
			return this.source.read(position, length)
		} catch (err) {
			if (err instanceof CodecError) throw err
			throw new IoError(`Failed to read ${length} bytes at offset ${position}`, err)
		}
	}
}
