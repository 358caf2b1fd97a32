import { type ByteReader, FormatError } from '@rasterkit/core'

/**
 * BI_RLE4 / BI_RLE8 decompression.
 *
 * The stream is a sequence of two-byte commands:
 *
 * | bytes            | meaning                                      |
 * |------------------|----------------------------------------------|
 * | `n v` (n > 0)    | run of n pixels of value v                   |
 * | `0 0`            | end of line                                  |
 * | `0 1`            | end of bitmap                                |
 * | `0 2 dx dy`      | move the cursor right dx and forward dy rows |
 * | `0 n` (n >= 3)   | n literal pixels, padded to an even length   |
 *
 * In RLE4 a run alternates the high and low nibble of v, and literal pixels
 * are packed two per byte.
 */

export enum RleState {
	/** Reading commands; the cursor is inside the image */
	Scanning = 'scanning',
	/** Every pixel of the image has been covered */
	Complete = 'complete',
	/** An end-of-bitmap marker was read */
	Ended = 'ended',
}

export type RleCommand =
	| { readonly op: 'run'; readonly count: number; readonly value: number }
	| { readonly op: 'literal'; readonly values: Uint8Array }
	| { readonly op: 'end-of-line' }
	| { readonly op: 'end-of-bitmap' }
	| { readonly op: 'delta'; readonly dx: number; readonly dy: number }

/**
 * Read one command. Literal values are returned unpacked, one index per pixel.
 */
export function readRleCommand(reader: ByteReader, bits: 4 | 8): RleCommand {
	const count = reader.readU8()
	const value = reader.readU8()
	if (count > 0) return { op: 'run', count, value }

	switch (value) {
		case 0:
			return { op: 'end-of-line' }
		case 1:
			return { op: 'end-of-bitmap' }
		case 2:
			return { op: 'delta', dx: reader.readU8(), dy: reader.readU8() }
	}

	const byteCount = bits === 8 ? value : Math.ceil(value / 2)
	const bytes = reader.readBytes(byteCount)
	const values = new Uint8Array(value)
	if (bits === 8) {
		values.set(bytes)
	} else {
		for (let i = 0; i < value; i++) {
			const byte = bytes[i >> 1]
			values[i] = i & 1 ? byte & 0x0f : byte >> 4
		}
	}
	if (byteCount & 1) reader.skip(1)
	return { op: 'literal', values }
}

/**
 * Cursor over the index buffer, in stored-row order
 */
export class RleDecompressor {
	readonly indices: Uint8Array
	private x = 0
	private y = 0
	private state: RleState = RleState.Scanning

	constructor(
		readonly width: number,
		readonly height: number,
		private readonly bits: 4 | 8
	) {
		this.indices = new Uint8Array(width * height)
	}

	get currentState(): RleState {
		return this.state
	}

	/** Pixels covered so far, emitted or skipped */
	get position(): number {
		return this.y * this.width + this.x
	}

	/**
	 * Apply one command and return the next state
	 */
	transition(command: RleCommand): RleState {
		if (this.state !== RleState.Scanning) {
			throw new FormatError(`RLE command after the bitmap ${this.state === RleState.Ended ? 'ended' : 'was complete'}`)
		}

		switch (command.op) {
			case 'run': {
				const start = this.reserve(command.count)
				if (this.bits === 8) {
					this.indices.fill(command.value, start, start + command.count)
				} else {
					const high = command.value >> 4
					const low = command.value & 0x0f
					for (let i = 0; i < command.count; i++) {
						this.indices[start + i] = i & 1 ? low : high
					}
				}
				this.x += command.count
				break
			}

			case 'literal': {
				const start = this.reserve(command.values.length)
				this.indices.set(command.values, start)
				this.x += command.values.length
				break
			}

			case 'end-of-line':
				this.x = 0
				this.y++
				break

			case 'end-of-bitmap':
				if (this.position < this.indices.length) {
					throw new FormatError(
						`RLE end of bitmap after ${this.position} of ${this.indices.length} pixels`
					)
				}
				this.state = RleState.Ended
				return this.state

			case 'delta': {
				const x = this.x + command.dx
				const y = this.y + command.dy
				if (x > this.width || y > this.height || (y === this.height && x > 0)) {
					throw new FormatError(`RLE delta (${command.dx}, ${command.dy}) moves outside the image`)
				}
				this.x = x
				this.y = y
				break
			}
		}

		if (this.position >= this.indices.length) {
			this.state = RleState.Complete
		}
		return this.state
	}

	/**
	 * Check that `count` pixels fit in the current row and return where they start
	 */
	private reserve(count: number): number {
		if (this.x === this.width) {
			this.x = 0
			this.y++
		}
		if (this.y >= this.height) {
			throw new FormatError('RLE data continues past the last row')
		}
		if (this.x + count > this.width) {
			throw new FormatError(
				`RLE run of ${count} pixels at column ${this.x} crosses the end of row ${this.y} (width ${this.width})`
			)
		}
		return this.y * this.width + this.x
	}
}

/**
 * Decompress RLE data at the reader's position into one palette index per
 * pixel, rows in stored order. Pixels skipped by end-of-line or delta keep index 0.
 */
export function decompressRle(reader: ByteReader, width: number, height: number, bits: 4 | 8): Uint8Array {
	const decompressor = new RleDecompressor(width, height, bits)
	let state = decompressor.currentState
	while (state === RleState.Scanning) {
		state = decompressor.transition(readRleCommand(reader, bits))
	}
	return decompressor.indices
}
