import { closeSync, fstatSync, openSync, readSync, writeSync } from 'node:fs'
import { type ByteSink, type ByteSource, IoError } from '@rasterkit/core'

/**
 * Random-access reads from an open file descriptor
 */
export function fileSource(fd: number): ByteSource {
	let size: number
	try {
		size = fstatSync(fd).size
	} catch (error) {
		throw new IoError('Cannot stat file', error)
	}
	return {
		size,
		read(position, length) {
			const buffer = new Uint8Array(Math.max(0, Math.min(length, size - position)))
			let filled = 0
			while (filled < buffer.length) {
				let count: number
				try {
					count = readSync(fd, buffer, filled, buffer.length - filled, position + filled)
				} catch (error) {
					throw new IoError(`Cannot read at offset ${position + filled}`, error)
				}
				if (count === 0) break
				filled += count
			}
			return buffer.subarray(0, filled)
		},
	}
}

/**
 * Sequential writes to an open file descriptor
 */
export class FileSink implements ByteSink {
	private written = 0

	constructor(private readonly fd: number) {}

	get bytesWritten(): number {
		return this.written
	}

	write(chunk: Uint8Array): void {
		let offset = 0
		while (offset < chunk.length) {
			try {
				offset += writeSync(this.fd, chunk, offset, chunk.length - offset)
			} catch (error) {
				throw new IoError(`Cannot write at offset ${this.written + offset}`, error)
			}
		}
		this.written += chunk.length
	}
}

/**
 * Open `path`, run `fn` with the descriptor and close it again
 */
export function withFile<T>(path: string, flags: 'r' | 'w', fn: (fd: number) => T): T {
	let fd: number
	try {
		fd = openSync(path, flags)
	} catch (error) {
		throw new IoError(`Cannot open ${path}`, error)
	}
	try {
		return fn(fd)
	} finally {
		closeSync(fd)
	}
}
