import { ByteReader, FormatError, bufferSource } from '@rasterkit/core'
import { describe, expect, test } from 'vitest'
import { RleDecompressor, RleState, decompressRle, readRleCommand } from './rle'

function readerOf(bytes: number[]): ByteReader {
	return new ByteReader(bufferSource(new Uint8Array(bytes)))
}

function rle8(bytes: number[], width: number, height: number): number[] {
	return Array.from(decompressRle(readerOf(bytes), width, height, 8))
}

describe('readRleCommand', () => {
	test('decodes escapes', () => {
		expect(readRleCommand(readerOf([4, 9]), 8)).toEqual({ op: 'run', count: 4, value: 9 })
		expect(readRleCommand(readerOf([0, 0]), 8)).toEqual({ op: 'end-of-line' })
		expect(readRleCommand(readerOf([0, 1]), 8)).toEqual({ op: 'end-of-bitmap' })
		expect(readRleCommand(readerOf([0, 2, 5, 7]), 8)).toEqual({ op: 'delta', dx: 5, dy: 7 })
	})

	test('skips the pad byte after an odd-length literal', () => {
		const reader = readerOf([0, 3, 1, 2, 3, 0, 4, 4])
		const command = readRleCommand(reader, 8)

		expect(command.op).toBe('literal')
		expect(command.op === 'literal' && Array.from(command.values)).toEqual([1, 2, 3])
		expect(reader.position).toBe(6)
	})

	test('unpacks RLE4 literals two per byte', () => {
		const reader = readerOf([0, 3, 0x12, 0x30])
		const command = readRleCommand(reader, 4)

		expect(command.op === 'literal' && Array.from(command.values)).toEqual([1, 2, 3])
		expect(reader.position).toBe(4)
	})
})

describe('decompressRle', () => {
	test('decodes runs, end of line and padded literals', () => {
		expect(rle8([3, 7, 0, 0, 0, 3, 1, 2, 3, 0, 0, 1], 3, 2)).toEqual([7, 7, 7, 1, 2, 3])
	})

	test('stops once every pixel is covered', () => {
		const reader = readerOf([2, 9, 0, 0, 0, 1])
		expect(Array.from(decompressRle(reader, 2, 1, 8))).toEqual([9, 9])
		expect(reader.position).toBe(2)
	})

	test('a run starting at the end of a row wraps to the next row', () => {
		expect(rle8([2, 1, 2, 2], 2, 2)).toEqual([1, 1, 2, 2])
	})

	test('delta skips pixels, leaving index 0', () => {
		expect(rle8([1, 5, 0, 2, 2, 1, 1, 6, 0, 2, 0, 1], 4, 3)).toEqual([5, 0, 0, 0, 0, 0, 0, 6, 0, 0, 0, 0])
	})

	test('RLE4 runs alternate nibbles', () => {
		expect(Array.from(decompressRle(readerOf([5, 0x12]), 5, 1, 4))).toEqual([1, 2, 1, 2, 1])
	})

	test('end of bitmap on an empty image terminates with no pixels', () => {
		const reader = readerOf([0, 1])
		expect(decompressRle(reader, 0, 0, 8).length).toBe(0)
		expect(reader.position).toBe(2)
	})

	test('end of bitmap before every pixel is covered is rejected', () => {
		expect(() => rle8([2, 1, 0, 1], 2, 2)).toThrow(FormatError)
		expect(() => rle8([2, 1, 0, 1], 2, 2)).toThrow('RLE end of bitmap after 2 of 4 pixels')
	})

	test('a run crossing the end of a row is rejected', () => {
		expect(() => rle8([1, 1, 3, 2], 3, 2)).toThrow('RLE run of 3 pixels at column 1 crosses the end of row 0 (width 3)')
	})

	test('a delta leaving the image is rejected', () => {
		expect(() => rle8([0, 2, 3, 0], 2, 2)).toThrow('RLE delta (3, 0) moves outside the image')
	})

	test('a stream that ends mid-command is rejected', () => {
		expect(() => rle8([2], 2, 1)).toThrow(FormatError)
		expect(() => rle8([0, 4, 1, 2], 4, 1)).toThrow(FormatError)
	})
})

describe('RleDecompressor', () => {
	test('moves from scanning to complete', () => {
		const decompressor = new RleDecompressor(2, 1, 8)

		expect(decompressor.currentState).toBe(RleState.Scanning)
		expect(decompressor.transition({ op: 'run', count: 1, value: 3 })).toBe(RleState.Scanning)
		expect(decompressor.position).toBe(1)
		expect(decompressor.transition({ op: 'run', count: 1, value: 4 })).toBe(RleState.Complete)
		expect(Array.from(decompressor.indices)).toEqual([3, 4])
	})

	test('rejects commands after termination', () => {
		const decompressor = new RleDecompressor(1, 1, 8)
		decompressor.transition({ op: 'run', count: 1, value: 0 })

		expect(() => decompressor.transition({ op: 'end-of-bitmap' })).toThrow(
			'RLE command after the bitmap was complete'
		)
	})
})
