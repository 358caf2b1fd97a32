import { describe, expect, test } from 'vitest'
import { ScanlineAssembler, rowStride, visibleRow } from './scanline'

describe('rowStride', () => {
	test('rounds each row up to 4 bytes', () => {
		expect(rowStride(1, 1)).toBe(4)
		expect(rowStride(32, 1)).toBe(4)
		expect(rowStride(33, 1)).toBe(8)
		expect(rowStride(9, 4)).toBe(8)
		expect(rowStride(1, 24)).toBe(4)
		expect(rowStride(3, 24)).toBe(12)
		expect(rowStride(5, 16)).toBe(12)
	})
})

describe('ScanlineAssembler', () => {
	test('bottom-up rows land in reverse order', () => {
		expect(visibleRow(0, 3, false)).toBe(2)
		expect(visibleRow(2, 3, false)).toBe(0)

		const assembler = new ScanlineAssembler(2, 3, false, 3)
		expect(assembler.buffer.length).toBe(18)
		expect(assembler.rowOffset(0)).toBe(12)
		expect(assembler.rowOffset(2)).toBe(0)
	})

	test('top-down rows keep their order', () => {
		expect(visibleRow(0, 3, true)).toBe(0)

		const assembler = new ScanlineAssembler(2, 3, true, 4)
		expect(assembler.rowOffset(1)).toBe(8)
	})
})
