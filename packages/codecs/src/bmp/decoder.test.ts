import { type ByteSource, FormatError } from '@rasterkit/core'
import { describe, expect, test } from 'vitest'
import { decodeBmp } from './decoder'
import { BLACK, WHITE, type BmpFixture, buildBmp, storedRows } from './test-fixtures'
import type { PaletteEntry } from './types'

const MAGENTA: PaletteEntry = { red: 255, green: 0, blue: 255 }

// Visible rows: red, green / blue, white
const RED_GREEN_BLUE_WHITE = [255, 0, 0, 0, 255, 0, 0, 0, 255, 255, 255, 255]

describe('BMP Decoder', () => {
	test('decodes bottom-up 24 bpp rows into top-down order', () => {
		const data = buildBmp({
			width: 2,
			height: 2,
			bitsPerPixel: 24,
			// Stored bottom row first, as B, G, R
			pixels: storedRows([255, 0, 0, 255, 255, 255], [0, 0, 255, 0, 255, 0]),
		})
		const { image } = decodeBmp(data)

		expect(image.width).toBe(2)
		expect(image.height).toBe(2)
		expect(image.colorType).toBe('rgb8')
		expect(Array.from(image.data)).toEqual(RED_GREEN_BLUE_WHITE)
	})

	test('top-down rows keep their stored order', () => {
		const data = buildBmp({
			width: 2,
			height: -2,
			bitsPerPixel: 24,
			pixels: storedRows([0, 0, 255, 0, 255, 0], [255, 0, 0, 255, 255, 255]),
		})
		const { image } = decodeBmp(data)

		expect(image.height).toBe(2)
		expect(Array.from(image.data)).toEqual(RED_GREEN_BLUE_WHITE)
	})

	describe('single-colour images decode to that colour at every depth', () => {
		const cases: Array<[string, BmpFixture]> = [
			['1 bpp', { width: 3, height: 2, bitsPerPixel: 1, palette: [BLACK, MAGENTA], pixels: storedRows([0xe0], [0xe0]) }],
			['4 bpp', { width: 3, height: 2, bitsPerPixel: 4, palette: [MAGENTA], pixels: storedRows([0, 0], [0, 0]) }],
			['8 bpp', { width: 3, height: 2, bitsPerPixel: 8, palette: [MAGENTA], pixels: storedRows([0, 0, 0], [0, 0, 0]) }],
			[
				'16 bpp',
				{
					width: 3,
					height: 2,
					bitsPerPixel: 16,
					pixels: storedRows([0x1f, 0x7c, 0x1f, 0x7c, 0x1f, 0x7c], [0x1f, 0x7c, 0x1f, 0x7c, 0x1f, 0x7c]),
				},
			],
			[
				'24 bpp',
				{
					width: 3,
					height: 2,
					bitsPerPixel: 24,
					pixels: storedRows([255, 0, 255, 255, 0, 255, 255, 0, 255], [255, 0, 255, 255, 0, 255, 255, 0, 255]),
				},
			],
			[
				'32 bpp',
				{
					width: 3,
					height: 2,
					bitsPerPixel: 32,
					pixels: storedRows([255, 0, 255, 0, 255, 0, 255, 0, 255, 0, 255, 0], [255, 0, 255, 0, 255, 0, 255, 0, 255, 0, 255, 0]),
				},
			],
			[
				'RLE8',
				{
					width: 3,
					height: 2,
					bitsPerPixel: 8,
					compression: 1,
					palette: [BLACK, MAGENTA],
					pixels: [3, 1, 0, 0, 3, 1, 0, 1],
				},
			],
			[
				'RLE4',
				{
					width: 3,
					height: 2,
					bitsPerPixel: 4,
					compression: 2,
					palette: [BLACK, MAGENTA],
					pixels: [3, 0x11, 0, 0, 3, 0x11, 0, 1],
				},
			],
		]

		for (const [name, fixture] of cases) {
			test(name, () => {
				const { image } = decodeBmp(buildBmp(fixture))
				expect(image.colorType).toBe('rgb8')
				expect(Array.from(image.data)).toEqual(Array.from({ length: 6 }, () => [255, 0, 255]).flat())
			})
		}
	})

	test('RLE rows are stored bottom-up', () => {
		const data = buildBmp({
			width: 2,
			height: 2,
			bitsPerPixel: 8,
			compression: 1,
			palette: [BLACK, WHITE],
			pixels: [2, 1, 0, 0, 2, 0, 0, 1],
		})
		const { image } = decodeBmp(data)

		expect(Array.from(image.data)).toEqual([0, 0, 0, 0, 0, 0, 255, 255, 255, 255, 255, 255])
	})

	test('1 bpp rows ignore padding bits', () => {
		const data = buildBmp({
			width: 3,
			height: 1,
			bitsPerPixel: 1,
			palette: [BLACK, WHITE],
			pixels: storedRows([0b0101_1111]),
		})
		const { image } = decodeBmp(data)

		expect(Array.from(image.data)).toEqual([0, 0, 0, 255, 255, 255, 0, 0, 0])
	})

	test('an alpha mask produces rgba8', () => {
		const data = buildBmp({
			headerSize: 108,
			width: 1,
			height: 1,
			bitsPerPixel: 32,
			compression: 3,
			masks: [0x00ff0000, 0x0000ff00, 0x000000ff, 0xff000000],
			pixels: [30, 20, 10, 128],
		})
		const { image } = decodeBmp(data)

		expect(image.colorType).toBe('rgba8')
		expect(Array.from(image.data)).toEqual([10, 20, 30, 128])
	})

	test('BITMAPV2INFOHEADER carries colour masks but no alpha', () => {
		const data = buildBmp({
			headerSize: 52,
			width: 2,
			height: 1,
			bitsPerPixel: 16,
			compression: 3,
			masks: [0xf800, 0x07e0, 0x001f],
			pixels: [0x00, 0xf8, 0xe0, 0x07],
		})
		const { image, descriptor } = decodeBmp(data)

		expect(descriptor.headerKind).toBe('BITMAPV2INFOHEADER')
		expect(descriptor.dataOffset).toBe(66)
		expect(image.colorType).toBe('rgb8')
		expect(Array.from(image.data)).toEqual([255, 0, 0, 0, 255, 0])
	})

	test('BITMAPV3INFOHEADER alpha mask produces rgba8', () => {
		const data = buildBmp({
			headerSize: 56,
			width: 1,
			height: 1,
			bitsPerPixel: 32,
			compression: 3,
			masks: [0x00ff0000, 0x0000ff00, 0x000000ff, 0xff000000],
			pixels: [30, 20, 10, 128],
		})
		const { image, descriptor } = decodeBmp(data)

		expect(descriptor.headerKind).toBe('BITMAPV3INFOHEADER')
		expect(descriptor.dataOffset).toBe(70)
		expect(image.colorType).toBe('rgba8')
		expect(Array.from(image.data)).toEqual([10, 20, 30, 128])
	})

	test('returns the palette of indexed images', () => {
		const { palette, descriptor } = decodeBmp(
			buildBmp({ width: 1, height: 1, bitsPerPixel: 8, palette: [BLACK, MAGENTA], pixels: [1, 0, 0, 0] })
		)

		expect(descriptor.bitsPerPixel).toBe(8)
		expect(palette).toEqual([
			{ red: 0, green: 0, blue: 0, reserved: 0 },
			{ red: 255, green: 0, blue: 255, reserved: 0 },
		])
	})

	test('reads through a ByteSource', () => {
		const bytes = buildBmp({ width: 1, height: 1, bitsPerPixel: 24, pixels: [3, 2, 1, 0] })
		const source: ByteSource = {
			size: bytes.length,
			read: (position, length) => bytes.slice(position, position + length),
		}

		expect(Array.from(decodeBmp(source).image.data)).toEqual([1, 2, 3])
	})

	test('a palette index past the last entry fails', () => {
		const data = buildBmp({ width: 1, height: 1, bitsPerPixel: 8, palette: [BLACK, WHITE], pixels: [5, 0, 0, 0] })

		expect(() => decodeBmp(data)).toThrow(FormatError)
		expect(() => decodeBmp(data)).toThrow('Palette index 5 out of range (palette has 2 entries)')
	})

	test('a truncated RLE stream fails', () => {
		const data = buildBmp({
			width: 2,
			height: 2,
			bitsPerPixel: 8,
			compression: 1,
			palette: [BLACK],
			pixels: [2, 0, 0],
		})
		expect(() => decodeBmp(data)).toThrow(FormatError)
	})

	test('decode throws on invalid signature', () => {
		const invalid = new Uint8Array(20)
		expect(() => decodeBmp(invalid)).toThrow('Invalid BMP signature')
	})
})
