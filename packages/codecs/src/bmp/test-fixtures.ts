import type { PaletteEntry } from './types'

/**
 * Hand-assembled BMP files for tests
 */
export interface BmpFixture {
	signature?: string
	headerSize?: number
	width: number
	/** Signed; negative for top-down */
	height: number
	bitsPerPixel: number
	compression?: number
	planes?: number
	/** Defaults to the number of palette entries */
	colorsUsed?: number
	palette?: readonly PaletteEntry[]
	/** Red, green, blue and optional alpha masks at offset 54 */
	masks?: readonly number[]
	/** Stored pixel data, placed right after the palette */
	pixels: ArrayLike<number>
	/** Declared pixel data offset; the layout itself never changes */
	dataOffset?: number
}

/**
 * Build a BMP byte stream. BITMAPINFOHEADER masks are written after the
 * header; V2 and later headers carry them inside, at the same offset.
 */
export function buildBmp(fixture: BmpFixture): Uint8Array {
	const {
		signature = 'BM',
		headerSize = 40,
		width,
		height,
		bitsPerPixel,
		compression = 0,
		planes = 1,
		palette = [],
		masks,
		pixels,
	} = fixture

	const isCore = headerSize === 12
	const masksAfterHeader = headerSize === 40 && masks ? masks.length * 4 : 0
	const entrySize = isCore ? 3 : 4
	const paletteOffset = 14 + headerSize + masksAfterHeader
	const pixelOffset = paletteOffset + palette.length * entrySize

	const bytes = new Uint8Array(pixelOffset + pixels.length)
	const view = new DataView(bytes.buffer)

	bytes[0] = signature.charCodeAt(0)
	bytes[1] = signature.charCodeAt(1)
	view.setUint32(2, bytes.length, true)
	view.setUint32(10, fixture.dataOffset ?? pixelOffset, true)
	view.setUint32(14, headerSize, true)

	if (isCore) {
		view.setUint16(18, width, true)
		view.setUint16(20, height, true)
		view.setUint16(22, planes, true)
		view.setUint16(24, bitsPerPixel, true)
	} else if (headerSize >= 40) {
		view.setInt32(18, width, true)
		view.setInt32(22, height, true)
		view.setUint16(26, planes, true)
		view.setUint16(28, bitsPerPixel, true)
		view.setUint32(30, compression, true)
		view.setUint32(34, pixels.length, true)
		view.setInt32(38, 2835, true)
		view.setInt32(42, 2835, true)
		view.setUint32(46, fixture.colorsUsed ?? palette.length, true)
		masks?.forEach((mask, i) => view.setUint32(54 + i * 4, mask >>> 0, true))
		if (headerSize >= 108) view.setUint32(70, 0x73524742, true)
	}

	palette.forEach((entry, i) => {
		const at = paletteOffset + i * entrySize
		bytes[at] = entry.blue
		bytes[at + 1] = entry.green
		bytes[at + 2] = entry.red
	})

	bytes.set(Array.from(pixels), pixelOffset)
	return bytes
}

/**
 * Concatenate stored rows, zero-padding each to a multiple of 4 bytes
 */
export function storedRows(...rows: ReadonlyArray<readonly number[]>): number[] {
	const out: number[] = []
	for (const row of rows) {
		out.push(...row)
		for (let i = row.length; i % 4 !== 0; i++) out.push(0)
	}
	return out
}

export function readU16(bytes: Uint8Array, offset: number): number {
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint16(offset, true)
}

export function readU32(bytes: Uint8Array, offset: number): number {
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(offset, true)
}

export function readI32(bytes: Uint8Array, offset: number): number {
	return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getInt32(offset, true)
}

export const BLACK: PaletteEntry = { red: 0, green: 0, blue: 0 }
export const WHITE: PaletteEntry = { red: 255, green: 255, blue: 255 }
export const RED: PaletteEntry = { red: 255, green: 0, blue: 0 }
export const BLUE: PaletteEntry = { red: 0, green: 0, blue: 255 }
