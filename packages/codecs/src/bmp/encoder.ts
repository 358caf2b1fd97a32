import { BufferSink, type ByteSink, FormatError, writeChunk } from '@rasterkit/core'
import { rowStride, visibleRow } from './scanline'
import {
	type BitsPerPixel,
	BmpCompression,
	type BmpEncodeOptions,
	type ColorType,
	DEFAULT_PIXELS_PER_METER,
	FILE_HEADER_SIZE,
	InfoHeaderSize,
	type PaletteEntry,
	type PixelBuffer,
	channelCount,
} from './types'

const MAX_DIMENSION = 0x7fffffff
const MAX_FILE_SIZE = 0xffffffff

const DEFAULT_BITS: Record<ColorType, BitsPerPixel> = {
	l8: 8,
	rgb8: 24,
	rgba8: 32,
}

const GRAYSCALE_PALETTE: readonly PaletteEntry[] = Array.from({ length: 256 }, (_, v) => ({
	red: v,
	green: v,
	blue: v,
}))

/**
 * Write little-endian uint16
 */
function writeU16(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
}

/**
 * Write little-endian uint32 (negative values are stored as two's complement)
 */
function writeU32(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
	data[offset + 2] = (value >> 16) & 0xff
	data[offset + 3] = (value >> 24) & 0xff
}

/**
 * Everything decided before the first byte is written
 */
interface EncodePlan {
	readonly bitsPerPixel: BitsPerPixel
	readonly headerSize: InfoHeaderSize.Info | InfoHeaderSize.V4
	readonly palette: readonly PaletteEntry[]
	/** One palette index per pixel, top-to-bottom, for 1/4/8 bpp targets */
	readonly indices: Uint8Array | null
}

/**
 * Encode a pixel buffer as BMP.
 *
 * Output is always uncompressed: run-length encoding is never produced, even
 * for images that were decoded from RLE files.
 */
export function encodeBmp(image: PixelBuffer, options?: BmpEncodeOptions): Uint8Array {
	const sink = new BufferSink()
	writeBmp(image, sink, options)
	return sink.toUint8Array()
}

/**
 * Encode a pixel buffer as BMP into `sink`.
 *
 * Headers use BITMAPINFOHEADER, except `rgba8` input which is written as
 * 32 bpp BI_BITFIELDS with a BITMAPV4HEADER so the alpha mask can be declared.
 * All validation happens before the sink is written to.
 */
export function writeBmp(image: PixelBuffer, sink: ByteSink, options: BmpEncodeOptions = {}): void {
	const plan = planEncoding(image, options)
	const { width, height } = image
	const topDown = options.topDown ?? false

	const stride = rowStride(width, plan.bitsPerPixel)
	const dataOffset = FILE_HEADER_SIZE + plan.headerSize + plan.palette.length * 4
	const pixelDataSize = stride * height
	const fileSize = dataOffset + pixelDataSize
	if (fileSize > MAX_FILE_SIZE) {
		throw new FormatError(`Encoded size of ${fileSize} bytes exceeds the BMP limit of ${MAX_FILE_SIZE}`)
	}

	const header = new Uint8Array(dataOffset)

	// File header (14 bytes)
	header[0] = 0x42 // 'B'
	header[1] = 0x4d // 'M'
	writeU32(header, 2, fileSize)
	writeU32(header, 6, 0) // Reserved
	writeU32(header, 10, dataOffset)

	// BITMAPINFOHEADER fields, shared with BITMAPV4HEADER
	const withAlpha = plan.headerSize === InfoHeaderSize.V4
	writeU32(header, 14, plan.headerSize)
	writeU32(header, 18, width)
	writeU32(header, 22, topDown ? -height : height)
	writeU16(header, 26, 1) // Planes
	writeU16(header, 28, plan.bitsPerPixel)
	writeU32(header, 30, withAlpha ? BmpCompression.Bitfields : BmpCompression.Rgb)
	writeU32(header, 34, pixelDataSize)
	writeU32(header, 38, DEFAULT_PIXELS_PER_METER)
	writeU32(header, 42, DEFAULT_PIXELS_PER_METER)
	writeU32(header, 46, plan.palette.length) // Colors used
	writeU32(header, 50, 0) // Important colors

	if (withAlpha) {
		writeU32(header, 54, 0x00ff0000) // Red mask
		writeU32(header, 58, 0x0000ff00) // Green mask
		writeU32(header, 62, 0x000000ff) // Blue mask
		writeU32(header, 66, 0xff000000) // Alpha mask
		writeU32(header, 70, 0x73524742) // LCS_sRGB; endpoints and gamma stay zero
	}

	// Palette (B, G, R, reserved)
	let offset = FILE_HEADER_SIZE + plan.headerSize
	for (const entry of plan.palette) {
		header[offset] = entry.blue
		header[offset + 1] = entry.green
		header[offset + 2] = entry.red
		header[offset + 3] = 0
		offset += 4
	}

	writeChunk(sink, header)

	const scanline = new Uint8Array(stride)
	for (let row = 0; row < height; row++) {
		scanline.fill(0)
		encodeRow(image, plan, visibleRow(row, height, topDown), scanline)
		writeChunk(sink, scanline)
	}
}

function planEncoding(image: PixelBuffer, options: BmpEncodeOptions): EncodePlan {
	const { width, height, colorType, data } = image

	for (const [name, value] of [
		['width', width],
		['height', height],
	] as const) {
		if (!Number.isInteger(value) || value <= 0 || value > MAX_DIMENSION) {
			throw new FormatError(`Invalid ${name}: ${value}`)
		}
	}
	const expectedLength = width * height * channelCount(colorType)
	if (data.length !== expectedLength) {
		throw new FormatError(
			`Pixel data has ${data.length} bytes, expected ${expectedLength} for ${width}x${height} ${colorType}`
		)
	}

	const bitsPerPixel = options.bitsPerPixel ?? DEFAULT_BITS[colorType]
	if (![1, 4, 8, 16, 24, 32].includes(bitsPerPixel)) {
		throw new FormatError(`Cannot encode at ${bitsPerPixel} bits per pixel`)
	}
	if (colorType === 'rgba8' && bitsPerPixel !== 32) {
		throw new FormatError(`rgba8 pixels can only be encoded at 32 bits per pixel, not ${bitsPerPixel}`)
	}

	if (bitsPerPixel > 8) {
		if (options.palette) {
			throw new FormatError(`A palette only applies to 1, 4 and 8 bpp output, not ${bitsPerPixel}`)
		}
		return {
			bitsPerPixel,
			headerSize: colorType === 'rgba8' ? InfoHeaderSize.V4 : InfoHeaderSize.Info,
			palette: [],
			indices: null,
		}
	}

	const palette = options.palette ?? (colorType === 'l8' && bitsPerPixel === 8 ? GRAYSCALE_PALETTE : null)
	if (!palette) {
		throw new FormatError(`A palette is required to encode ${colorType} pixels at ${bitsPerPixel} bits per pixel`)
	}
	validatePalette(palette, bitsPerPixel)

	return {
		bitsPerPixel,
		headerSize: InfoHeaderSize.Info,
		palette,
		indices: resolveIndices(image, palette),
	}
}

function validatePalette(palette: readonly PaletteEntry[], bitsPerPixel: number): void {
	const maxEntries = 1 << bitsPerPixel
	if (palette.length === 0 || palette.length > maxEntries) {
		throw new FormatError(
			`Palette has ${palette.length} entries; ${bitsPerPixel} bpp allows 1 to ${maxEntries}`
		)
	}
	palette.forEach((entry, i) => {
		for (const value of [entry.red, entry.green, entry.blue]) {
			if (!Number.isInteger(value) || value < 0 || value > 255) {
				throw new FormatError(`Palette entry ${i} has channel value ${value} outside 0-255`)
			}
		}
	})
}

/**
 * Map every pixel to a palette index: `l8` values are indices, `rgb8`
 * colours must appear in the palette exactly
 */
function resolveIndices(image: PixelBuffer, palette: readonly PaletteEntry[]): Uint8Array {
	const { width, height, data } = image
	const indices = new Uint8Array(width * height)

	if (image.colorType === 'l8') {
		for (let i = 0; i < indices.length; i++) {
			if (data[i] >= palette.length) {
				throw new FormatError(
					`Pixel (${i % width}, ${Math.floor(i / width)}) index ${data[i]} is outside the palette (${palette.length} entries)`
				)
			}
			indices[i] = data[i]
		}
		return indices
	}

	const lookup = new Map<number, number>()
	palette.forEach((entry, i) => {
		const key = (entry.red << 16) | (entry.green << 8) | entry.blue
		if (!lookup.has(key)) lookup.set(key, i)
	})

	for (let i = 0; i < indices.length; i++) {
		const s = i * 3
		const key = (data[s] << 16) | (data[s + 1] << 8) | data[s + 2]
		const index = lookup.get(key)
		if (index === undefined) {
			const hex = key.toString(16).padStart(6, '0')
			throw new FormatError(`Pixel (${i % width}, ${Math.floor(i / width)}) colour #${hex} is not in the palette`)
		}
		indices[i] = index
	}
	return indices
}

/**
 * Fill `scanline` with visible row `y`; padding bytes stay zero
 */
function encodeRow(image: PixelBuffer, plan: EncodePlan, y: number, scanline: Uint8Array): void {
	const { width, colorType, data } = image
	const channels = channelCount(colorType)

	if (plan.indices) {
		const row = plan.indices.subarray(y * width, (y + 1) * width)
		for (let x = 0; x < width; x++) {
			const index = row[x]
			switch (plan.bitsPerPixel) {
				case 1:
					scanline[x >> 3] |= index << (7 - (x & 7))
					break
				case 4:
					scanline[x >> 1] |= x & 1 ? index : index << 4
					break
				default:
					scanline[x] = index
			}
		}
		return
	}

	for (let x = 0; x < width; x++) {
		const s = (y * width + x) * channels
		const r = data[s]
		const g = colorType === 'l8' ? r : data[s + 1]
		const b = colorType === 'l8' ? r : data[s + 2]

		switch (plan.bitsPerPixel) {
			case 16:
				writeU16(scanline, x * 2, ((r >> 3) << 10) | ((g >> 3) << 5) | (b >> 3))
				break
			case 24:
				scanline[x * 3] = b
				scanline[x * 3 + 1] = g
				scanline[x * 3 + 2] = r
				break
			default:
				scanline[x * 4] = b
				scanline[x * 4 + 1] = g
				scanline[x * 4 + 2] = r
				scanline[x * 4 + 3] = colorType === 'rgba8' ? data[s + 3] : 0
		}
	}
}
