import { type ByteReader, FormatError, UnsupportedError } from '@rasterkit/core'
import { rowStride } from './scanline'
import {
	BMP_SIGNATURE,
	type BitsPerPixel,
	BmpCompression,
	type ChannelMask,
	type ChannelMasks,
	type CompressionKind,
	DEFAULT_MAX_PIXEL_BYTES,
	type DecodeOptions,
	FILE_HEADER_SIZE,
	type HeaderKind,
	type ImageDescriptor,
	InfoHeaderSize,
	OS2_SIGNATURES,
} from './types'

/**
 * Information header fields, as stored
 */
interface RawInfoHeader {
	width: number
	height: number
	planes: number
	bitCount: number
	compression: number
	imageSize: number
	xPixelsPerMeter: number
	yPixelsPerMeter: number
	colorsUsed: number
	importantColors: number
	/** Red, green, blue and alpha masks carried inside the header (V2 and later) */
	masks: [number, number, number, number | null] | null
	colorSpaceType: number | null
}

const NO_CHANNEL: ChannelMask = { mask: 0, shift: 0, bits: 0 }

/** 5-5-5 layout used by 16 bpp BI_RGB images */
const DEFAULT_MASKS_16: ChannelMasks = {
	red: { mask: 0x7c00, shift: 10, bits: 5 },
	green: { mask: 0x03e0, shift: 5, bits: 5 },
	blue: { mask: 0x001f, shift: 0, bits: 5 },
	alpha: null,
}

/** 8-8-8 layout used by 32 bpp BI_RGB images; the top byte is unused */
const DEFAULT_MASKS_32: ChannelMasks = {
	red: { mask: 0x00ff0000, shift: 16, bits: 8 },
	green: { mask: 0x0000ff00, shift: 8, bits: 8 },
	blue: { mask: 0x000000ff, shift: 0, bits: 8 },
	alpha: null,
}

/**
 * Map an information header size to its layout
 */
export function headerKindOf(size: number): HeaderKind {
	switch (size) {
		case InfoHeaderSize.Core:
			return 'BITMAPCOREHEADER'
		case InfoHeaderSize.Info:
			return 'BITMAPINFOHEADER'
		case InfoHeaderSize.V2:
			return 'BITMAPV2INFOHEADER'
		case InfoHeaderSize.V3:
			return 'BITMAPV3INFOHEADER'
		case InfoHeaderSize.V4:
			return 'BITMAPV4HEADER'
		case InfoHeaderSize.V5:
			return 'BITMAPV5HEADER'
		case InfoHeaderSize.Os2Short:
		case InfoHeaderSize.Os2:
			throw new UnsupportedError(`OS/2 2.x information header (${size} bytes) is not supported`)
	}
	if (size < InfoHeaderSize.Core) {
		throw new FormatError(`Invalid information header size: ${size}`)
	}
	throw new UnsupportedError(`Unknown information header size: ${size}`)
}

/**
 * Locate a channel inside a bitfield mask
 */
export function buildChannelMask(mask: number, bitsPerPixel: number, name: string): ChannelMask {
	const normalized = mask >>> 0
	if (normalized === 0) return NO_CHANNEL

	const hex = normalized.toString(16).padStart(8, '0')
	if (bitsPerPixel < 32 && normalized >>> bitsPerPixel !== 0) {
		throw new FormatError(`${name} mask 0x${hex} does not fit in ${bitsPerPixel} bits per pixel`)
	}

	let shifted = normalized
	let shift = 0
	while ((shifted & 1) === 0) {
		shifted >>>= 1
		shift++
	}
	let bits = 0
	while ((shifted & 1) === 1) {
		shifted >>>= 1
		bits++
	}
	if (shifted !== 0) {
		throw new FormatError(`${name} mask 0x${hex} is not a contiguous run of bits`)
	}

	return { mask: normalized, shift, bits }
}

/**
 * Channels per decoded pixel: 4 when the header declares an alpha mask, otherwise 3
 */
function outputChannels(descriptor: ImageDescriptor): 3 | 4 {
	return descriptor.masks?.alpha ? 4 : 3
}

/**
 * Parse the file header and information header into an ImageDescriptor.
 *
 * Every check that bounds memory use runs here, before any pixel storage is
 * allocated: the decoded size is compared with `maxPixelBytes` and
 * uncompressed pixel data must fit in the bytes the source holds.
 */
export function parseHeader(reader: ByteReader, options: DecodeOptions = {}): ImageDescriptor {
	const maxPixelBytes = resolveMaxPixelBytes(options)

	if (reader.size < FILE_HEADER_SIZE) {
		throw new FormatError(`Data too small for a BMP file header (${reader.size} bytes)`)
	}
	reader.seek(0)

	// File header (14 bytes)
	const signature = reader.readU16LE()
	if (signature !== BMP_SIGNATURE) {
		const text = String.fromCharCode(signature & 0xff, signature >> 8)
		if (OS2_SIGNATURES.has(text)) {
			throw new UnsupportedError(`OS/2 bitmap type '${text}' is not supported`)
		}
		throw new FormatError('Invalid BMP signature')
	}
	const fileSize = reader.readU32LE()
	reader.skip(4) // Reserved
	const dataOffset = reader.readU32LE()

	// Information header
	const headerSize = reader.readU32LE()
	const headerKind = headerKindOf(headerSize)
	const isCore = headerSize === InfoHeaderSize.Core
	const raw = isCore ? readCoreHeader(reader) : readInfoHeader(reader, headerSize)

	if (raw.width <= 0) {
		throw new FormatError(`Invalid width: ${raw.width}`)
	}
	if (raw.height === 0 || raw.height === -0x80000000) {
		throw new FormatError(`Invalid height: ${raw.height}`)
	}
	const topDown = raw.height < 0
	const absHeight = Math.abs(raw.height)

	const bitsPerPixel = resolveBitsPerPixel(raw.bitCount)
	if (isCore && (bitsPerPixel === 16 || bitsPerPixel === 32)) {
		throw new FormatError(`BITMAPCOREHEADER does not allow ${bitsPerPixel} bits per pixel`)
	}

	const compression = resolveCompression(raw.compression, bitsPerPixel)
	if (topDown && (compression === 'rle4' || compression === 'rle8')) {
		throw new FormatError('RLE compressed bitmaps cannot be stored top-down')
	}

	// Masks live in the header from V2 on; BITMAPINFOHEADER puts them right after itself
	let masksAfterHeader = 0
	let masks: ChannelMasks | null = null
	if (compression === 'bitfields') {
		let stored = raw.masks
		if (stored == null) {
			const withAlpha = raw.compression === BmpCompression.AlphaBitfields
			masksAfterHeader = withAlpha ? 16 : 12
			stored = [
				reader.readU32LE(),
				reader.readU32LE(),
				reader.readU32LE(),
				withAlpha ? reader.readU32LE() : null,
			]
		}
		const [redMask, greenMask, blueMask, alphaMask] = stored
		const alpha = alphaMask == null ? NO_CHANNEL : buildChannelMask(alphaMask, bitsPerPixel, 'Alpha')
		masks = {
			red: buildChannelMask(redMask, bitsPerPixel, 'Red'),
			green: buildChannelMask(greenMask, bitsPerPixel, 'Green'),
			blue: buildChannelMask(blueMask, bitsPerPixel, 'Blue'),
			alpha: alpha.bits > 0 ? alpha : null,
		}
	} else if (bitsPerPixel === 16) {
		masks = DEFAULT_MASKS_16
	} else if (bitsPerPixel === 32) {
		masks = DEFAULT_MASKS_32
	}

	// Palette sits between the headers and the pixel data
	const paletteOffset = FILE_HEADER_SIZE + headerSize + masksAfterHeader
	const paletteEntrySize = isCore ? 3 : 4
	if (dataOffset < paletteOffset) {
		throw new FormatError(`Pixel data offset ${dataOffset} overlaps the headers (minimum ${paletteOffset})`)
	}
	if (dataOffset > reader.size) {
		throw new FormatError(`Pixel data offset ${dataOffset} is past the end of the data (${reader.size} bytes)`)
	}

	let paletteSize = 0
	if (bitsPerPixel <= 8) {
		const maxEntries = 1 << bitsPerPixel
		if (raw.colorsUsed > maxEntries) {
			throw new FormatError(
				`Palette size ${raw.colorsUsed} exceeds the maximum of ${maxEntries} for ${bitsPerPixel} bits per pixel`
			)
		}
		const declared = raw.colorsUsed > 0 ? raw.colorsUsed : maxEntries
		const fitting = Math.floor((dataOffset - paletteOffset) / paletteEntrySize)
		paletteSize = Math.min(declared, fitting)
		if (paletteSize === 0) {
			throw new FormatError('Indexed bitmap has no palette entries before the pixel data')
		}
	}

	const descriptor: ImageDescriptor = {
		headerKind,
		headerSize,
		fileSize,
		dataOffset,
		width: raw.width,
		height: raw.height,
		topDown,
		planes: raw.planes,
		bitsPerPixel,
		compression,
		paletteOffset,
		paletteSize,
		paletteEntrySize,
		masks,
		imageSize: raw.imageSize,
		xPixelsPerMeter: raw.xPixelsPerMeter,
		yPixelsPerMeter: raw.yPixelsPerMeter,
		importantColors: raw.importantColors,
		colorSpaceType: raw.colorSpaceType,
	}

	// Allocation bounds, in bigint so crafted dimensions cannot overflow the check
	const pixelBytes = BigInt(raw.width) * BigInt(absHeight) * BigInt(outputChannels(descriptor))
	if (pixelBytes > BigInt(maxPixelBytes)) {
		throw new FormatError(
			`Image of ${raw.width}x${absHeight} needs ${pixelBytes} bytes of pixel storage, above the limit of ${maxPixelBytes}`
		)
	}
	if (compression === 'none' || compression === 'bitfields') {
		const storedBytes = BigInt(rowStride(raw.width, bitsPerPixel)) * BigInt(absHeight)
		const availableBytes = reader.size - dataOffset
		if (storedBytes > BigInt(availableBytes)) {
			throw new FormatError(
				`Pixel data truncated: ${storedBytes} bytes expected, ${availableBytes} available`
			)
		}
	}

	return descriptor
}

function resolveMaxPixelBytes(options: DecodeOptions): number {
	const { maxPixelBytes = DEFAULT_MAX_PIXEL_BYTES } = options
	if (!Number.isSafeInteger(maxPixelBytes) || maxPixelBytes <= 0) {
		throw new RangeError(`maxPixelBytes must be a positive integer, got ${maxPixelBytes}`)
	}
	return maxPixelBytes
}

/**
 * BITMAPCOREHEADER: 16-bit dimensions, no compression, always bottom-up
 */
function readCoreHeader(reader: ByteReader): RawInfoHeader {
	return {
		width: reader.readU16LE(),
		height: reader.readU16LE(),
		planes: reader.readU16LE(),
		bitCount: reader.readU16LE(),
		compression: BmpCompression.Rgb,
		imageSize: 0,
		xPixelsPerMeter: 0,
		yPixelsPerMeter: 0,
		colorsUsed: 0,
		importantColors: 0,
		masks: null,
		colorSpaceType: null,
	}
}

/**
 * BITMAPINFOHEADER and its V2-V5 extensions
 */
function readInfoHeader(reader: ByteReader, headerSize: number): RawInfoHeader {
	const header: RawInfoHeader = {
		width: reader.readI32LE(),
		height: reader.readI32LE(),
		planes: reader.readU16LE(),
		bitCount: reader.readU16LE(),
		compression: reader.readU32LE(),
		imageSize: reader.readU32LE(),
		xPixelsPerMeter: reader.readI32LE(),
		yPixelsPerMeter: reader.readI32LE(),
		colorsUsed: reader.readU32LE(),
		importantColors: reader.readU32LE(),
		masks: null,
		colorSpaceType: null,
	}

	if (headerSize >= InfoHeaderSize.V2) {
		const red = reader.readU32LE()
		const green = reader.readU32LE()
		const blue = reader.readU32LE()
		const alpha = headerSize >= InfoHeaderSize.V3 ? reader.readU32LE() : null
		header.masks = [red, green, blue, alpha]
	}
	if (headerSize >= InfoHeaderSize.V4) {
		header.colorSpaceType = reader.readU32LE()
	}

	// Endpoints, gamma and V5 profile fields are not used for decoding
	reader.seek(FILE_HEADER_SIZE + headerSize)
	return header
}

const SUPPORTED_BITS_PER_PIXEL: readonly number[] = [1, 4, 8, 16, 24, 32]

function isBitsPerPixel(bitCount: number): bitCount is BitsPerPixel {
	return SUPPORTED_BITS_PER_PIXEL.includes(bitCount)
}

function resolveBitsPerPixel(bitCount: number): BitsPerPixel {
	if (isBitsPerPixel(bitCount)) return bitCount
	if (bitCount === 0 || bitCount === 2 || bitCount === 64) {
		throw new UnsupportedError(`${bitCount} bits per pixel is not supported`)
	}
	throw new FormatError(`Invalid bits per pixel: ${bitCount}`)
}

function resolveCompression(code: number, bitsPerPixel: BitsPerPixel): CompressionKind {
	switch (code) {
		case BmpCompression.Rgb:
			return 'none'
		case BmpCompression.Rle8:
			if (bitsPerPixel !== 8) {
				throw new FormatError(`BI_RLE8 requires 8 bits per pixel, found ${bitsPerPixel}`)
			}
			return 'rle8'
		case BmpCompression.Rle4:
			if (bitsPerPixel !== 4) {
				throw new FormatError(`BI_RLE4 requires 4 bits per pixel, found ${bitsPerPixel}`)
			}
			return 'rle4'
		case BmpCompression.Bitfields:
		case BmpCompression.AlphaBitfields:
			if (bitsPerPixel !== 16 && bitsPerPixel !== 32) {
				throw new FormatError(`Bitfield compression requires 16 or 32 bits per pixel, found ${bitsPerPixel}`)
			}
			return 'bitfields'
		case BmpCompression.Jpeg:
		case BmpCompression.Png:
			throw new UnsupportedError(`Embedded ${code === BmpCompression.Jpeg ? 'JPEG' : 'PNG'} data is not supported`)
		case BmpCompression.Cmyk:
		case BmpCompression.CmykRle8:
		case BmpCompression.CmykRle4:
			throw new UnsupportedError(`CMYK compression (${code}) is not supported`)
		default:
			throw new FormatError(`Unknown compression type: ${code}`)
	}
}
