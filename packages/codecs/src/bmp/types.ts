/**
 * BMP format types and constants
 */

export const FILE_HEADER_SIZE = 14

/** "BM" read as a little-endian uint16 */
export const BMP_SIGNATURE = 0x4d42

/** OS/2 bitmap array, colour icon, colour pointer, icon and pointer signatures */
export const OS2_SIGNATURES: ReadonlySet<string> = new Set(['BA', 'CI', 'CP', 'IC', 'PT'])

/** Default limit on decoded pixel storage (512 MiB) */
export const DEFAULT_MAX_PIXEL_BYTES = 512 * 1024 * 1024

/** Horizontal and vertical resolution written by the encoder (~72 DPI) */
export const DEFAULT_PIXELS_PER_METER = 2835

/**
 * Compression field values (biCompression)
 */
export enum BmpCompression {
	Rgb = 0,
	Rle8 = 1,
	Rle4 = 2,
	Bitfields = 3,
	Jpeg = 4,
	Png = 5,
	AlphaBitfields = 6,
	Cmyk = 11,
	CmykRle8 = 12,
	CmykRle4 = 13,
}

/**
 * Information header sizes (biSize)
 */
export enum InfoHeaderSize {
	Core = 12,
	Os2Short = 16,
	Info = 40,
	V2 = 52,
	V3 = 56,
	Os2 = 64,
	V4 = 108,
	V5 = 124,
}

export type HeaderKind =
	| 'BITMAPCOREHEADER'
	| 'BITMAPINFOHEADER'
	| 'BITMAPV2INFOHEADER'
	| 'BITMAPV3INFOHEADER'
	| 'BITMAPV4HEADER'
	| 'BITMAPV5HEADER'

export type BitsPerPixel = 1 | 4 | 8 | 16 | 24 | 32

export type CompressionKind = 'none' | 'rle4' | 'rle8' | 'bitfields'

/**
 * One colour channel of a bitfield layout
 */
export interface ChannelMask {
	readonly mask: number
	readonly shift: number
	readonly bits: number
}

export interface ChannelMasks {
	readonly red: ChannelMask
	readonly green: ChannelMask
	readonly blue: ChannelMask
	readonly alpha: ChannelMask | null
}

/**
 * Normalized view of the file and information headers
 */
export interface ImageDescriptor {
	readonly headerKind: HeaderKind
	readonly headerSize: number
	/** bfSize as declared; not trusted for any bound */
	readonly fileSize: number
	readonly dataOffset: number
	readonly width: number
	/** Signed height as stored; negative means rows are stored top-down */
	readonly height: number
	readonly topDown: boolean
	readonly planes: number
	readonly bitsPerPixel: BitsPerPixel
	readonly compression: CompressionKind
	readonly paletteOffset: number
	readonly paletteSize: number
	readonly paletteEntrySize: 3 | 4
	/** Channel layout for 16 and 32 bpp images, defaulted when the header declares none */
	readonly masks: ChannelMasks | null
	readonly imageSize: number
	readonly xPixelsPerMeter: number
	readonly yPixelsPerMeter: number
	readonly importantColors: number
	/** bV4CSType / bV5CSType, reported but never applied */
	readonly colorSpaceType: number | null
}

export interface PaletteEntry {
	readonly red: number
	readonly green: number
	readonly blue: number
	readonly reserved?: number
}

/**
 * Channel layouts of a PixelBuffer. `l8` is accepted by the encoder only.
 */
export type ColorType = 'l8' | 'rgb8' | 'rgba8'

/**
 * Row-major, top-to-bottom pixel storage
 */
export interface PixelBuffer {
	readonly width: number
	readonly height: number
	readonly colorType: ColorType
	readonly data: Uint8Array // length = width * height * channelCount(colorType)
}

export interface DecodeOptions {
	/** Reject images whose decoded pixels would need more bytes than this */
	maxPixelBytes?: number
}

export interface DecodeResult {
	readonly image: PixelBuffer
	readonly descriptor: ImageDescriptor
	/** Colour table of indexed images, null above 8 bpp */
	readonly palette: readonly PaletteEntry[] | null
}

export interface BmpEncodeOptions {
	/** Target depth; defaults to 8 for l8, 24 for rgb8 and 32 for rgba8 */
	bitsPerPixel?: BitsPerPixel
	/** Colour table for 1, 4 and 8 bpp targets */
	palette?: readonly PaletteEntry[]
	/** Store rows top-down (negative height) instead of bottom-up */
	topDown?: boolean
}

export function channelCount(colorType: ColorType): 1 | 3 | 4 {
	switch (colorType) {
		case 'l8':
			return 1
		case 'rgb8':
			return 3
		case 'rgba8':
			return 4
	}
}
