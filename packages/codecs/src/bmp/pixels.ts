import { FormatError } from '@rasterkit/core'
import type { Palette } from './palette'
import type { ChannelMask, ChannelMasks, ImageDescriptor } from './types'

/**
 * Pixel layouts, selected once per image from the header
 */
export type PixelFormat =
	| { readonly kind: 'indexed'; readonly bitsPerPixel: 1 | 4 | 8; readonly palette: Palette }
	| { readonly kind: 'rle'; readonly palette: Palette }
	| { readonly kind: 'bitfields'; readonly bytesPerPixel: 2 | 4; readonly masks: ChannelMasks }
	| { readonly kind: 'bgr24' }
	| { readonly kind: 'bgrx32' }

/**
 * Widen an n-bit channel value to 8 bits.
 *
 * Narrow channels repeat their bit pattern downwards (5-bit 0b10110 becomes
 * 0b10110101), so 0 maps to 0 and the maximum maps to 255. Channels wider
 * than 8 bits keep their top 8 bits.
 */
export function expandBits(value: number, bits: number): number {
	if (bits <= 0) return 0
	if (bits >= 8) return (value >>> (bits - 8)) & 0xff

	let result = value << (8 - bits)
	for (let filled = bits; filled < 8; filled *= 2) {
		result |= result >>> filled
	}
	return result & 0xff
}

/** Lookup tables for 1..7 bit channels, indexed by channel width */
const EXPAND_TABLES: readonly Uint8Array[] = Array.from({ length: 8 }, (_, bits) =>
	Uint8Array.from({ length: bits === 0 ? 1 : 1 << bits }, (_, value) => expandBits(value, bits))
)

function readChannel(pixel: number, channel: ChannelMask): number {
	if (channel.bits === 0) return 0
	const value = (pixel & channel.mask) >>> channel.shift
	return channel.bits >= 8 ? value >>> (channel.bits - 8) : EXPAND_TABLES[channel.bits][value]
}

/**
 * Pick the pixel layout for a parsed header
 */
export function selectPixelFormat(descriptor: ImageDescriptor, palette: Palette | null): PixelFormat {
	const { bitsPerPixel, compression, masks } = descriptor

	if (bitsPerPixel <= 8) {
		if (!palette) {
			throw new FormatError(`${bitsPerPixel} bpp bitmap has no palette`)
		}
		if (compression === 'rle4' || compression === 'rle8') {
			return { kind: 'rle', palette }
		}
		if (bitsPerPixel === 1 || bitsPerPixel === 4 || bitsPerPixel === 8) {
			return { kind: 'indexed', bitsPerPixel, palette }
		}
	}

	if (bitsPerPixel === 24) return { kind: 'bgr24' }
	if (bitsPerPixel === 32 && compression === 'none') return { kind: 'bgrx32' }
	if ((bitsPerPixel === 16 || bitsPerPixel === 32) && masks) {
		return { kind: 'bitfields', bytesPerPixel: bitsPerPixel === 16 ? 2 : 4, masks }
	}

	throw new FormatError(`No pixel layout for ${bitsPerPixel} bpp with ${compression} compression`)
}

/**
 * Output channels produced by a layout
 */
export function formatChannels(format: PixelFormat): 3 | 4 {
	return format.kind === 'bitfields' && format.masks.alpha ? 4 : 3
}

/**
 * Decode `width` pixels of one row into `out` starting at `offset`.
 *
 * `src` holds the stored row (padding is ignored) or, for `rle`, one palette
 * index per pixel.
 */
export function decodeRow(
	format: PixelFormat,
	src: Uint8Array,
	width: number,
	out: Uint8Array,
	offset: number
): void {
	switch (format.kind) {
		case 'indexed': {
			const { palette, bitsPerPixel } = format
			for (let x = 0; x < width; x++) {
				let index: number
				if (bitsPerPixel === 1) {
					index = (src[x >> 3] >> (7 - (x & 7))) & 1
				} else if (bitsPerPixel === 4) {
					const byte = src[x >> 1]
					index = x & 1 ? byte & 0x0f : byte >> 4
				} else {
					index = src[x]
				}
				palette.resolve(index, out, offset + x * 3)
			}
			break
		}

		case 'rle': {
			for (let x = 0; x < width; x++) {
				format.palette.resolve(src[x], out, offset + x * 3)
			}
			break
		}

		case 'bitfields': {
			const { red, green, blue, alpha } = format.masks
			const channels = alpha ? 4 : 3
			for (let x = 0; x < width; x++) {
				let pixel: number
				if (format.bytesPerPixel === 2) {
					const src16 = x * 2
					pixel = src[src16] | (src[src16 + 1] << 8)
				} else {
					const src32 = x * 4
					pixel =
						(src[src32] | (src[src32 + 1] << 8) | (src[src32 + 2] << 16) | (src[src32 + 3] << 24)) >>> 0
				}
				const dst = offset + x * channels
				out[dst] = readChannel(pixel, red)
				out[dst + 1] = readChannel(pixel, green)
				out[dst + 2] = readChannel(pixel, blue)
				if (alpha) out[dst + 3] = readChannel(pixel, alpha)
			}
			break
		}

		case 'bgr24': {
			for (let x = 0; x < width; x++) {
				const s = x * 3
				const d = offset + s
				out[d] = src[s + 2]
				out[d + 1] = src[s + 1]
				out[d + 2] = src[s]
			}
			break
		}

		case 'bgrx32': {
			// Fourth byte is reserved in BI_RGB data; alpha needs an explicit mask
			for (let x = 0; x < width; x++) {
				const s = x * 4
				const d = offset + x * 3
				out[d] = src[s + 2]
				out[d + 1] = src[s + 1]
				out[d + 2] = src[s]
			}
			break
		}
	}
}
