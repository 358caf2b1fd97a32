import { type ByteReader, FormatError } from '@rasterkit/core'
import type { ImageDescriptor, PaletteEntry } from './types'

/**
 * Colour table resolved to packed RGB triplets.
 * Read-only once built; lookups are bounds-checked.
 */
export class Palette {
	private constructor(
		readonly size: number,
		private readonly rgb: Uint8Array,
		private readonly reserved: Uint8Array
	) {}

	/**
	 * Build from stored entries (B, G, R[, reserved])
	 */
	static fromStored(bytes: Uint8Array, entrySize: 3 | 4): Palette {
		const size = Math.floor(bytes.length / entrySize)
		const rgb = new Uint8Array(size * 3)
		const reserved = new Uint8Array(size)
		for (let i = 0; i < size; i++) {
			const src = i * entrySize
			rgb[i * 3] = bytes[src + 2]
			rgb[i * 3 + 1] = bytes[src + 1]
			rgb[i * 3 + 2] = bytes[src]
			reserved[i] = entrySize === 4 ? bytes[src + 3] : 0
		}
		return new Palette(size, rgb, reserved)
	}

	/**
	 * Copy the colour at `index` into `out` as R, G, B
	 */
	resolve(index: number, out: Uint8Array, offset: number): void {
		if (index >= this.size) {
			throw new FormatError(`Palette index ${index} out of range (palette has ${this.size} entries)`)
		}
		const src = index * 3
		out[offset] = this.rgb[src]
		out[offset + 1] = this.rgb[src + 1]
		out[offset + 2] = this.rgb[src + 2]
	}

	entries(): PaletteEntry[] {
		const entries: PaletteEntry[] = []
		for (let i = 0; i < this.size; i++) {
			entries.push({
				red: this.rgb[i * 3],
				green: this.rgb[i * 3 + 1],
				blue: this.rgb[i * 3 + 2],
				reserved: this.reserved[i],
			})
		}
		return entries
	}
}

/**
 * Read the colour table of an indexed image; null above 8 bpp
 */
export function readPalette(reader: ByteReader, descriptor: ImageDescriptor): Palette | null {
	if (descriptor.bitsPerPixel > 8) return null

	reader.seek(descriptor.paletteOffset)
	const bytes = reader.readBytes(descriptor.paletteSize * descriptor.paletteEntrySize)
	return Palette.fromStored(bytes, descriptor.paletteEntrySize)
}
