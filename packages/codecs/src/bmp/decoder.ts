import { type ByteSource, ByteReader, bufferSource } from '@rasterkit/core'
import { parseHeader } from './header'
import { readPalette } from './palette'
import { decodeRow, formatChannels, selectPixelFormat } from './pixels'
import { decompressRle } from './rle'
import { ScanlineAssembler, rowStride } from './scanline'
import type { DecodeOptions, DecodeResult, ImageDescriptor } from './types'

function toSource(input: Uint8Array | ByteSource): ByteSource {
	return input instanceof Uint8Array ? bufferSource(input) : input
}

/**
 * Parse the headers only
 */
export function readBmpHeader(input: Uint8Array | ByteSource, options?: DecodeOptions): ImageDescriptor {
	return parseHeader(new ByteReader(toSource(input)), options)
}

/**
 * Decode a BMP file.
 *
 * The pixel buffer is row-major and top-to-bottom: `rgba8` when the header
 * declares an alpha mask, `rgb8` otherwise. It is only returned once every
 * row has been decoded.
 */
export function decodeBmp(input: Uint8Array | ByteSource, options?: DecodeOptions): DecodeResult {
	const reader = new ByteReader(toSource(input))
	const descriptor = parseHeader(reader, options)
	const palette = readPalette(reader, descriptor)
	const format = selectPixelFormat(descriptor, palette)

	const { width, topDown, bitsPerPixel, compression } = descriptor
	const height = Math.abs(descriptor.height)
	const channels = formatChannels(format)
	const assembler = new ScanlineAssembler(width, height, topDown, channels)

	reader.seek(descriptor.dataOffset)

	if (compression === 'rle4' || compression === 'rle8') {
		const indices = decompressRle(reader, width, height, compression === 'rle4' ? 4 : 8)
		for (let row = 0; row < height; row++) {
			const start = row * width
			decodeRow(format, indices.subarray(start, start + width), width, assembler.buffer, assembler.rowOffset(row))
		}
	} else {
		const stride = rowStride(width, bitsPerPixel)
		for (let row = 0; row < height; row++) {
			const scanline = reader.readBytes(stride)
			decodeRow(format, scanline, width, assembler.buffer, assembler.rowOffset(row))
		}
	}

	return {
		image: {
			width,
			height,
			colorType: channels === 4 ? 'rgba8' : 'rgb8',
			data: assembler.buffer,
		},
		descriptor,
		palette: palette ? palette.entries() : null,
	}
}
