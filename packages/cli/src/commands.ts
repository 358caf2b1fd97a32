import { rmSync } from 'node:fs'
import {
	type BitsPerPixel,
	type DecodeResult,
	type ImageDescriptor,
	type PaletteEntry,
	type PixelBuffer,
	channelCount,
	decodeBmp,
	readBmpHeader,
	writeBmp,
} from '@rasterkit/codecs'
import { FormatError, UnsupportedError, isCodecError } from '@rasterkit/core'
import type { CliOptions } from './args'
import { FileSink, fileSource, withFile } from './file-io'
import type { Logger } from './logger'

export enum ExitCode {
	Ok = 0,
	Failure = 1,
	Usage = 2,
	/** Every input was a BMP variant that is recognised but not implemented */
	Unsupported = 3,
}

function hex(mask: number): string {
	return `0x${mask.toString(16).padStart(8, '0')}`
}

/**
 * Header summary, one line per field
 */
export function describeHeader(descriptor: ImageDescriptor): string[] {
	const { headerKind, headerSize, width, height, topDown, bitsPerPixel, compression, masks } = descriptor
	const lines = [
		`  header:      ${headerKind} (${headerSize} bytes)`,
		`  dimensions:  ${width}x${Math.abs(height)}, ${topDown ? 'top-down' : 'bottom-up'}`,
		`  depth:       ${bitsPerPixel} bpp, ${compression}`,
	]
	if (bitsPerPixel <= 8) {
		lines.push(`  palette:     ${descriptor.paletteSize} entries`)
	}
	if (masks) {
		const alpha = masks.alpha ? hex(masks.alpha.mask) : 'none'
		lines.push(
			`  masks:       red ${hex(masks.red.mask)}, green ${hex(masks.green.mask)}, blue ${hex(masks.blue.mask)}, alpha ${alpha}`
		)
	}
	lines.push(`  data offset: ${descriptor.dataOffset}`)
	return lines
}

/**
 * Log a codec error against `label`; anything else is rethrown
 */
function report(error: unknown, label: string, logger: Logger): ExitCode {
	if (error instanceof UnsupportedError) {
		logger.warn(`${label}: skipped, ${error.message}`)
		return ExitCode.Unsupported
	}
	if (isCodecError(error)) {
		logger.error(`${label}: ${error.message}`)
		return ExitCode.Failure
	}
	throw error
}

/**
 * Print the headers of each file. Unsupported files are skipped with a warning.
 */
export function runInfo(inputs: readonly string[], options: CliOptions, logger: Logger): ExitCode {
	let failed = 0
	let unsupported = 0

	for (const path of inputs) {
		try {
			const descriptor = withFile(path, 'r', (fd) =>
				readBmpHeader(fileSource(fd), { maxPixelBytes: options.maxBytes })
			)
			logger.info(path)
			for (const line of describeHeader(descriptor)) logger.info(line)
			logger.debug(`  resolution:  ${descriptor.xPixelsPerMeter}x${descriptor.yPixelsPerMeter} pixels per metre`)
		} catch (error) {
			if (report(error, path, logger) === ExitCode.Unsupported) unsupported++
			else failed++
		}
	}

	if (failed > 0) return ExitCode.Failure
	if (unsupported === inputs.length) return ExitCode.Unsupported
	return ExitCode.Ok
}

function dropAlpha(image: PixelBuffer): PixelBuffer {
	const count = image.width * image.height
	const data = new Uint8Array(count * 3)
	for (let i = 0; i < count; i++) {
		data[i * 3] = image.data[i * 4]
		data[i * 3 + 1] = image.data[i * 4 + 1]
		data[i * 3 + 2] = image.data[i * 4 + 2]
	}
	return { width: image.width, height: image.height, colorType: 'rgb8', data }
}

/**
 * Colour table for an indexed target: the source palette when the depth is
 * unchanged, otherwise the image's distinct colours in order of appearance
 */
export function choosePalette(
	decoded: DecodeResult,
	pixels: PixelBuffer,
	bitsPerPixel: BitsPerPixel
): readonly PaletteEntry[] {
	if (decoded.palette && decoded.descriptor.bitsPerPixel === bitsPerPixel) {
		return decoded.palette
	}

	const maxColors = 1 << bitsPerPixel
	const colors = new Map<number, PaletteEntry>()
	const channels = channelCount(pixels.colorType)
	const { data } = pixels
	for (let i = 0; i < data.length; i += channels) {
		const red = data[i]
		const green = channels === 1 ? red : data[i + 1]
		const blue = channels === 1 ? red : data[i + 2]
		const key = (red << 16) | (green << 8) | blue
		if (colors.has(key)) continue
		if (colors.size === maxColors) {
			throw new FormatError(`Image has more than ${maxColors} colours; ${bitsPerPixel} bpp cannot hold them`)
		}
		colors.set(key, { red, green, blue })
	}
	return [...colors.values()]
}

/**
 * Decode `input` and write it to `output` at the requested depth.
 * A failed write leaves no output file behind.
 */
export function runConvert(input: string, output: string, options: CliOptions, logger: Logger): ExitCode {
	let decoded: DecodeResult
	try {
		decoded = withFile(input, 'r', (fd) => decodeBmp(fileSource(fd), { maxPixelBytes: options.maxBytes }))
	} catch (error) {
		return report(error, input, logger)
	}

	const { image, descriptor } = decoded
	logger.debug(
		`Decoded ${image.width}x${image.height} ${image.colorType} from ${descriptor.headerKind}, ${descriptor.bitsPerPixel} bpp ${descriptor.compression}`
	)

	const bitsPerPixel = options.bits ?? (image.colorType === 'rgba8' ? 32 : 24)
	let pixels = image
	if (pixels.colorType === 'rgba8' && bitsPerPixel !== 32) {
		logger.warn(`${input}: alpha channel dropped at ${bitsPerPixel} bpp`)
		pixels = dropAlpha(pixels)
	}

	let created = false
	try {
		const palette = bitsPerPixel <= 8 ? choosePalette(decoded, pixels, bitsPerPixel) : undefined
		const written = withFile(output, 'w', (fd) => {
			created = true
			const sink = new FileSink(fd)
			writeBmp(pixels, sink, { bitsPerPixel, palette, topDown: options.topDown })
			return sink.bytesWritten
		})
		logger.info(`${input} -> ${output}`)
		logger.debug(`Wrote ${written} bytes at ${bitsPerPixel} bpp${options.topDown ? ', top-down' : ''}`)
		return ExitCode.Ok
	} catch (error) {
		if (created) rmSync(output, { force: true })
		return report(error, output, logger)
	}
}
