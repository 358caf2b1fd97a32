import {
	type EncodeOptions,
	FormatError,
	type ImageCodec,
	type ImageData,
	createImageData,
	isOpaque,
} from '@rasterkit/core'
import { decodeBmp } from './decoder'
import { encodeBmp } from './encoder'
import type { PixelBuffer } from './types'

/**
 * Expand a decoded pixel buffer to RGBA; missing alpha becomes 255
 */
export function toRgba(pixels: PixelBuffer): ImageData {
	if (pixels.colorType === 'rgba8') {
		return { width: pixels.width, height: pixels.height, data: pixels.data }
	}

	const image = createImageData(pixels.width, pixels.height)
	const gray = pixels.colorType === 'l8'
	const channels = gray ? 1 : 3
	const count = pixels.width * pixels.height
	for (let i = 0; i < count; i++) {
		const src = i * channels
		const dst = i * 4
		image.data[dst] = pixels.data[src]
		image.data[dst + 1] = pixels.data[gray ? src : src + 1]
		image.data[dst + 2] = pixels.data[gray ? src : src + 2]
		image.data[dst + 3] = 255
	}
	return image
}

/**
 * BMP codec implementation
 *
 * Opaque images are written as 24 bpp; anything with transparency, or any
 * image when `preserveAlpha` is set, as 32 bpp with an alpha mask.
 */
export const BmpCodec: ImageCodec = {
	format: 'bmp',

	decode(data: Uint8Array): ImageData {
		return toRgba(decodeBmp(data).image)
	},

	encode(image: ImageData, options?: EncodeOptions): Uint8Array {
		const expectedLength = image.width * image.height * 4
		if (image.data.length !== expectedLength) {
			throw new FormatError(
				`Pixel data has ${image.data.length} bytes, expected ${expectedLength} for ${image.width}x${image.height} rgba8`
			)
		}
		if (!options?.preserveAlpha && isOpaque(image)) {
			const rgb = new Uint8Array(image.width * image.height * 3)
			for (let src = 0, dst = 0; src < image.data.length; src += 4, dst += 3) {
				rgb[dst] = image.data[src]
				rgb[dst + 1] = image.data[src + 1]
				rgb[dst + 2] = image.data[src + 2]
			}
			return encodeBmp({ width: image.width, height: image.height, colorType: 'rgb8', data: rgb })
		}
		return encodeBmp({ ...image, colorType: 'rgba8' })
	},
}
