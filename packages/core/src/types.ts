/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Supported image formats
 */
export type ImageFormat = 'bmp'

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T> {
	readonly format: ImageFormat
	decode(data: Uint8Array): T
	encode(input: T, options?: EncodeOptions): Uint8Array
}

/**
 * Image codec
 */
export type ImageCodec = Codec<ImageData>

/**
 * Encode options shared by every image codec
 */
export interface EncodeOptions {
	/** Keep the alpha channel even when every pixel is opaque */
	preserveAlpha?: boolean
}

/**
 * Create empty ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return {
		width,
		height,
		data: new Uint8Array(width * height * 4),
	}
}

/**
 * True when every pixel has alpha 255
 */
export function isOpaque(image: ImageData): boolean {
	const { data } = image
	for (let i = 3; i < data.length; i += 4) {
		if (data[i] !== 255) return false
	}
	return true
}
