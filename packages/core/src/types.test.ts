import { describe, expect, test } from 'vitest'
import { createImageData, isOpaque } from './types'

describe('ImageData helpers', () => {
	test('createImageData allocates zeroed RGBA storage', () => {
		const image = createImageData(3, 2)

		expect(image.width).toBe(3)
		expect(image.height).toBe(2)
		expect(image.data.length).toBe(24)
		expect(image.data.every((v) => v === 0)).toBe(true)
	})

	test('isOpaque checks every alpha byte', () => {
		const image = createImageData(2, 1)
		image.data.set([1, 2, 3, 255, 4, 5, 6, 255])
		expect(isOpaque(image)).toBe(true)

		image.data[7] = 254
		expect(isOpaque(image)).toBe(false)
	})
})
