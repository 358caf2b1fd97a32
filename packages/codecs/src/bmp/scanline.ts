/**
 * Bytes per stored row: pixel bits rounded up to a multiple of 4 bytes
 */
export function rowStride(width: number, bitsPerPixel: number): number {
	return Math.floor((bitsPerPixel * width + 31) / 32) * 4
}

/**
 * Visible (top-to-bottom) index of the `storedRow`-th row in the file
 */
export function visibleRow(storedRow: number, height: number, topDown: boolean): number {
	return topDown ? storedRow : height - 1 - storedRow
}

/**
 * Places stored rows into a top-to-bottom pixel buffer.
 *
 * Bottom-up images (positive height) store the last visible row first, so
 * stored row `r` lands at `height - 1 - r`; top-down images keep read order.
 */
export class ScanlineAssembler {
	readonly buffer: Uint8Array
	private readonly rowBytes: number

	constructor(
		readonly width: number,
		readonly height: number,
		readonly topDown: boolean,
		readonly channels: number
	) {
		this.rowBytes = width * channels
		this.buffer = new Uint8Array(this.rowBytes * height)
	}

	/** Byte offset in `buffer` where the `storedRow`-th row belongs */
	rowOffset(storedRow: number): number {
		return visibleRow(storedRow, this.height, this.topDown) * this.rowBytes
	}
}
