import { ROW_ALIGNMENT, type RowPadding } from './types'

/**
 * Compute the per-row padding that aligns every stored row to 4 bytes
 *
 * Always derived from the live pixel count and row count, never from stored
 * header fields.
 */
export function computePadding(pixelCount: number, rowCount: number, bitsPerPixel: number): RowPadding {
	if (rowCount === 0) {
		return { bytesPerRow: 0, paddingPerRow: 0, paddedBytesPerImage: 0 }
	}

	const bytesPerImage = pixelCount * Math.ceil(bitsPerPixel / 8)
	const bytesPerRow = Math.floor(bytesPerImage / rowCount)

	const remainder = bytesPerRow % ROW_ALIGNMENT
	const paddingPerRow = remainder === 0 ? 0 : ROW_ALIGNMENT - remainder

	return {
		bytesPerRow,
		paddingPerRow,
		paddedBytesPerImage: (bytesPerRow + paddingPerRow) * rowCount,
	}
}
