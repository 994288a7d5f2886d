import { FailureAccumulator } from '@bmpkit/core'
import { type Pixel24, type PixelFormat, Rgb24 } from '@bmpkit/color'
import { Bitmap } from './bitmap'
import { decodeFileHeader, decodeInfoHeader } from './header'
import { computePadding } from './padding'
import { FILE_HEADER_SIZE, HEADERS_SIZE } from './types'

/**
 * Decode a BMP file into a bitmap of the given pixel format
 *
 * Every pixel is attempted before failing; all pixel failures are reported
 * together in one IllegalParameterError.
 */
export function decodeBitmap<P>(format: PixelFormat<P>, data: Uint8Array): Bitmap<P> {
	const fileHeader = decodeFileHeader(data.subarray(0, FILE_HEADER_SIZE))
	const infoHeader = decodeInfoHeader(data.subarray(FILE_HEADER_SIZE, HEADERS_SIZE), format.bitsPerPixel)

	const width = Math.abs(infoHeader.width)
	const height = Math.abs(infoHeader.height)
	const bytesPerPixel = Math.ceil(infoHeader.bitsPerPixel / 8)

	const { paddingPerRow } = computePadding(width, 1, infoHeader.bitsPerPixel)
	const bytesPerRow = width * bytesPerPixel
	const bytesPerPaddedRow = bytesPerRow + paddingPerRow

	const failures = new FailureAccumulator()
	const pixels: P[] = []

	// Without pixel bytes there is nothing to read, however many rows are claimed
	const rowCount = bytesPerRow > 0 ? height : 0

	for (let y = 0; y < rowCount; y++) {
		const rowStart = fileHeader.offset + y * bytesPerPaddedRow

		// Whole rows past the end of the buffer are reported as one range
		if (rowStart >= data.length) {
			const rows = y === height - 1 ? `row ${y}` : `rows ${y}-${height - 1}`
			failures.record(rows, `missing, pixel data ends at byte ${data.length}`)
			break
		}

		// Only pixels with at least one byte present are read; padding is skipped
		const available = Math.min(bytesPerRow, data.length - rowStart)
		const present = Math.ceil(available / bytesPerPixel)

		for (let x = 0; x < present; x++) {
			const start = rowStart + x * bytesPerPixel
			const pixel = failures.attempt(`pixel (${x}, ${y})`, () =>
				format.decode(data.subarray(start, start + bytesPerPixel))
			)
			if (pixel !== undefined) {
				pixels.push(pixel)
			}
		}

		if (present < width) {
			const tail = present === width - 1 ? `pixel (${present}, ${y})` : `pixels (${present}-${width - 1}, ${y})`
			failures.record(tail, `missing, pixel data ends at byte ${data.length}`)
		}
	}

	failures.throwIfAny('bad pixel data')

	return new Bitmap(format, fileHeader, infoHeader, pixels)
}

/**
 * Decode a 24-bit BMP file
 */
export function decodeBmp(data: Uint8Array): Bitmap<Pixel24> {
	return decodeBitmap(Rgb24, data)
}
