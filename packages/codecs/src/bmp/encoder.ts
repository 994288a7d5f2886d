import type { Bitmap } from './bitmap'
import { encodeFileHeader, encodeInfoHeader } from './header'
import { computePadding } from './padding'
import { FILE_HEADER_SIZE, HEADERS_SIZE } from './types'

/**
 * Encode a bitmap to BMP bytes
 *
 * File size, pixel offset and row padding are recomputed from the pixels, so
 * a bitmap whose stored header disagrees with its content is written
 * consistently. Rows are emitted in stored order, `width` pixels each.
 */
export function encodeBmp<P>(bitmap: Bitmap<P>): Uint8Array {
	const { format, pixels, width, height } = bitmap
	const { paddingPerRow, paddedBytesPerImage } = computePadding(
		pixels.length,
		height,
		format.bitsPerPixel
	)

	const fileSize = HEADERS_SIZE + paddedBytesPerImage
	const output = new Uint8Array(fileSize) // Padding stays zero

	output.set(encodeFileHeader({ ...bitmap.fileHeader, size: fileSize, offset: HEADERS_SIZE }), 0)
	output.set(encodeInfoHeader(bitmap.infoHeader), FILE_HEADER_SIZE)

	const rowCount = width > 0 ? height : 0

	let pos = HEADERS_SIZE
	for (let y = 0; y < rowCount; y++) {
		for (const pixel of pixels.slice(y * width, (y + 1) * width)) {
			const bytes = format.encode(pixel)
			output.set(bytes, pos)
			pos += bytes.length
		}
		pos += paddingPerRow
	}

	return output
}
