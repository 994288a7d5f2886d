import { IllegalParameterError } from '@bmpkit/core'
import { type Pixel24, type PixelFormat, Rgb24 } from '@bmpkit/color'
import { createFileHeader, createInfoHeader } from './header'
import { computePadding } from './padding'
import { type FileHeader, HEADERS_SIZE, type InfoHeader, type PixelLocation } from './types'

const I32_MIN = -0x80000000
const I32_MAX = 0x7fffffff

/**
 * Dimensions are stored as signed 32-bit header fields
 */
function checkDimension(name: string, value: number): void {
	if (!Number.isInteger(value) || value < I32_MIN || value > I32_MAX) {
		throw new IllegalParameterError(`${name} must be an integer in [${I32_MIN}, ${I32_MAX}], got ${value}`)
	}
}

/**
 * An in-memory bitmap: both headers plus the row-major pixel grid
 *
 * Instances are immutable. Build one with {@link createBitmap},
 * {@link Bitmap.fromPixels} or by decoding bytes.
 */
export class Bitmap<P> {
	readonly pixels: readonly P[]

	constructor(
		readonly format: PixelFormat<P>,
		readonly fileHeader: FileHeader,
		readonly infoHeader: InfoHeader,
		pixels: readonly P[]
	) {
		checkDimension('width', infoHeader.width)
		checkDimension('height', infoHeader.height)

		const expected = Math.abs(infoHeader.width) * Math.abs(infoHeader.height)
		if (pixels.length !== expected) {
			throw new IllegalParameterError(
				`pixel length is not equal to width * height (${pixels.length} != ${expected})`
			)
		}
		this.pixels = Object.freeze([...pixels])
	}

	/**
	 * Build a bitmap from dimensions and pixels, deriving both headers
	 *
	 * The height is stored with the sign given.
	 */
	static fromPixels<P>(
		format: PixelFormat<P>,
		width: number,
		height: number,
		pixels: readonly P[]
	): Bitmap<P> {
		checkDimension('width', width)
		checkDimension('height', height)

		const rowCount = Math.abs(height)
		if (pixels.length !== Math.abs(width) * rowCount) {
			throw new IllegalParameterError('pixel length is not equal to width * height')
		}

		const { paddedBytesPerImage } = computePadding(pixels.length, rowCount, format.bitsPerPixel)
		return new Bitmap(
			format,
			createFileHeader(HEADERS_SIZE + paddedBytesPerImage, HEADERS_SIZE),
			createInfoHeader(width, height, format.bitsPerPixel, format.pixelsPerMeter),
			pixels
		)
	}

	/** Width in pixels */
	get width(): number {
		return Math.abs(this.infoHeader.width)
	}

	/** Height in pixels */
	get height(): number {
		return Math.abs(this.infoHeader.height)
	}

	get rawWidth(): number {
		return this.infoHeader.width
	}

	/**
	 * Signed height as stored: negative means rows run top-to-bottom,
	 * positive bottom-to-top
	 */
	get rawHeight(): number {
		return this.infoHeader.height
	}

	/**
	 * Pixel at column `x`, row `y`, or undefined outside the grid
	 */
	pixelAt(x: number, y: number): P | undefined {
		const { width, height } = this
		if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0) {
			return undefined
		}
		if (x >= width || y >= height) {
			return undefined
		}
		return this.pixels[y * width + x]
	}

	/**
	 * Find the location of the pixel closest to `target`
	 *
	 * Scans row by row; on ties the first location wins. Returns undefined
	 * only for an empty bitmap.
	 */
	nearestMatch(target: P): PixelLocation | undefined {
		const { width } = this
		let bestDistance = Number.POSITIVE_INFINITY
		let best: PixelLocation | undefined

		for (const [index, pixel] of this.pixels.entries()) {
			const d = this.format.distance(pixel, target)
			if (d < bestDistance) {
				bestDistance = d
				best = { x: index % width, y: Math.floor(index / width) }
			}
		}

		return best
	}
}

/**
 * Create a 24-bit bitmap from dimensions and row-major pixels
 */
export function createBitmap(width: number, height: number, pixels: readonly Pixel24[]): Bitmap<Pixel24> {
	return Bitmap.fromPixels(Rgb24, width, height, pixels)
}
