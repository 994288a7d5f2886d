/**
 * Flag grid record encoding
 *
 * The grid is stored column-major as fixed-size text records `X:Y,` where X
 * and Y are fractions of the palette's width and height; the last record ends
 * with NUL instead of a comma. Bitmaps are row-major, so both directions
 * transpose.
 */

import { FailureAccumulator } from '@bmpkit/core'
import type { Pixel24 } from '@bmpkit/color'
import type { Bitmap, PixelLocation } from '@bmpkit/codecs'
import { FlagError } from './errors'
import {
	COORDINATE_DIVIDER,
	DEFAULT_FLAG_SIZE,
	FLAG_RECORD_SIZE,
	type FlagGridSize,
	RECORD_END,
	RECORD_SEPARATOR,
} from './types'

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Reorder a row-major sequence into column-major
 */
export function toColumnMajor<T>(items: readonly T[], size: FlagGridSize): T[] {
	const result: T[] = []
	for (let x = 0; x < size.width; x++) {
		for (let y = 0; y < size.height; y++) {
			const item = items[y * size.width + x]
			if (item !== undefined) result.push(item)
		}
	}
	return result
}

/**
 * Reorder a column-major sequence into row-major
 */
export function toRowMajor<T>(items: readonly T[], size: FlagGridSize): T[] {
	const result: T[] = []
	for (let y = 0; y < size.height; y++) {
		for (let x = 0; x < size.width; x++) {
			const item = items[x * size.height + y]
			if (item !== undefined) result.push(item)
		}
	}
	return result
}

function parseCoordinate(bytes: Uint8Array, axis: 'x' | 'y'): number {
	let text: string
	try {
		text = utf8.decode(bytes)
	} catch (err) {
		throw new Error(`${axis}-coordinate was not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`)
	}

	if (!DECIMAL_PATTERN.test(text)) {
		throw new Error(`${axis}-coordinate (${text}) was not a valid float`)
	}

	// Percentages are accepted too
	const value = Number(text)
	return value > 1 ? value / 100 : value
}

/**
 * Resolve one record to the palette pixel it points at
 */
function parseRecord(record: Uint8Array, isLast: boolean, palette: Bitmap<Pixel24>): Pixel24 {
	const expectedEnd = isLast ? RECORD_END : RECORD_SEPARATOR
	const actualEnd = record[FLAG_RECORD_SIZE - 1]
	if (actualEnd !== expectedEnd) {
		throw new Error(`contains an invalid last character (expected: ${expectedEnd}, got: ${actualEnd})`)
	}

	const divider = record.indexOf(COORDINATE_DIVIDER)
	if (divider === -1) {
		throw new Error('is missing the expected divider character (:)')
	}

	const x = parseCoordinate(record.subarray(0, divider), 'x')
	const y = parseCoordinate(record.subarray(divider + 1, FLAG_RECORD_SIZE - 1), 'y')

	const px = Math.max(0, Math.trunc(x * palette.width))
	const py = Math.max(0, Math.trunc(y * palette.height))

	const pixel = palette.pixelAt(px, py)
	if (pixel === undefined) {
		throw new Error(`failed to resolve palette pixel (${px}, ${py})`)
	}
	return pixel
}

/**
 * Decode stored flag records into row-major pixels looked up in `palette`
 *
 * Every record is checked; all bad records are reported in one error.
 */
export function parseFlagRecords(
	raw: Uint8Array,
	palette: Bitmap<Pixel24>,
	size: FlagGridSize = DEFAULT_FLAG_SIZE
): Pixel24[] {
	if (raw.length === 0) {
		throw new FlagError('unexpected-value', 'flag data is missing')
	}

	if (raw.length % FLAG_RECORD_SIZE !== 0) {
		throw new FlagError(
			'unexpected-value',
			`raw flag data length is not divisible by the pixel size (${FLAG_RECORD_SIZE})`
		)
	}

	const expected = size.width * size.height
	const count = raw.length / FLAG_RECORD_SIZE
	if (count !== expected) {
		throw new FlagError('unexpected-value', `expected ${expected} flag records, got ${count}`)
	}

	const columnMajor: Uint8Array[] = []
	for (let i = 0; i < count; i++) {
		columnMajor.push(raw.subarray(i * FLAG_RECORD_SIZE, (i + 1) * FLAG_RECORD_SIZE))
	}
	const records = toRowMajor(columnMajor, size)

	const failures = new FailureAccumulator()
	const pixels: Pixel24[] = []
	records.forEach((record, i) => {
		const pixel = failures.attempt(`pixel ${i}`, () => parseRecord(record, i === records.length - 1, palette))
		if (pixel !== undefined) pixels.push(pixel)
	})

	if (failures.count > 0) {
		throw new FlagError('unexpected-value', 'bad pixels', failures.entries)
	}

	return pixels
}

function formatRecord(location: PixelLocation, palette: Bitmap<Pixel24>, isLast: boolean): string {
	const x = (location.x / palette.width).toFixed(2)
	const y = (location.y / palette.height).toFixed(2)
	return `${x}:${y}${isLast ? '\0' : ','}`
}

/**
 * Encode a flag bitmap as stored records, mapping every pixel to its nearest
 * palette color
 */
export function formatFlagRecords(
	flag: Bitmap<Pixel24>,
	palette: Bitmap<Pixel24>,
	size: FlagGridSize = DEFAULT_FLAG_SIZE
): Uint8Array {
	if (flag.width !== size.width || flag.height !== size.height) {
		throw new FlagError(
			'unexpected-value',
			`flag image must be ${size.width}x${size.height}, got ${flag.width}x${flag.height}`
		)
	}

	const pixels = toColumnMajor(flag.pixels, size)
	const failures = new FailureAccumulator()
	const locations: PixelLocation[] = []

	pixels.forEach((pixel, i) => {
		const location = palette.nearestMatch(pixel)
		if (location === undefined) {
			failures.record(`pixel ${i}`, 'failed to find match for pixel')
		} else {
			locations.push(location)
		}
	})

	if (failures.count > 0) {
		throw new FlagError('unexpected-value', 'error mapping pixels', failures.entries)
	}

	const text = locations.map((location, i) => formatRecord(location, palette, i === locations.length - 1)).join('')
	return new TextEncoder().encode(text)
}
