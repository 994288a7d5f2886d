import { IllegalParameterError, UnsupportedError } from '@bmpkit/core'
import type { Pixel24 } from '@bmpkit/color'
import { describe, expect, test } from 'vitest'
import { Bitmap, createBitmap } from './bitmap'
import { BmpCodec, fromImageData, toImageData } from './codec'
import { decodeBmp } from './decoder'
import { encodeBmp } from './encoder'

function pixelsOf(count: number): Pixel24[] {
	return Array.from({ length: count }, (_, i) => ({ red: i, green: 100 + i, blue: 200 + i }))
}

function catchError(fn: () => unknown): unknown {
	try {
		fn()
	} catch (err) {
		return err
	}
	return undefined
}

describe('BMP Decoder', () => {
	test('encode writes headers then padded rows', () => {
		const encoded = encodeBmp(createBitmap(3, 2, pixelsOf(6)))

		expect(encoded.length).toBe(78)
		expect([...encoded.subarray(0, 14)]).toEqual([0x42, 0x4d, 78, 0, 0, 0, 0, 0, 0, 0, 54, 0, 0, 0])
		expect([...encoded.subarray(54)]).toEqual([
			// Row 0
			0, 100, 200, 1, 101, 201, 2, 102, 202, 0, 0, 0,
			// Row 1
			3, 103, 203, 4, 104, 204, 5, 105, 205, 0, 0, 0,
		])
	})

	test('encode needs no padding for 4-pixel rows', () => {
		const encoded = encodeBmp(createBitmap(4, 2, pixelsOf(8)))
		expect(encoded.length).toBe(54 + 24)
		expect([...encoded.subarray(66, 69)]).toEqual([4, 104, 204])
	})

	test('decode and encode roundtrip', () => {
		const sizes = [
			[1, 1],
			[3, 2],
			[4, 2],
			[2, 3],
			[7, 5],
		] as const

		for (const [w, h] of sizes) {
			const original = createBitmap(w, h, pixelsOf(w * h))
			const decoded = decodeBmp(encodeBmp(original))

			expect(decoded.width).toBe(w)
			expect(decoded.height).toBe(h)
			expect(decoded.pixels).toEqual(original.pixels)
			expect(decoded.fileHeader).toEqual(original.fileHeader)
			expect(decoded.infoHeader).toEqual(original.infoHeader)
		}
	})

	test('keeps the sign of the height', () => {
		const decoded = decodeBmp(encodeBmp(createBitmap(2, -2, pixelsOf(4))))
		expect(decoded.rawHeight).toBe(-2)
		expect(decoded.height).toBe(2)
		expect(decoded.pixelAt(1, 1)).toEqual({ red: 3, green: 103, blue: 203 })
	})

	test('ignores the contents of row padding', () => {
		const encoded = encodeBmp(createBitmap(3, 2, pixelsOf(6)))
		encoded.fill(0xff, 63, 66)
		encoded.fill(0xff, 75, 78)
		expect(decodeBmp(encoded).pixels).toEqual(pixelsOf(6))
	})

	test('reads pixels from the header offset and rewrites it on encode', () => {
		const original = encodeBmp(createBitmap(1, 1, pixelsOf(1)))
		const shifted = new Uint8Array(original.length + 2)
		shifted.set(original.subarray(0, 54), 0)
		shifted.set(original.subarray(54), 56)
		new DataView(shifted.buffer).setUint32(10, 56, true)

		const decoded = decodeBmp(shifted)
		expect(decoded.fileHeader.offset).toBe(56)
		expect(decoded.pixels).toEqual(pixelsOf(1))
		expect([...encodeBmp(decoded)]).toEqual([...original])
	})

	test('decode throws on invalid signature', () => {
		const invalid = new Uint8Array([0x00, 0x00, 0x00, 0x00])
		expect(() => decodeBmp(invalid)).toThrow(IllegalParameterError)
		expect(() => decodeBmp(invalid)).toThrow('unsupported bitmap identifier')
	})

	test('decode throws on a missing information header', () => {
		const encoded = encodeBmp(createBitmap(1, 1, pixelsOf(1)))
		expect(() => decodeBmp(encoded.subarray(0, 30))).toThrow(
			'illegal parameter: information header requires 40 bytes, got 16'
		)
	})

	test('decode reports unsupported bit depths', () => {
		const encoded = encodeBmp(createBitmap(1, 1, pixelsOf(1)))
		encoded[28] = 1
		expect(catchError(() => decodeBmp(encoded))).toBeInstanceOf(UnsupportedError)
	})

	test('decode rejects a wrong information header size', () => {
		const encoded = encodeBmp(createBitmap(1, 1, pixelsOf(1)))
		encoded[14] = 38
		const err = catchError(() => decodeBmp(encoded))
		expect(err).toBeInstanceOf(IllegalParameterError)
		expect(err).toHaveProperty('kind', 'illegal-parameter')
	})

	test('decode rejects compressed bitmaps', () => {
		const encoded = encodeBmp(createBitmap(1, 1, pixelsOf(1)))
		encoded[30] = 1 // BI_RLE8
		expect(() => decodeBmp(encoded)).toThrow('illegal parameter: unknown compression identifier: 1')
	})

	test('decode collects every truncated pixel before failing', () => {
		// 2x2: 6 pixel bytes + 2 padding bytes per row
		const encoded = encodeBmp(createBitmap(2, 2, pixelsOf(4)))
		expect(encoded.length).toBe(70)

		const err = catchError(() => decodeBmp(encoded.subarray(0, 58)))
		expect(err).toBeInstanceOf(IllegalParameterError)
		expect(err).toHaveProperty('failures', [
			'pixel (1, 0): expected exactly 3 bytes for a pixel',
			'row 1: missing, pixel data ends at byte 58',
		])
		expect(err).toHaveProperty(
			'message',
			'illegal parameter: bad pixel data\n\n' +
				'pixel (1, 0): expected exactly 3 bytes for a pixel\n' +
				'row 1: missing, pixel data ends at byte 58'
		)
	})

	test('decode accepts a final row without padding', () => {
		const encoded = encodeBmp(createBitmap(2, 2, pixelsOf(4)))
		expect(decodeBmp(encoded.subarray(0, 68)).pixels).toEqual(pixelsOf(4))

		const err = catchError(() => decodeBmp(encoded.subarray(0, 65)))
		expect(err).toHaveProperty('failures', ['pixel (1, 1): missing, pixel data ends at byte 65'])
	})

	test('decode reports the missing end of a row once', () => {
		const encoded = encodeBmp(createBitmap(4, 1, pixelsOf(4)))
		const err = catchError(() => decodeBmp(encoded.subarray(0, 58)))
		expect(err).toHaveProperty('failures', [
			'pixel (1, 0): expected exactly 3 bytes for a pixel',
			'pixels (2-3, 0): missing, pixel data ends at byte 58',
		])
	})

	test('decode work is bounded by the data, not the claimed width', () => {
		const encoded = encodeBmp(createBitmap(1, 1, pixelsOf(1)))
		new DataView(encoded.buffer).setInt32(18, 5_000_000, true)

		const err = catchError(() => decodeBmp(encoded))
		expect(err).toBeInstanceOf(IllegalParameterError)
		expect(err).toHaveProperty('failures', [
			'pixel (1, 0): expected exactly 3 bytes for a pixel',
			'pixels (2-4999999, 0): missing, pixel data ends at byte 58',
		])
	})

	test('decode handles the largest claimed width', () => {
		const encoded = encodeBmp(createBitmap(1, 1, pixelsOf(1)))
		new DataView(encoded.buffer).setInt32(18, 0x7fffffff, true)
		new DataView(encoded.buffer).setInt32(22, 0x7fffffff, true)

		const err = catchError(() => decodeBmp(encoded))
		expect(err).toHaveProperty('failures', [
			'pixel (1, 0): expected exactly 3 bytes for a pixel',
			'pixels (2-2147483646, 0): missing, pixel data ends at byte 58',
			'rows 1-2147483646: missing, pixel data ends at byte 58',
		])
	})

	test('decode skips rows that hold no pixels', () => {
		const encoded = encodeBmp(createBitmap(0, 0, []))
		new DataView(encoded.buffer).setInt32(22, 0x7fffffff, true)

		const decoded = decodeBmp(encoded)
		expect(decoded.width).toBe(0)
		expect(decoded.height).toBe(0x7fffffff)
		expect(decoded.pixels).toEqual([])
		expect(encodeBmp(decoded).length).toBe(54)
	})

	test('decode reports a run of missing rows once', () => {
		const encoded = encodeBmp(createBitmap(2, 3, pixelsOf(6)))
		const err = catchError(() => decodeBmp(encoded.subarray(0, 54)))
		expect(err).toHaveProperty('failures', ['rows 0-2: missing, pixel data ends at byte 54'])
	})

	test('decodes an empty bitmap', () => {
		const decoded = decodeBmp(encodeBmp(createBitmap(0, 0, [])))
		expect(decoded.pixels).toEqual([])
		expect(decoded.nearestMatch({ red: 0, green: 0, blue: 0 })).toBeUndefined()
	})

	test('encode recomputes the file size from the pixels', () => {
		const { format, infoHeader } = createBitmap(2, 1, pixelsOf(2))
		const stale = new Bitmap(format, { identifier: 'BM', size: 9999, reserved1: 0, reserved2: 0, offset: 54 }, infoHeader, pixelsOf(2))
		const encoded = encodeBmp(stale)
		expect(encoded.length).toBe(62)
		expect(encoded[2]).toBe(62)
		expect(encoded[3]).toBe(0)
	})
})

describe('BMP codec', () => {
	test('decodes to opaque RGBA', () => {
		const image = BmpCodec.decode(encodeBmp(createBitmap(2, 1, pixelsOf(2))))
		expect(image.width).toBe(2)
		expect(image.height).toBe(1)
		expect([...image.data]).toEqual([0, 100, 200, 255, 1, 101, 201, 255])
	})

	test('encodes RGBA dropping alpha', () => {
		const encoded = BmpCodec.encode({
			width: 2,
			height: 1,
			data: new Uint8Array([255, 0, 0, 255, 0, 255, 0, 128]),
		})

		expect(encoded[0]).toBe(0x42) // 'B'
		expect(encoded[1]).toBe(0x4d) // 'M'
		expect(decodeBmp(encoded).pixels).toEqual([
			{ red: 255, green: 0, blue: 0 },
			{ red: 0, green: 255, blue: 0 },
		])
	})

	test('converts between bitmaps and image data', () => {
		const bitmap = createBitmap(1, 2, pixelsOf(2))
		expect(fromImageData(toImageData(bitmap)).pixels).toEqual(bitmap.pixels)
		expect(() => fromImageData({ width: 2, height: 2, data: new Uint8Array(12) })).toThrow(
			IllegalParameterError
		)
	})
})
