import { IllegalParameterError } from '@bmpkit/core'
import { describe, expect, it } from 'vitest'
import {
	distance,
	fromBytes,
	fromHex,
	fromHsv,
	isBlack,
	isWhite,
	rgb,
	Rgb24,
	toBytes,
	toHex,
} from './index'

describe('Color', () => {
	describe('bytes', () => {
		it('should decode exactly three bytes', () => {
			expect(fromBytes(new Uint8Array([1, 2, 3]))).toEqual({ red: 1, green: 2, blue: 3 })
		})

		it('should reject other lengths', () => {
			expect(() => fromBytes(new Uint8Array([1, 2]))).toThrow(IllegalParameterError)
			expect(() => fromBytes(new Uint8Array([1, 2, 3, 4]))).toThrow(
				'illegal parameter: expected exactly 3 bytes for a pixel'
			)
		})

		it('should serialize in R, G, B order', () => {
			expect([...toBytes({ red: 10, green: 20, blue: 30 })]).toEqual([10, 20, 30])
		})
	})

	describe('rgb', () => {
		it('should accept byte channels', () => {
			expect(rgb(0, 128, 255)).toEqual({ red: 0, green: 128, blue: 255 })
		})

		it('should reject out of range or fractional channels', () => {
			expect(() => rgb(256, 0, 0)).toThrow(IllegalParameterError)
			expect(() => rgb(-1, 0, 0)).toThrow(IllegalParameterError)
			expect(() => rgb(0, 1.5, 0)).toThrow(IllegalParameterError)
		})
	})

	describe('hex', () => {
		it('should parse #RRGGBB', () => {
			expect(fromHex('#4CAF50')).toEqual({ red: 76, green: 175, blue: 80 })
			expect(fromHex('#ff00aa')).toEqual({ red: 255, green: 0, blue: 170 })
		})

		it('should reject malformed strings', () => {
			expect(() => fromHex('#abc')).toThrow(IllegalParameterError)
			expect(() => fromHex('4CAF50F')).toThrow(IllegalParameterError)
			expect(() => fromHex('#4CAG50')).toThrow(IllegalParameterError)
			expect(() => fromHex('')).toThrow(IllegalParameterError)
		})

		it('should format back to upper-case hex', () => {
			expect(toHex({ red: 76, green: 175, blue: 80 })).toBe('#4CAF50')
			expect(toHex({ red: 0, green: 10, blue: 255 })).toBe('#000AFF')
		})
	})

	describe('hsv', () => {
		it('should convert the primary cases', () => {
			expect(fromHsv(0, 0, 1)).toEqual({ red: 255, green: 255, blue: 255 })
			expect(fromHsv(0, 1, 1)).toEqual({ red: 255, green: 0, blue: 0 })
			expect(fromHsv(0, 0, 0)).toEqual({ red: 0, green: 0, blue: 0 })
		})

		it('should use the sector parity for the intermediate component', () => {
			// 90 degrees: odd sector, x == c
			expect(fromHsv(0.25, 1, 1)).toEqual({ red: 255, green: 255, blue: 0 })
			// 180 degrees: odd sector, x == c
			expect(fromHsv(0.5, 1, 1)).toEqual({ red: 0, green: 255, blue: 255 })
			// 270 degrees: even sector, x == 0
			expect(fromHsv(0.75, 1, 1)).toEqual({ red: 0, green: 0, blue: 255 })
		})

		it('should round the offset channels', () => {
			expect(fromHsv(0, 0.5, 1)).toEqual({ red: 255, green: 128, blue: 128 })
		})

		it('should reject values outside the domain', () => {
			expect(() => fromHsv(1, 0, 0)).toThrow('illegal parameter: hue must be in the range of [0.0, 1.0)')
			expect(() => fromHsv(-0.1, 0, 0)).toThrow(IllegalParameterError)
			expect(() => fromHsv(0, 1.1, 0)).toThrow('saturation must be in range of [0.0, 1.0]')
			expect(() => fromHsv(0, 0, -1)).toThrow('value must be in range of [0.0, 1.0]')
			expect(() => fromHsv(Number.NaN, 0, 0)).toThrow(IllegalParameterError)
		})
	})

	describe('predicates', () => {
		it('should match pure black and white only', () => {
			expect(isBlack({ red: 0, green: 0, blue: 0 })).toBe(true)
			expect(isBlack({ red: 0, green: 0, blue: 1 })).toBe(false)
			expect(isWhite({ red: 255, green: 255, blue: 255 })).toBe(true)
			expect(isWhite({ red: 255, green: 254, blue: 255 })).toBe(false)
		})
	})

	describe('distance', () => {
		it('should be euclidean over channels', () => {
			expect(distance({ red: 0, green: 0, blue: 0 }, { red: 3, green: 4, blue: 0 })).toBe(5)
			expect(distance({ red: 10, green: 10, blue: 10 }, { red: 10, green: 10, blue: 10 })).toBe(0)
		})
	})

	describe('Rgb24', () => {
		it('should describe the 24-bit format', () => {
			expect(Rgb24.bitsPerPixel).toBe(24)
			expect(Rgb24.pixelsPerMeter).toBe(2835)
			expect(Rgb24.decode(new Uint8Array([7, 8, 9]))).toEqual({ red: 7, green: 8, blue: 9 })
			expect([...Rgb24.encode({ red: 7, green: 8, blue: 9 })]).toEqual([7, 8, 9])
		})
	})
})
