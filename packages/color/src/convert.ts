/**
 * Color constructors and conversion utilities
 */

import { IllegalParameterError } from '@bmpkit/core'
import type { Pixel24, RGB } from './types'

const HEX_PATTERN = /^#[0-9a-fA-F]{6}$/

function isChannel(value: number): boolean {
	return Number.isInteger(value) && value >= 0 && value <= 255
}

/**
 * Create a pixel from channel values (integers 0-255)
 */
export function rgb(red: number, green: number, blue: number): Pixel24 {
	if (!isChannel(red) || !isChannel(green) || !isChannel(blue)) {
		throw new IllegalParameterError(`channels must be integers in [0, 255], got (${red}, ${green}, ${blue})`)
	}
	return { red, green, blue }
}

/**
 * Decode a pixel from exactly 3 bytes in R, G, B order
 */
export function fromBytes(bytes: Uint8Array): Pixel24 {
	if (bytes.length !== 3) {
		throw new IllegalParameterError('expected exactly 3 bytes for a pixel')
	}
	return { red: bytes[0] ?? 0, green: bytes[1] ?? 0, blue: bytes[2] ?? 0 }
}

/**
 * Serialize a pixel to 3 bytes in R, G, B order
 */
export function toBytes(pixel: Pixel24): Uint8Array {
	return new Uint8Array([pixel.red, pixel.green, pixel.blue])
}

/**
 * Parse a `#RRGGBB` color
 */
export function fromHex(hex: string): Pixel24 {
	if (!HEX_PATTERN.test(hex)) {
		throw new IllegalParameterError("expected '#AAAAAA' where A is a hexadecimal digit.")
	}
	return {
		red: parseInt(hex.slice(1, 3), 16),
		green: parseInt(hex.slice(3, 5), 16),
		blue: parseInt(hex.slice(5, 7), 16),
	}
}

/**
 * Format a pixel as `#RRGGBB`
 */
export function toHex(pixel: Pixel24): string {
	const hex = (n: number) => n.toString(16).padStart(2, '0').toUpperCase()
	return `#${hex(pixel.red)}${hex(pixel.green)}${hex(pixel.blue)}`
}

/**
 * Convert hue, saturation and value to a pixel
 *
 * - `hue`: 0 <= hue < 1
 * - `saturation`: 0 <= saturation <= 1
 * - `value`: 0 <= value <= 1
 *
 * The intermediate component only takes the values 0 or c, chosen by the
 * parity of the 60 degree sector.
 */
export function fromHsv(hue: number, saturation: number, value: number): Pixel24 {
	if (!(hue >= 0 && hue < 1)) {
		throw new IllegalParameterError('hue must be in the range of [0.0, 1.0)')
	}
	if (!(saturation >= 0 && saturation <= 1)) {
		throw new IllegalParameterError('saturation must be in range of [0.0, 1.0]')
	}
	if (!(value >= 0 && value <= 1)) {
		throw new IllegalParameterError('value must be in range of [0.0, 1.0]')
	}

	const degrees = hue * 360
	const c = value * saturation
	const x = c * (1 - Math.abs((Math.trunc(degrees / 60) % 2) - 1))
	const m = value - c

	let components: RGB
	if (degrees < 60) components = [c, x, 0]
	else if (degrees < 120) components = [x, c, 0]
	else if (degrees < 180) components = [0, c, x]
	else if (degrees < 240) components = [0, x, c]
	else if (degrees < 300) components = [x, 0, c]
	else if (degrees < 360) components = [c, 0, x]
	else throw new IllegalParameterError('hue exceeded range [0, 360)')

	const channel = (component: number) => Math.min(255, Math.round((component + m) * 255))
	return { red: channel(components[0]), green: channel(components[1]), blue: channel(components[2]) }
}

export function isBlack(pixel: Pixel24): boolean {
	return pixel.red === 0 && pixel.green === 0 && pixel.blue === 0
}

export function isWhite(pixel: Pixel24): boolean {
	return pixel.red === 255 && pixel.green === 255 && pixel.blue === 255
}

/**
 * Euclidean distance between two pixels in RGB space
 */
export function distance(a: Pixel24, b: Pixel24): number {
	return Math.sqrt((b.red - a.red) ** 2 + (b.green - a.green) ** 2 + (b.blue - a.blue) ** 2)
}
