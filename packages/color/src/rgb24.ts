import { distance, fromBytes, isBlack, isWhite, toBytes } from './convert'
import type { Pixel24, PixelFormat } from './types'

/**
 * 24 bits per pixel, 8 bits per channel, no alpha
 */
export const Rgb24: PixelFormat<Pixel24> = {
	name: 'rgb24',
	bitsPerPixel: 24,
	pixelsPerMeter: 2835, // ~72 DPI

	decode: fromBytes,
	encode: toBytes,
	isBlack,
	isWhite,
	distance,
}
