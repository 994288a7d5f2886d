/**
 * Pixel model types
 */

/** RGB color */
export type RGB = [number, number, number]

/** 24-bit pixel, one byte per channel */
export interface Pixel24 {
	readonly red: number
	readonly green: number
	readonly blue: number
}

/**
 * Capabilities the bitmap codec needs from a pixel representation.
 * Generic codec logic only talks to pixels through this interface.
 */
export interface PixelFormat<P> {
	readonly name: string
	/** Bits used to store one pixel */
	readonly bitsPerPixel: number
	/** Print resolution written to new headers */
	readonly pixelsPerMeter: number
	/** Decode one pixel from exactly ceil(bitsPerPixel / 8) bytes */
	decode(bytes: Uint8Array): P
	encode(pixel: P): Uint8Array
	isBlack(pixel: P): boolean
	isWhite(pixel: P): boolean
	/** Unnormalized distance, only meaningful for comparison */
	distance(a: P, b: P): number
}
