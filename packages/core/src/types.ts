/**
 * Raw image data in RGBA format
 * Each pixel is 4 bytes: R, G, B, A (0-255)
 */
export interface ImageData {
	readonly width: number
	readonly height: number
	readonly data: Uint8Array // RGBA, length = width * height * 4
}

/**
 * Supported image formats
 */
export type ImageFormat = 'bmp'

/**
 * Codec interface for encoding/decoding
 */
export interface Codec<T> {
	readonly format: ImageFormat
	decode(data: Uint8Array): T
	encode(input: T): Uint8Array
}

/**
 * Image codec
 */
export type ImageCodec = Codec<ImageData>

/** One RGBA pixel */
export type Rgba = readonly [red: number, green: number, blue: number, alpha: number]

/**
 * Create fully transparent ImageData
 */
export function createImageData(width: number, height: number): ImageData {
	return { width, height, data: new Uint8Array(width * height * 4) }
}

/**
 * Read the pixel at (x, y); bytes outside the data read as 0
 */
export function getPixel(image: ImageData, x: number, y: number): Rgba {
	const at = (y * image.width + x) * 4
	const { data } = image
	return [data[at] ?? 0, data[at + 1] ?? 0, data[at + 2] ?? 0, data[at + 3] ?? 0]
}

export function setPixel(image: ImageData, x: number, y: number, rgba: Rgba): void {
	image.data.set(rgba, (y * image.width + x) * 4)
}
