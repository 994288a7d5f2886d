import {
	createImageData,
	getPixel,
	IllegalParameterError,
	type ImageCodec,
	type ImageData,
	setPixel,
} from '@bmpkit/core'
import type { Pixel24 } from '@bmpkit/color'
import { type Bitmap, createBitmap } from './bitmap'
import { decodeBmp } from './decoder'
import { encodeBmp } from './encoder'

/**
 * Expand a 24-bit bitmap to RGBA (opaque), rows in stored order
 */
export function toImageData(bitmap: Bitmap<Pixel24>): ImageData {
	const { width, height, pixels } = bitmap
	const image = createImageData(width, height)
	pixels.forEach((pixel, i) => {
		setPixel(image, i % width, Math.floor(i / width), [pixel.red, pixel.green, pixel.blue, 255])
	})
	return image
}

/**
 * Build a 24-bit bitmap from RGBA data, dropping alpha
 */
export function fromImageData(image: ImageData): Bitmap<Pixel24> {
	const { width, height, data } = image
	if (data.length !== width * height * 4) {
		throw new IllegalParameterError(
			`RGBA data length ${data.length} does not match ${width}x${height}`
		)
	}

	const pixels: Pixel24[] = []
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const [red, green, blue] = getPixel(image, x, y)
			pixels.push({ red, green, blue })
		}
	}
	return createBitmap(width, height, pixels)
}

/**
 * BMP codec implementation
 */
export const BmpCodec: ImageCodec = {
	format: 'bmp',

	decode(data: Uint8Array): ImageData {
		return toImageData(decodeBmp(data))
	},

	encode(image: ImageData): Uint8Array {
		return encodeBmp(fromImageData(image))
	},
}
