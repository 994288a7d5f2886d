export { Bitmap, createBitmap } from './bitmap'
export { BmpCodec, fromImageData, toImageData } from './codec'
export { decodeBitmap, decodeBmp } from './decoder'
export { encodeBmp } from './encoder'
export {
	compressionFromIdentifier,
	createFileHeader,
	createInfoHeader,
	decodeFileHeader,
	decodeInfoHeader,
	encodeFileHeader,
	encodeInfoHeader,
} from './header'
export { computePadding } from './padding'
export * from './types'
