/**
 * BMP header (de)serialization
 */

import {
	IllegalParameterError,
	readI32,
	readU16,
	readU32,
	UnsupportedError,
	writeI32,
	writeU16,
	writeU32,
} from '@bmpkit/core'
import {
	BMP_MAGIC,
	COMPRESSION_IDENTIFIERS,
	COMPRESSION_METHODS,
	type CompressionMethod,
	FILE_HEADER_SIZE,
	type FileHeader,
	INFO_HEADER_SIZE,
	type InfoHeader,
} from './types'

/**
 * Create a file header for a new bitmap
 */
export function createFileHeader(size: number, offset: number): FileHeader {
	return {
		identifier: 'BM',
		size,
		reserved1: 0,
		reserved2: 0,
		offset,
	}
}

/**
 * Create an uncompressed information header for a new bitmap
 */
export function createInfoHeader(
	width: number,
	height: number,
	bitsPerPixel: number,
	pixelsPerMeter: number
): InfoHeader {
	return {
		headerSize: INFO_HEADER_SIZE,
		width,
		height,
		colorPlaneCount: 1,
		bitsPerPixel,
		compressionMethod: 'BI_RGB',
		rawImageSize: 0,
		horizontalResolution: pixelsPerMeter,
		verticalResolution: pixelsPerMeter,
		paletteColorCount: 0,
		importantColorCount: 0,
	}
}

export function compressionFromIdentifier(identifier: number): CompressionMethod {
	const method = COMPRESSION_METHODS.find((m) => COMPRESSION_IDENTIFIERS[m] === identifier)
	if (method === undefined) {
		throw new IllegalParameterError(`unknown compression identifier: ${identifier}`)
	}
	return method
}

/**
 * Decode the 14-byte file header
 */
export function decodeFileHeader(data: Uint8Array): FileHeader {
	if (data[0] !== BMP_MAGIC[0] || data[1] !== BMP_MAGIC[1]) {
		throw new IllegalParameterError('unsupported bitmap identifier')
	}

	if (data.length < FILE_HEADER_SIZE) {
		throw new IllegalParameterError(
			`file header requires ${FILE_HEADER_SIZE} bytes, got ${data.length}`
		)
	}

	return {
		identifier: 'BM',
		size: readU32(data, 2),
		reserved1: readU16(data, 6),
		reserved2: readU16(data, 8),
		offset: readU32(data, 10),
	}
}

/**
 * Encode the 14-byte file header
 */
export function encodeFileHeader(header: FileHeader): Uint8Array {
	const output = new Uint8Array(FILE_HEADER_SIZE)
	output.set(BMP_MAGIC, 0)
	writeU32(output, 2, header.size)
	writeU16(output, 6, header.reserved1)
	writeU16(output, 8, header.reserved2)
	writeU32(output, 10, header.offset)
	return output
}

/**
 * Decode the 40-byte information header
 *
 * Only uncompressed headers whose bit depth equals `supportedBitsPerPixel`
 * are accepted.
 */
export function decodeInfoHeader(data: Uint8Array, supportedBitsPerPixel = 24): InfoHeader {
	if (data.length < INFO_HEADER_SIZE) {
		throw new IllegalParameterError(
			`information header requires ${INFO_HEADER_SIZE} bytes, got ${data.length}`
		)
	}

	const headerSize = readU32(data, 0)
	const width = readI32(data, 4)
	const height = readI32(data, 8)
	const colorPlaneCount = readU16(data, 12)
	const bitsPerPixel = readU16(data, 14)
	const compressionMethod = compressionFromIdentifier(readU32(data, 16))

	if (headerSize !== INFO_HEADER_SIZE) {
		throw new IllegalParameterError(`unexpected bitmap information header size: ${headerSize}`)
	}

	if (bitsPerPixel !== supportedBitsPerPixel) {
		throw new UnsupportedError(
			`only ${supportedBitsPerPixel}bpp bitmaps are supported, got ${bitsPerPixel}bpp`
		)
	}

	if (colorPlaneCount !== 1) {
		throw new IllegalParameterError(`color plane count must be 1, got ${colorPlaneCount}`)
	}

	return {
		headerSize,
		width,
		height,
		colorPlaneCount,
		bitsPerPixel,
		compressionMethod,
		rawImageSize: readU32(data, 20),
		horizontalResolution: readI32(data, 24),
		verticalResolution: readI32(data, 28),
		paletteColorCount: readU32(data, 32),
		importantColorCount: readU32(data, 36),
	}
}

/**
 * Encode the 40-byte information header
 */
export function encodeInfoHeader(header: InfoHeader): Uint8Array {
	const output = new Uint8Array(INFO_HEADER_SIZE)
	writeU32(output, 0, header.headerSize)
	writeI32(output, 4, header.width)
	writeI32(output, 8, header.height) // Sign kept as stored
	writeU16(output, 12, header.colorPlaneCount)
	writeU16(output, 14, header.bitsPerPixel)
	writeU32(output, 16, COMPRESSION_IDENTIFIERS[header.compressionMethod])
	writeU32(output, 20, header.rawImageSize)
	writeI32(output, 24, header.horizontalResolution)
	writeI32(output, 28, header.verticalResolution)
	writeU32(output, 32, header.paletteColorCount)
	writeU32(output, 36, header.importantColorCount)
	return output
}
