import type { ImageFormat } from './types'

interface MagicSignature {
	bytes: number[]
	offset?: number
}

/**
 * Magic bytes for format detection
 */
const MAGIC_BYTES: Record<ImageFormat, MagicSignature> = {
	bmp: { bytes: [0x42, 0x4d] }, // "BM"
}

/**
 * Check if bytes match magic signature
 */
function matchMagic(data: Uint8Array, magic: MagicSignature): boolean {
	const offset = magic.offset ?? 0
	if (data.length < offset + magic.bytes.length) return false

	return magic.bytes.every((expected, i) => data[offset + i] === expected)
}

/**
 * Detect format from binary data
 */
export function detectFormat(data: Uint8Array): ImageFormat | null {
	if (matchMagic(data, MAGIC_BYTES.bmp)) return 'bmp'
	return null
}

/**
 * Get MIME type for format
 */
export function getMimeType(format: ImageFormat): string {
	const mimeTypes: Record<ImageFormat, string> = {
		bmp: 'image/bmp',
	}
	return mimeTypes[format]
}
