/**
 * BMP (Windows bitmap) format types
 * BITMAPFILEHEADER + BITMAPINFOHEADER, uncompressed pixel rows
 */

/** "BM" */
export const BMP_MAGIC = new Uint8Array([0x42, 0x4d])

export const FILE_HEADER_SIZE = 14
export const INFO_HEADER_SIZE = 40
/** No color table is ever embedded, so pixel data starts right after the headers */
export const HEADERS_SIZE = FILE_HEADER_SIZE + INFO_HEADER_SIZE

/** Rows are padded to this many bytes */
export const ROW_ALIGNMENT = 4

/**
 * Bitmap type identifiers
 */
export type BitmapIdentifier = 'BM' // Windows 3.x, 95, NT, etc.

/**
 * Compression methods
 */
export type CompressionMethod = 'BI_RGB' // No compression

export const COMPRESSION_METHODS: readonly CompressionMethod[] = ['BI_RGB']

export const COMPRESSION_IDENTIFIERS: Record<CompressionMethod, number> = {
	BI_RGB: 0,
}

/**
 * Bitmap file header (14 bytes)
 */
export interface FileHeader {
	readonly identifier: BitmapIdentifier
	/** Size of the whole file in bytes */
	readonly size: number
	readonly reserved1: number
	readonly reserved2: number
	/** Byte offset of the pixel data */
	readonly offset: number
}

/**
 * Bitmap information header (BITMAPINFOHEADER, 40 bytes)
 */
export interface InfoHeader {
	readonly headerSize: number
	readonly width: number
	/** Negative for top-to-bottom rows, positive for bottom-to-top */
	readonly height: number
	readonly colorPlaneCount: number
	readonly bitsPerPixel: number
	readonly compressionMethod: CompressionMethod
	/** May be 0 for BI_RGB */
	readonly rawImageSize: number
	/** Pixels per meter */
	readonly horizontalResolution: number
	/** Pixels per meter */
	readonly verticalResolution: number
	/** 0 defaults to 2^n */
	readonly paletteColorCount: number
	/** 0 when every color is important */
	readonly importantColorCount: number
}

/**
 * Row padding derived from the pixel count and the row count
 */
export interface RowPadding {
	readonly bytesPerRow: number
	readonly paddingPerRow: number
	readonly paddedBytesPerImage: number
}

export interface PixelLocation {
	readonly x: number
	readonly y: number
}
