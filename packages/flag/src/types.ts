/**
 * Flag grid types and constants
 */

/** Flag width in pixels */
export const FLAG_WIDTH = 100

/** Flag height in pixels */
export const FLAG_HEIGHT = 66

/** Bytes per stored record: `X:Y` plus a terminator */
export const FLAG_RECORD_SIZE = 10

/** Terminator after every record but the last */
export const RECORD_SEPARATOR = 0x2c // ','

/** Terminator after the last record */
export const RECORD_END = 0x00

/** Between the x and y coordinate */
export const COORDINATE_DIVIDER = 0x3a // ':'

/** Stored values holding the flag grid are named with this prefix */
export const FLAG_KEY_PREFIX = 'flagGrid_'

/**
 * Backing storage for the raw flag grid bytes
 */
export interface FlagStore {
	read(): Promise<Uint8Array>
	write(data: Uint8Array): Promise<void>
}

export interface FlagGridSize {
	readonly width: number
	readonly height: number
}

export const DEFAULT_FLAG_SIZE: FlagGridSize = { width: FLAG_WIDTH, height: FLAG_HEIGHT }
