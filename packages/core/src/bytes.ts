/**
 * Little-endian field access over byte buffers
 *
 * Reads past the end of the buffer yield 0 for the missing bytes; callers check
 * lengths before decoding a structure.
 */

/**
 * Read little-endian uint16
 */
export function readU16(data: Uint8Array, offset: number): number {
	return (data[offset] ?? 0) | ((data[offset + 1] ?? 0) << 8)
}

/**
 * Read little-endian uint32
 */
export function readU32(data: Uint8Array, offset: number): number {
	return (
		((data[offset] ?? 0) |
			((data[offset + 1] ?? 0) << 8) |
			((data[offset + 2] ?? 0) << 16) |
			((data[offset + 3] ?? 0) << 24)) >>>
		0
	)
}

/**
 * Read little-endian int32
 */
export function readI32(data: Uint8Array, offset: number): number {
	const val = readU32(data, offset)
	return val > 0x7fffffff ? val - 0x100000000 : val
}

/**
 * Write little-endian uint16
 */
export function writeU16(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
}

/**
 * Write little-endian uint32 (also used for int32, two's complement)
 */
export function writeU32(data: Uint8Array, offset: number, value: number): void {
	data[offset] = value & 0xff
	data[offset + 1] = (value >> 8) & 0xff
	data[offset + 2] = (value >> 16) & 0xff
	data[offset + 3] = (value >> 24) & 0xff
}

export const writeI32 = writeU32
