/**
 * Flag read/write operations against a store and a palette bitmap
 */

import { readFile, writeFile } from 'node:fs/promises'
import { getLogger, type ILogger } from '@bmpkit/core'
import type { Pixel24 } from '@bmpkit/color'
import { type Bitmap, createBitmap, decodeBmp, encodeBmp } from '@bmpkit/codecs'
import { FlagError } from './errors'
import { formatFlagRecords, parseFlagRecords } from './records'
import { DEFAULT_FLAG_SIZE, type FlagGridSize, type FlagStore } from './types'

export interface FlagOptions {
	size?: FlagGridSize
	logger?: ILogger
}

/**
 * Read and decode a bitmap file
 */
export async function readBitmapFile(path: string): Promise<Bitmap<Pixel24>> {
	let data: Uint8Array
	try {
		data = await readFile(path)
	} catch (err) {
		throw new FlagError(
			'access-failure',
			`failed to read bitmap file ${path}: ${err instanceof Error ? err.message : String(err)}`
		)
	}

	try {
		return decodeBmp(data)
	} catch (err) {
		throw FlagError.external(`failed to parse bitmap data in ${path}`, err)
	}
}

/**
 * Encode a bitmap and write it to a file
 */
export async function writeBitmapFile(path: string, bitmap: Bitmap<Pixel24>): Promise<void> {
	try {
		await writeFile(path, encodeBmp(bitmap))
	} catch (err) {
		throw new FlagError(
			'access-failure',
			`failed to write bitmap file ${path}: ${err instanceof Error ? err.message : String(err)}`
		)
	}
}

/**
 * Read the stored flag as a bitmap, resolving each record through `palette`
 */
export async function readFlag(
	store: FlagStore,
	palette: Bitmap<Pixel24>,
	options: FlagOptions = {}
): Promise<Bitmap<Pixel24>> {
	const size = options.size ?? DEFAULT_FLAG_SIZE
	const logger = options.logger ?? getLogger('flag')

	const raw = await store.read()
	logger.debug(`read ${raw.length} bytes of flag data`)

	const pixels = parseFlagRecords(raw, palette, size)
	logger.debug(`resolved ${pixels.length} flag pixels`)

	try {
		return createBitmap(size.width, size.height, pixels)
	} catch (err) {
		throw FlagError.external('failed to create bitmap image', err)
	}
}

/**
 * Store `flag`, mapping every pixel to its nearest palette color
 */
export async function writeFlag(
	store: FlagStore,
	palette: Bitmap<Pixel24>,
	flag: Bitmap<Pixel24>,
	options: FlagOptions = {}
): Promise<void> {
	const size = options.size ?? DEFAULT_FLAG_SIZE
	const logger = options.logger ?? getLogger('flag')

	const data = formatFlagRecords(flag, palette, size)
	logger.debug(`encoded ${data.length / 10} flag records`)

	await store.write(data)
}
