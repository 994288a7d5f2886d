/**
 * Flag grid stores
 */

import { Buffer } from 'node:buffer'
import { readFile, writeFile } from 'node:fs/promises'
import { FlagError } from './errors'
import { FLAG_KEY_PREFIX, type FlagStore } from './types'

type ValueMap = Record<string, string>

function isValueMap(value: unknown): value is ValueMap {
	return (
		typeof value === 'object' &&
		value !== null &&
		!Array.isArray(value) &&
		Object.values(value).every((v) => typeof v === 'string')
	)
}

/**
 * Find the name of the stored value holding the flag grid
 */
export function locateFlagKey(values: ValueMap): string {
	const key = Object.keys(values).find((name) => name.startsWith(FLAG_KEY_PREFIX))
	if (key === undefined) {
		throw new FlagError(
			'access-failure',
			`failed to find flag grid key (expected key with prefix ${FLAG_KEY_PREFIX})`
		)
	}
	return key
}

/**
 * Named values kept in a JSON file, binary values base64 encoded.
 * The flag grid is the first value whose name starts with `flagGrid_`.
 */
export class FileFlagStore implements FlagStore {
	constructor(readonly path: string) {}

	private async load(): Promise<ValueMap> {
		let text: string
		try {
			text = await readFile(this.path, 'utf8')
		} catch (err) {
			throw new FlagError(
				'access-failure',
				`could not access the flag store ${this.path}: ${err instanceof Error ? err.message : String(err)}`
			)
		}

		let parsed: unknown
		try {
			parsed = JSON.parse(text)
		} catch (err) {
			throw FlagError.external(`flag store ${this.path} is not valid JSON`, err)
		}

		if (!isValueMap(parsed)) {
			throw new FlagError('unexpected-value', `flag store ${this.path} must map names to strings`)
		}
		return parsed
	}

	async read(): Promise<Uint8Array> {
		const values = await this.load()
		const encoded = values[locateFlagKey(values)] ?? ''
		return new Uint8Array(Buffer.from(encoded, 'base64'))
	}

	async write(data: Uint8Array): Promise<void> {
		const values = await this.load()
		const key = locateFlagKey(values)
		const updated: ValueMap = { ...values, [key]: Buffer.from(data).toString('base64') }

		try {
			await writeFile(this.path, `${JSON.stringify(updated, null, '\t')}\n`)
		} catch (err) {
			throw new FlagError(
				'access-failure',
				`could not write the flag store ${this.path}: ${err instanceof Error ? err.message : String(err)}`
			)
		}
	}
}

/**
 * In-memory store
 */
export class MemoryFlagStore implements FlagStore {
	private data: Uint8Array

	constructor(initial: Uint8Array = new Uint8Array(0)) {
		this.data = new Uint8Array(initial)
	}

	async read(): Promise<Uint8Array> {
		return new Uint8Array(this.data)
	}

	async write(data: Uint8Array): Promise<void> {
		this.data = new Uint8Array(data)
	}
}
