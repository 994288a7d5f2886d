/**
 * Flag storage error types
 */

export type FlagErrorKind = 'access-failure' | 'unexpected-value' | 'external'

const PREFIXES: Record<FlagErrorKind, string> = {
	'access-failure': 'access failure',
	'unexpected-value': 'unexpected value',
	external: 'external error',
}

export class FlagError extends Error {
	constructor(
		readonly kind: FlagErrorKind,
		readonly detail: string,
		readonly failures: readonly string[] = []
	) {
		super(`${PREFIXES[kind]}: ${failures.length > 0 ? `${detail}\n\n${failures.join('\n')}` : detail}`)
		this.name = 'FlagError'
	}

	/**
	 * Wrap an error raised by a dependency (codec, file system) with context
	 */
	static external(context: string, err: unknown): FlagError {
		const reason = err instanceof Error ? err.message : String(err)
		return new FlagError('external', `${context}: ${reason}`)
	}
}
