/**
 * Codec error types
 *
 * `unsupported` marks a well-formed input describing a variant the codec does
 * not implement; `illegal-parameter` marks malformed or inconsistent input.
 */

export type CodecErrorKind = 'unsupported' | 'illegal-parameter'

export abstract class CodecError extends Error {
	abstract readonly kind: CodecErrorKind

	/** The message without the kind prefix */
	readonly detail: string

	protected constructor(prefix: string, detail: string) {
		super(`${prefix}: ${detail}`)
		this.name = new.target.name
		this.detail = detail
	}
}

export class UnsupportedError extends CodecError {
	readonly kind = 'unsupported' as const

	constructor(detail: string) {
		super('unsupported', detail)
	}
}

export class IllegalParameterError extends CodecError {
	readonly kind = 'illegal-parameter' as const

	/** Individual failures folded into this error, empty for a single failure */
	readonly failures: readonly string[]

	constructor(detail: string, failures: readonly string[] = []) {
		super('illegal parameter', failures.length > 0 ? `${detail}\n\n${failures.join('\n')}` : detail)
		this.failures = failures
	}
}

export function isCodecError(err: unknown): err is CodecError {
	return err instanceof CodecError
}

/**
 * Collects failures from a batch of independent operations so they can be
 * reported together once the batch is done
 */
export class FailureAccumulator {
	private readonly failures: string[] = []

	get count(): number {
		return this.failures.length
	}

	/** Recorded failures as `location: reason` lines */
	get entries(): readonly string[] {
		return [...this.failures]
	}

	record(location: string, err: unknown): void {
		const reason = isCodecError(err) ? err.detail : err instanceof Error ? err.message : String(err)
		this.failures.push(`${location}: ${reason}`)
	}

	/**
	 * Run `fn`, recording its error under `location` instead of throwing
	 */
	attempt<T>(location: string, fn: () => T): T | undefined {
		try {
			return fn()
		} catch (err) {
			this.record(location, err)
			return undefined
		}
	}

	/**
	 * Throw one IllegalParameterError listing every recorded failure
	 */
	throwIfAny(summary: string): void {
		if (this.failures.length > 0) {
			throw new IllegalParameterError(summary, this.entries)
		}
	}
}
