/**
 * Command line parsing
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	// Inputs
	palette?: string
	input?: string
	out?: string
	store?: string

	// Image
	size?: string
	color?: string
	hsv?: string

	// Flags
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	/** Command words and paths, in order */
	inputs: string[]
	options: CliOptions
}

export interface Size {
	width: number
	height: number
}

/** Largest side a bitmap header can store */
const MAX_SIDE = 0x7fffffff

type ValueOption = 'palette' | 'input' | 'out' | 'store' | 'size' | 'color' | 'hsv'

const VALUE_OPTIONS: Record<string, ValueOption> = {
	'--palette': 'palette',
	'-p': 'palette',
	'--input': 'input',
	'-i': 'input',
	'--out': 'out',
	'-o': 'out',
	'--store': 'store',
	'-s': 'store',
	'--size': 'size',
	'--color': 'color',
	'-c': 'color',
	'--hsv': 'hsv',
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parsing
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: readonly string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i] ?? ''
		const valueOption = VALUE_OPTIONS[arg]

		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (valueOption) {
			const value = args[i + 1]
			if (value === undefined) {
				throw new Error(`Missing value for ${arg}`)
			}
			options[valueOption] = value
			i++
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

/**
 * Parse a `WxH` size
 */
export function parseSize(value: string): Size {
	const match = /^(\d+)x(\d+)$/i.exec(value)
	if (!match) {
		throw new Error(`Invalid size: ${value} (expected WxH, e.g. 100x66)`)
	}
	const width = parseInt(match[1] ?? '', 10)
	const height = parseInt(match[2] ?? '', 10)
	if (width > MAX_SIDE || height > MAX_SIDE) {
		throw new Error(`Invalid size: ${value} (each side must be at most ${MAX_SIDE})`)
	}
	return { width, height }
}

/**
 * Parse an `h,s,v` triple of fractions
 */
export function parseHsvTriple(value: string): [number, number, number] {
	const parts = value.split(',').map((part) => part.trim())
	const numbers = parts.map(Number)
	const [hue, saturation, brightness] = numbers
	if (
		parts.length !== 3 ||
		parts.some((part) => part === '') ||
		hue === undefined ||
		saturation === undefined ||
		brightness === undefined ||
		numbers.some(Number.isNaN)
	) {
		throw new Error(`Invalid HSV: ${value} (expected h,s,v, e.g. 0.33,0.5,1)`)
	}
	return [hue, saturation, brightness]
}
