import chalk from 'chalk'

export interface ILogger {
	debugMessages: string[]
	errorMessages: string[]
	readonly verbose: boolean

	info(message: string): void

	success(message: string): void

	warn(message: string): void

	error(message: string): void

	debug(message: string): void
}

type Paint = (text: string) => string

class Logger implements ILogger {
	debugMessages: string[] = []
	errorMessages: string[] = []

	constructor(
		readonly name: string,
		public verbose = false
	) {}

	private line(level: string, message: string, paint: Paint): string {
		return paint(`[${level}] ${this.name} :: ${message}`)
	}

	info(message: string): void {
		console.log(this.line('INFO', message, chalk.blue))
	}

	success(message: string): void {
		console.log(this.line('SUCCESS', message, chalk.green))
	}

	warn(message: string): void {
		console.warn(this.line('WARNING', message, chalk.yellow))
	}

	error(message: string): void {
		this.errorMessages.push(message)
		console.error(this.line('ERROR', message, chalk.red))
	}

	debug(message: string): void {
		this.debugMessages.push(message)
		if (this.verbose) {
			console.log(this.line('DEBUG', message, chalk.magenta))
		}
	}
}

const loggers = new Map<string, Logger>()

/**
 * Get the shared logger for `name`, creating it on first use
 *
 * Asking for a verbose logger turns verbose output on for the shared one;
 * a non-verbose request never turns it off.
 */
export function getLogger(name: string, verbose = false): ILogger {
	let logger = loggers.get(name)
	if (!logger) {
		logger = new Logger(name, verbose)
		loggers.set(name, logger)
	} else if (verbose) {
		logger.verbose = true
	}
	return logger
}
