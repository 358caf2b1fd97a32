export type LogLevel = 'quiet' | 'normal' | 'verbose'

export interface Logger {
	/** Shown with --verbose only */
	debug(message: string): void
	info(message: string): void
	warn(message: string): void
	/** Always shown, even with --quiet */
	error(message: string): void
}

/**
 * Where log lines go: stdout for results, stderr for problems
 */
export interface LogOutput {
	out(line: string): void
	err(line: string): void
}

export const consoleOutput: LogOutput = {
	out: (line) => console.log(line),
	err: (line) => console.error(line),
}

export function createLogger(level: LogLevel, output: LogOutput = consoleOutput): Logger {
	return {
		debug(message) {
			if (level === 'verbose') output.out(message)
		},
		info(message) {
			if (level !== 'quiet') output.out(message)
		},
		warn(message) {
			if (level !== 'quiet') output.err(`Warning: ${message}`)
		},
		error(message) {
			output.err(`Error: ${message}`)
		},
	}
}
