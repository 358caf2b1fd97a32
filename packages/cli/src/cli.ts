import { HELP, type ParsedArgs, UsageError, parseArgs } from './args'
import { ExitCode, runConvert, runInfo } from './commands'
import { type LogOutput, consoleOutput, createLogger } from './logger'

export { type CliOptions, type Command, type ParsedArgs, HELP, UsageError, parseArgs } from './args'
export { ExitCode, choosePalette, describeHeader, runConvert, runInfo } from './commands'
export { FileSink, fileSource, withFile } from './file-io'
export { type LogLevel, type LogOutput, type Logger, consoleOutput, createLogger } from './logger'

export const VERSION = '0.1.0'

/**
 * Run one command line and return its exit code
 */
export function run(argv: readonly string[], output: LogOutput = consoleOutput): ExitCode {
	let parsed: ParsedArgs
	try {
		parsed = parseArgs(argv)
	} catch (error) {
		if (error instanceof UsageError) {
			output.err(`Error: ${error.message}`)
			output.err('Run rasterkit --help for usage')
			return ExitCode.Usage
		}
		throw error
	}

	const { command, options } = parsed
	const logger = createLogger(options.quiet ? 'quiet' : options.verbose ? 'verbose' : 'normal', output)

	switch (command.name) {
		case 'help':
			output.out(HELP)
			return ExitCode.Ok
		case 'version':
			output.out(`rasterkit v${VERSION}`)
			return ExitCode.Ok
		case 'info':
			return runInfo(command.inputs, options, logger)
		case 'convert':
			return runConvert(command.input, command.output, options, logger)
	}
}
