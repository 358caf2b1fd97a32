import { z } from 'zod'

/**
 * Raised for command lines that cannot be run; maps to exit code 2
 */
export class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'UsageError'
	}
}

export type Command =
	| { readonly name: 'help' }
	| { readonly name: 'version' }
	| { readonly name: 'info'; readonly inputs: readonly string[] }
	| { readonly name: 'convert'; readonly input: string; readonly output: string }

const optionsSchema = z
	.object({
		bits: z.coerce
			.number()
			.pipe(
				z.union([z.literal(1), z.literal(4), z.literal(8), z.literal(16), z.literal(24), z.literal(32)], {
					errorMap: () => ({ message: 'must be one of 1, 4, 8, 16, 24 or 32' }),
				})
			)
			.optional(),
		maxBytes: z.coerce
			.number()
			.int()
			.positive()
			.max(Number.MAX_SAFE_INTEGER, { message: `must be at most ${Number.MAX_SAFE_INTEGER}` })
			.optional(),
		topDown: z.boolean().default(false),
		verbose: z.boolean().default(false),
		quiet: z.boolean().default(false),
	})
	.refine((options) => !(options.verbose && options.quiet), {
		message: '--verbose and --quiet cannot be combined',
	})

export type CliOptions = z.infer<typeof optionsSchema>

export interface ParsedArgs {
	readonly command: Command
	readonly options: CliOptions
}

interface RawArgs {
	positionals: string[]
	bits?: string
	maxBytes?: string
	topDown?: boolean
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

const FLAG_NAMES: Record<string, string> = {
	bits: '--bits',
	maxBytes: '--max-bytes',
}

export const HELP = `
rasterkit - BMP inspector and converter

USAGE:
  rasterkit info <file...>                Show the headers of BMP files
  rasterkit convert <input> <output>      Decode a BMP file and write it again

OPTIONS:
  --bits <n>            Output depth: 1, 4, 8, 16, 24 or 32 (convert)
  --top-down            Store rows top-down (convert)
  --max-bytes <n>       Refuse images whose pixels need more than n bytes
  -v, --verbose         Verbose output
  -q, --quiet           Only report errors
  --help                Show this help
  --version             Show version

EXIT CODES:
  0 success, 1 failure, 2 usage error, 3 every input unsupported
`

function readRaw(argv: readonly string[]): RawArgs {
	const raw: RawArgs = { positionals: [] }

	let i = 0
	while (i < argv.length) {
		const arg = argv[i]

		if (arg === '--help' || arg === '-h') {
			raw.help = true
		} else if (arg === '--version' || arg === '-V') {
			raw.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			raw.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			raw.quiet = true
		} else if (arg === '--top-down') {
			raw.topDown = true
		} else if (arg === '--bits' || arg === '--max-bytes') {
			const value = argv[i + 1]
			if (value === undefined) {
				throw new UsageError(`${arg} needs a value`)
			}
			if (arg === '--bits') raw.bits = value
			else raw.maxBytes = value
			i++
		} else if (!arg.startsWith('-') || arg === '-') {
			raw.positionals.push(arg)
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}

		i++
	}

	return raw
}

function resolveCommand(raw: RawArgs): Command {
	if (raw.help) return { name: 'help' }
	if (raw.version) return { name: 'version' }

	if (raw.positionals.length === 0) return { name: 'help' }

	const [name, ...inputs] = raw.positionals
	switch (name) {
		case 'info':
			if (inputs.length === 0) {
				throw new UsageError('info needs at least one file')
			}
			return { name: 'info', inputs }
		case 'convert':
			if (inputs.length !== 2) {
				throw new UsageError('convert needs exactly one input and one output file')
			}
			return { name: 'convert', input: inputs[0], output: inputs[1] }
		default:
			throw new UsageError(`Unknown command: ${name}`)
	}
}

/**
 * Parse a command line (without the node and script arguments)
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
	const raw = readRaw(argv)
	const command = resolveCommand(raw)

	const result = optionsSchema.safeParse({
		bits: raw.bits,
		maxBytes: raw.maxBytes,
		topDown: raw.topDown,
		verbose: raw.verbose,
		quiet: raw.quiet,
	})
	if (!result.success) {
		const issue = result.error.issues[0]
		const key = issue.path[0]
		const flag = typeof key === 'string' ? FLAG_NAMES[key] : undefined
		throw new UsageError(flag ? `${flag} ${issue.message}` : issue.message)
	}

	if (command.name === 'info' && (result.data.bits !== undefined || result.data.topDown)) {
		throw new UsageError('--bits and --top-down only apply to convert')
	}

	return { command, options: result.data }
}
