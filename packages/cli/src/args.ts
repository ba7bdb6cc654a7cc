/**
 * Command-line argument parsing
 */

export interface CliOptions {
	// Output
	compact?: boolean

	// Extraction
	top?: number
	hashSize?: number

	// Commands
	compare?: [string, string]
	help?: boolean
	version?: boolean
}

export class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'UsageError'
	}
}

export function parseArgs(args: string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i]

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--compact' || arg === '-c') {
			options.compact = true
		} else if (arg === '--top' || arg === '-k') {
			options.top = parsePositiveInt(arg, args[++i])
		} else if (arg === '--hash-size') {
			const size = parsePositiveInt(arg, args[++i])
			if (size < 2 || (size & (size - 1)) !== 0) {
				throw new UsageError(`${arg} must be a power of two of at least 2, got ${size}`)
			}
			options.hashSize = size
		} else if (arg === '--compare') {
			const a = args[++i]
			const b = args[++i]
			if (!a || !b) {
				throw new UsageError('--compare requires two files')
			}
			options.compare = [a, b]
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

function parsePositiveInt(flag: string, value: string | undefined): number {
	if (value === undefined) {
		throw new UsageError(`${flag} requires a value`)
	}
	const parsed = Number(value)
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new UsageError(`${flag} must be a positive integer, got ${JSON.stringify(value)}`)
	}
	return parsed
}
