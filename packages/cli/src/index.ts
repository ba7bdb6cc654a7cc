#!/usr/bin/env tsx
/**
 * pixmeta CLI - Image metadata extraction
 */

import {
	compareHashes,
	computeHashes,
	describeError,
	extractMetadata,
	loadImageFile,
	type MetadataRecord,
} from 'pixmeta'
import { type CliOptions, parseArgs, UsageError } from './args'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const HELP = `
pixmeta - Image metadata extraction

USAGE:
  pixmeta <file...>                   Print a metadata record per file
  pixmeta --compare <a> <b>           Hamming distances between two images

SUPPORTED FILES:
  .jpg .jpeg .png .webp .tif .tiff

OPTIONS:
  -c, --compact         Single-line JSON
  -k, --top <k>         Dominant colors to report (default: 5)
  --hash-size <n>       Hash side length, a power of two (default: 8)
  -h, --help            Show this help
  -V, --version         Show version

EXAMPLES:
  pixmeta photo.jpg                    # Full record
  pixmeta *.png --compact              # One line per image
  pixmeta photo.jpg --top 10           # Ten dominant colors
  pixmeta --compare a.jpg b.jpg        # Similarity of two images

`

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

function printJson(value: unknown, options: CliOptions): void {
	console.log(options.compact ? JSON.stringify(value) : JSON.stringify(value, null, 2))
}

/**
 * Extract and print each file, returning the number of failures
 */
async function extractFiles(inputs: string[], options: CliOptions): Promise<number> {
	let failed = 0

	for (const input of inputs) {
		let record: MetadataRecord
		try {
			const decoded = await loadImageFile(input)
			record = extractMetadata(decoded, { topColors: options.top, hashSize: options.hashSize })
		} catch (err) {
			console.error(`Error: ${input}: ${describeError(err)}`)
			failed++
			continue
		}
		printJson(record, options)
	}

	return failed
}

async function compareFiles([a, b]: [string, string], options: CliOptions): Promise<void> {
	const hashOptions = { size: options.hashSize }
	const [left, right] = await Promise.all([loadImageFile(a), loadImageFile(b)])

	printJson(
		{
			a,
			b,
			distances: compareHashes(
				computeHashes(left.image, hashOptions),
				computeHashes(right.image, hashOptions)
			),
		},
		options
	)
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
	const { inputs, options } = parseArgs(process.argv.slice(2))

	if (options.help) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`pixmeta v${VERSION}`)
		return
	}

	if (options.compare) {
		await compareFiles(options.compare, options)
		return
	}

	if (inputs.length === 0) {
		console.error('Error: No input files specified')
		console.log(HELP)
		process.exit(1)
	}

	const failed = await extractFiles(inputs, options)
	if (failed > 0) {
		process.exit(1)
	}
}

main().catch((err: unknown) => {
	if (err instanceof UsageError) {
		console.error(`Error: ${err.message}`)
	} else {
		console.error(`Error: ${describeError(err)}`)
	}
	process.exit(1)
})
