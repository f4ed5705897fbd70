import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { basename, extname, join } from 'node:path'
import { decodeIcoFrames, encodePng, entrySize, isPngPayload, parseIco } from '@icoframe/codecs'
import { isCodecError } from '@icoframe/core'
import { createLogger, type LogSink, type Logger } from './logger'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	out?: string
	info?: boolean
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export class UsageError extends Error {
	override readonly name = 'UsageError'
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

export const HELP = `
ico2png - Extract every image of a Windows icon as PNG

USAGE:
  ico2png [-o OUTDIR] ICO_FILE        Write ICO_FILE's images as PNG files
  ico2png --info ICO_FILE             List the images without writing

OPTIONS:
  -o, --out <dir>       Output directory (default: current directory)
  -i, --info            Show the icon directory
  -v, --verbose         Verbose output
  --quiet               Suppress output
  --help                Show this help
  --version             Show version

EXAMPLES:
  ico2png favicon.ico                 # favicon01.png, favicon02.png, ...
  ico2png -o ./out ./app.ico          # ./out/app01.png, ...
`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	let i = 0
	while (i < args.length) {
		const arg = args[i] ?? ''

		if (arg === '--help' || arg === '-h' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--out' || arg === '-o') {
			const value = args[i + 1]
			if (value === undefined) {
				throw new UsageError(`Missing value for ${arg}`)
			}
			options.out = value
			i++
		} else if (!arg.startsWith('-') || arg === '-') {
			inputs.push(arg)
		} else {
			throw new UsageError(`Unknown option: ${arg}`)
		}

		i++
	}

	return { inputs, options }
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One line per directory entry
 */
export function describeIco(data: Uint8Array): string[] {
	const ico = parseIco(data)
	const lines = [`Images: ${ico.entries.length}`]

	ico.entries.forEach((entry, i) => {
		const image = ico.images[i]
		const kind = image && isPngPayload(image) ? 'PNG' : 'BMP'
		const size = `${entrySize(entry.width)}x${entrySize(entry.height)}`
		lines.push(`  #${i + 1}  ${size}  ${entry.bitCount} bpp  ${kind}  ${formatBytes(entry.bytesInRes)}`)
	})

	return lines
}

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/**
 * Output path of frame index (0-based): <outDir>/<input name><NN>.png
 */
export function framePath(input: string, outDir: string, index: number): string {
	const base = basename(input, extname(input))
	return join(outDir, `${base}${String(index + 1).padStart(2, '0')}.png`)
}

/**
 * Decode an ICO file and write each image as PNG, returns the written paths
 */
export function convertIcoFile(input: string, outDir: string, log: Logger): string[] {
	mkdirSync(outDir, { recursive: true })

	const data = new Uint8Array(readFileSync(input))
	const frames = decodeIcoFrames(data)

	const written: string[] = []
	frames.forEach((frame, i) => {
		const output = framePath(input, outDir, i)
		writeFileSync(output, encodePng(frame))
		log.debug(`  ${output} (${frame.width}x${frame.height})`)
		written.push(output)
	})

	log.info(`${input}: wrote ${written.length} image${written.length === 1 ? '' : 's'} to ${outDir}`)
	return written
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI, returns the process exit code
 */
export function run(argv: string[], sink: LogSink = console): number {
	let parsed: ReturnType<typeof parseArgs>
	try {
		parsed = parseArgs(argv)
	} catch (err) {
		if (!(err instanceof UsageError)) throw err
		sink.error(`${err.message}\n${HELP}`)
		return 2
	}

	const { inputs, options } = parsed
	const log = createLogger(options, sink)

	if (options.help) {
		log.info(HELP)
		return 0
	}

	if (options.version) {
		log.info(`ico2png v${VERSION}`)
		return 0
	}

	const [input] = inputs
	if (input === undefined || inputs.length !== 1) {
		log.error(`Expected exactly one ICO file\n${HELP}`)
		return 2
	}

	try {
		if (options.info) {
			for (const line of describeIco(new Uint8Array(readFileSync(input)))) {
				log.info(line)
			}
			return 0
		}

		convertIcoFile(input, options.out ?? '.', log)
		return 0
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err)
		log.error(isCodecError(err) ? `Error (${err.code}): ${message}` : `Error: ${message}`)
		return 1
	}
}
