import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { decodePng, encodePng } from '@icoframe/codecs'
import { icoFile, iconDib } from '@icoframe/codecs/testing'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { describeIco, framePath, parseArgs, run, UsageError } from './cli'
import { createLogger, type LogSink } from './logger'

function captureSink(): LogSink & { out: string[]; err: string[] } {
	const out: string[] = []
	const err: string[] = []
	return {
		out,
		err,
		log: (message) => out.push(message),
		error: (message) => err.push(message),
	}
}

function sampleIco(): Uint8Array {
	const dib = iconDib({
		width: 2,
		height: 1,
		bitCount: 24,
		xorRows: [[0, 0, 255, 255, 0, 0]],
		andRows: [[0b0100_0000]],
	})
	const png = encodePng({ width: 1, height: 1, data: new Uint8Array([1, 2, 3, 4]) })
	return icoFile([
		{ width: 2, height: 1, bitCount: 24, data: dib },
		{ width: 1, height: 1, bitCount: 32, data: png },
	])
}

describe('parseArgs', () => {
	test('input and output directory', () => {
		expect(parseArgs(['-o', 'out', 'app.ico'])).toEqual({
			inputs: ['app.ico'],
			options: { out: 'out' },
		})
	})

	test('flags', () => {
		const { options } = parseArgs(['--info', '--verbose', '--quiet', '--version', '--help'])
		expect(options).toEqual({ info: true, verbose: true, quiet: true, version: true, help: true })
	})

	test('unknown option', () => {
		expect(() => parseArgs(['--width', '3'])).toThrow(UsageError)
		expect(() => parseArgs(['--width', '3'])).toThrow('Unknown option: --width')
	})

	test('--out needs a value', () => {
		expect(() => parseArgs(['app.ico', '--out'])).toThrow('Missing value for --out')
	})
})

describe('createLogger', () => {
	test('quiet keeps errors only', () => {
		const sink = captureSink()
		const log = createLogger({ quiet: true, verbose: true }, sink)
		log.info('a')
		log.debug('b')
		log.error('c')
		expect(sink.out).toEqual([])
		expect(sink.err).toEqual(['c'])
	})

	test('debug needs verbose', () => {
		const sink = captureSink()
		createLogger({}, sink).debug('hidden')
		createLogger({ verbose: true }, sink).debug('shown')
		expect(sink.out).toEqual(['shown'])
	})
})

describe('framePath', () => {
	test('numbers frames from 01 and drops the extension', () => {
		expect(framePath('/icons/app.ico', 'out', 0)).toBe(join('out', 'app01.png'))
		expect(framePath('app.v2.ico', '.', 11)).toBe('app.v212.png')
	})
})

describe('describeIco', () => {
	test('lists entries', () => {
		const data = sampleIco()
		expect(describeIco(data)).toEqual([
			'Images: 2',
			'  #1  2x1  24 bpp  BMP  52 B',
			`  #2  1x1  32 bpp  PNG  ${encodePng({ width: 1, height: 1, data: new Uint8Array([1, 2, 3, 4]) }).length} B`,
		])
	})
})

describe('run', () => {
	let dir: string

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'ico2png-'))
	})

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true })
	})

	test('writes every frame as PNG', () => {
		const input = join(dir, 'sample.ico')
		writeFileSync(input, sampleIco())
		const out = join(dir, 'nested', 'out')
		const sink = captureSink()

		expect(run(['-o', out, input], sink)).toBe(0)
		expect(sink.out).toEqual([`${input}: wrote 2 images to ${out}`])

		const first = decodePng(new Uint8Array(readFileSync(join(out, 'sample01.png'))))
		expect(first.width).toBe(2)
		expect(Array.from(first.data)).toEqual([255, 0, 0, 255, 0, 0, 0, 0])

		const second = decodePng(new Uint8Array(readFileSync(join(out, 'sample02.png'))))
		expect(Array.from(second.data)).toEqual([1, 2, 3, 4])
	})

	test('verbose lists written files', () => {
		const input = join(dir, 'sample.ico')
		writeFileSync(input, sampleIco())
		const sink = captureSink()

		expect(run(['-v', '-o', dir, input], sink)).toBe(0)
		expect(sink.out).toEqual([
			`  ${join(dir, 'sample01.png')} (2x1)`,
			`  ${join(dir, 'sample02.png')} (1x1)`,
			`${input}: wrote 2 images to ${dir}`,
		])
	})

	test('--info writes nothing', () => {
		const input = join(dir, 'sample.ico')
		writeFileSync(input, sampleIco())
		const sink = captureSink()

		expect(run(['--info', '-o', dir, input], sink)).toBe(0)
		expect(sink.out[0]).toBe('Images: 2')
		expect(existsSync(join(dir, 'sample01.png'))).toBe(false)
	})

	test('decode errors exit with 1 and write nothing', () => {
		const input = join(dir, 'broken.ico')
		writeFileSync(input, new Uint8Array([0, 0, 2, 0, 1, 0]))
		const sink = captureSink()

		expect(run(['-o', dir, input], sink)).toBe(1)
		expect(sink.err).toEqual([
			'Error (InvalidContainerHeader): Invalid ICO file: image type should be 1, got 2',
		])
		expect(existsSync(join(dir, 'broken01.png'))).toBe(false)
	})

	test('usage errors exit with 2', () => {
		const sink = captureSink()
		expect(run([], sink)).toBe(2)
		expect(run(['a.ico', 'b.ico'], sink)).toBe(2)
		expect(run(['--bogus'], sink)).toBe(2)
		expect(sink.err.length).toBe(3)
		expect(sink.err[2]!.startsWith('Unknown option: --bogus')).toBe(true)
	})

	test('--version', () => {
		const sink = captureSink()
		expect(run(['--version'], sink)).toBe(0)
		expect(sink.out).toEqual(['ico2png v0.1.0'])
	})
})
