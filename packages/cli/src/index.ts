#!/usr/bin/env node
/**
 * bmpkit CLI - 24-bit bitmap tools
 */

import { readFile, stat } from 'node:fs/promises'
import { resolve } from 'node:path'
import { detectFormat, getLogger, getMimeType, type ILogger } from '@bmpkit/core'
import { fromHex, fromHsv, type Pixel24, toHex } from '@bmpkit/color'
import { createBitmap, decodeBmp } from '@bmpkit/codecs'
import { FileFlagStore, readBitmapFile, readFlag, writeBitmapFile, writeFlag } from '@bmpkit/flag'
import { type CliOptions, parseArgs, parseHsvTriple, parseSize } from './args'
import { config } from './config'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const HELP = `
bmpkit - 24-bit bitmap tools

USAGE:
  bmpkit info <file>                         Show bitmap headers
  bmpkit create <out> [options]              Create a solid-color bitmap
  bmpkit match <palette> --color <#hex>      Find the closest palette pixel
  bmpkit flag read [options]                 Export the stored flag as a bitmap
  bmpkit flag write [options]                Store a bitmap as the flag

OPTIONS:
  --size <WxH>          Bitmap size for create (default ${config.fillWidth}x${config.fillHeight})
  -c, --color <#hex>    Color as #RRGGBB (default ${toHex(config.fillColor)})
  --hsv <h,s,v>         Color as hue, saturation, value fractions
  -p, --palette <file>  Palette bitmap (default ${config.palettePath})
  -i, --input <file>    Flag bitmap to store (default ${config.flagInputPath})
  -o, --out <file>      Flag bitmap to write (default ${config.flagOutputPath})
  -s, --store <file>    Flag store (default ${config.storePath}, or $BMPKIT_FLAG_STORE)
  -v, --verbose         Verbose output
  -q, --quiet           Suppress output
  --help                Show this help
  --version             Show version

EXAMPLES:
  bmpkit create green.bmp --size 4x4 --color #00FF00
  bmpkit create sky.bmp --hsv 0.55,0.6,1
  bmpkit match palette.bmp --color #4CAF50
  bmpkit flag write -p palette.bmp -i custom_flag.bmp
`

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / 1024 / 1024).toFixed(1)} MB`
}

/**
 * Resolve the color given by --color or --hsv, falling back to the default
 */
function resolveColor(options: CliOptions): Pixel24 {
	if (options.color && options.hsv) {
		throw new Error('Use either --color or --hsv, not both')
	}
	if (options.hsv) {
		const [hue, saturation, value] = parseHsvTriple(options.hsv)
		return fromHsv(hue, saturation, value)
	}
	if (options.color) {
		return fromHex(options.color)
	}
	return config.fillColor
}

function requireInput(inputs: string[], index: number, usage: string): string {
	const input = inputs[index]
	if (input === undefined) {
		throw new Error(`Missing argument. Usage: ${usage}`)
	}
	return input
}

// ─────────────────────────────────────────────────────────────────────────────
// Commands
// ─────────────────────────────────────────────────────────────────────────────

async function showInfo(path: string): Promise<void> {
	const data = new Uint8Array(await readFile(path))
	const { size } = await stat(path)
	const format = detectFormat(data)

	console.log(`\nSource: ${path}`)
	console.log(`Size: ${formatBytes(size)}`)
	console.log(`Format: ${format ?? 'unknown'}`)

	if (format) {
		console.log(`MIME: ${getMimeType(format)}`)

		const bitmap = decodeBmp(data)
		const { fileHeader, infoHeader } = bitmap
		console.log(`Dimensions: ${bitmap.width} x ${bitmap.height}`)
		console.log(`Row order: ${bitmap.rawHeight < 0 ? 'top-down' : 'bottom-up'}`)
		console.log(`Bits per pixel: ${infoHeader.bitsPerPixel}`)
		console.log(`Compression: ${infoHeader.compressionMethod}`)
		console.log(`Resolution: ${infoHeader.horizontalResolution} x ${infoHeader.verticalResolution} px/m`)
		console.log(`Declared file size: ${fileHeader.size}`)
		console.log(`Pixel data offset: ${fileHeader.offset}`)
	}

	console.log()
}

async function createImage(out: string, options: CliOptions, logger: ILogger): Promise<void> {
	const { width, height } = options.size
		? parseSize(options.size)
		: { width: config.fillWidth, height: config.fillHeight }
	const color = resolveColor(options)

	const pixels = Array.from({ length: width * height }, () => color)
	await writeBitmapFile(out, createBitmap(width, height, pixels))

	if (!options.quiet) {
		logger.success(`Created ${out} (${width} x ${height}, ${toHex(color)})`)
	}
}

async function matchColor(palettePath: string, options: CliOptions): Promise<void> {
	if (!options.color && !options.hsv) {
		throw new Error('match requires --color or --hsv')
	}
	const target = resolveColor(options)
	const palette = await readBitmapFile(palettePath)
	const location = palette.nearestMatch(target)

	if (!location) {
		console.log('No match: palette is empty')
		return
	}

	const found = palette.pixelAt(location.x, location.y)
	console.log(`${location.x},${location.y}${found ? ` ${toHex(found)}` : ''}`)
}

async function flagCommand(action: string | undefined, options: CliOptions, logger: ILogger): Promise<void> {
	const store = new FileFlagStore(resolve(options.store ?? config.storePath))
	const palettePath = options.palette ?? config.palettePath

	if (action === 'read') {
		const palette = await readBitmapFile(palettePath)
		const flag = await readFlag(store, palette, { logger })
		const out = options.out ?? config.flagOutputPath
		await writeBitmapFile(out, flag)
		if (!options.quiet) {
			logger.success(`Wrote flag to ${out}`)
		}
	} else if (action === 'write') {
		const palette = await readBitmapFile(palettePath)
		const input = options.input ?? config.flagInputPath
		const flag = await readBitmapFile(input)
		await writeFlag(store, palette, flag, { logger })
		if (!options.quiet) {
			logger.success(`Stored ${input} in ${store.path}`)
		}
	} else {
		throw new Error(`Unknown flag action: ${action ?? '(none)'} (expected read or write)`)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
	const { inputs, options } = parseArgs(process.argv.slice(2))
	const logger = getLogger('bmpkit', options.verbose ?? false)

	if (options.help || (inputs.length === 0 && !options.version)) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`bmpkit v${VERSION}`)
		return
	}

	const [command] = inputs
	logger.debug(`command: ${inputs.join(' ')}`)

	switch (command) {
		case 'info':
			await showInfo(requireInput(inputs, 1, 'bmpkit info <file>'))
			break
		case 'create':
			await createImage(requireInput(inputs, 1, 'bmpkit create <out> [options]'), options, logger)
			break
		case 'match':
			await matchColor(requireInput(inputs, 1, 'bmpkit match <palette> --color <#hex>'), options)
			break
		case 'flag':
			await flagCommand(inputs[1], options, logger)
			break
		default:
			throw new Error(`Unknown command: ${command ?? ''}`)
	}
}

main().catch((err: unknown) => {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
	process.exit(1)
})
