/**
 * CLI defaults
 */

import { fromHex, type Pixel24 } from '@bmpkit/color'
import { FLAG_HEIGHT, FLAG_WIDTH } from '@bmpkit/flag'

export interface CliConfig {
	/** Reference image searched for nearest colors */
	palettePath: string
	/** Where `flag read` writes the flag bitmap */
	flagOutputPath: string
	/** Bitmap `flag write` stores */
	flagInputPath: string
	/** JSON file holding the flag grid */
	storePath: string
	/** Color `create` fills with when none is given */
	fillColor: Pixel24
	fillWidth: number
	fillHeight: number
}

export const config: CliConfig = {
	palettePath: 'palette.bmp',
	flagOutputPath: 'flag.bmp',
	flagInputPath: 'custom_flag.bmp',
	storePath: process.env.BMPKIT_FLAG_STORE ?? 'flag-store.json',
	fillColor: fromHex('#4CAF50'),
	fillWidth: FLAG_WIDTH,
	fillHeight: FLAG_HEIGHT,
}
