/**
 * Platform classification from a path's ancestor folders and a file's
 * extension. The folder signal always wins over the extension.
 */

import { basename, dirname, resolve } from "node:path"
import {
	DIRECT_PLATFORM,
	EXTENSION_PLATFORMS,
	PLATFORM_FOLDER_ALIASES,
	isExecutableFile,
	matchExtension,
} from "./platforms.js"
import type { Platform } from "./types.js"

export interface ClassifyOptions {
	/**
	 * Library root. Folders above it are not consulted, so a root living at
	 * e.g. /mnt/ds does not turn the whole library into Nintendo DS games.
	 * The root's own name still counts.
	 */
	root?: string
}

/**
 * Platform implied by the nearest ancestor folder, walking upward from `dir`.
 */
export function platformFromFolders(
	dir: string,
	options: ClassifyOptions = {},
): Platform | null {
	const stop = options.root ? resolve(options.root) : null
	let current = resolve(dir)

	for (;;) {
		const parent = dirname(current)
		if (parent === current) return null

		const platform = PLATFORM_FOLDER_ALIASES.get(basename(current).toLowerCase())
		if (platform) return platform

		if (stop !== null && current === stop) return null
		current = parent
	}
}

/** Platform implied by the file extension alone */
export function platformFromExtension(filename: string): Platform | null {
	const ext = matchExtension(filename)
	return ext ? (EXTENSION_PLATFORMS.get(ext) ?? null) : null
}

/**
 * Classify a file found in `dir`.
 *
 * Returns null when neither signal matches, meaning the file is not a game.
 * Under a direct-execution folder only executables and shortcuts qualify.
 */
export function classify(
	dir: string,
	filename: string,
	options: ClassifyOptions = {},
): Platform | null {
	const fromFolder = platformFromFolders(dir, options)
	if (fromFolder === DIRECT_PLATFORM) {
		return isExecutableFile(filename) ? fromFolder : null
	}
	if (fromFolder) return fromFolder
	return platformFromExtension(filename)
}
