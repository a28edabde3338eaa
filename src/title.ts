/**
 * Display titles from file and folder names
 */

import { extname } from "node:path"

/**
 * Turn a filename (or folder name) into a human-readable title.
 *
 * @example
 * cleanTitle("Super_Mario_World (USA) [!].sfc") // "Super Mario World"
 * cleanTitle("Halo.xiso.iso")                   // "Halo"
 * cleanTitle("Demon's Souls [BLUS30443]", { isFile: false })
 */
export function cleanTitle(
	name: string,
	options: { isFile?: boolean } = {},
): string {
	const isFile = options.isFile ?? true

	let stem = name
	if (isFile) {
		const ext = extname(stem)
		if (ext && ext !== stem) stem = stem.slice(0, -ext.length)
		stem = stem.replace(/\.xiso$/i, "")
	}

	const title = stem
		.replace(/\[.*?\]/g, "")
		.replace(/\(.*?\)/g, "")
		.replace(/[._]/g, " ")
		.replace(/\s+/g, " ")
		.trim()

	return title || stem.trim()
}
