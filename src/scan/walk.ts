/**
 * Top-down library walk
 *
 * Yields every directory and file under a root in name order. Hidden
 * entries are pruned, symlinked directories are reported but never
 * descended, and directory units (a folder that is one game as a whole)
 * are yielded once with their contents skipped.
 */

import type { Dirent } from "node:fs"
import { readdir, stat } from "node:fs/promises"
import { basename, join } from "node:path"
import { log } from "../logger.js"
import {
	DIRECTORY_UNITS,
	DIRECT_PLATFORM,
	PLATFORM_FOLDER_ALIASES,
} from "../platforms.js"
import type { Platform } from "../types.js"

export type WalkItem =
	| { kind: "dir"; path: string; name: string }
	| { kind: "file"; path: string; name: string; dir: string }
	| { kind: "unit"; path: string; name: string; platform: Platform }

// Files too: macOS leaves "._<name>" resource forks with the game's extension
function isHidden(name: string): boolean {
	return name.startsWith(".")
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory()
	} catch {
		return false
	}
}

function byName(a: Dirent, b: Dirent): number {
	return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
}

/**
 * Platform of a directory that should be cataloged as a single game,
 * or null for an ordinary folder.
 */
export async function directoryUnitPlatform(
	parent: string,
	name: string,
): Promise<Platform | null> {
	const path = join(parent, name)
	for (const unit of DIRECTORY_UNITS) {
		if (await isDirectory(join(path, unit.marker))) return unit.platform
	}
	// Every folder directly inside a PC folder is one installed game
	const parentPlatform = PLATFORM_FOLDER_ALIASES.get(
		basename(parent).toLowerCase(),
	)
	return parentPlatform === DIRECT_PLATFORM ? DIRECT_PLATFORM : null
}

async function readSorted(dir: string): Promise<Dirent[]> {
	const entries = await readdir(dir, { withFileTypes: true })
	return entries.filter(entry => !isHidden(entry.name)).sort(byName)
}

async function* walkDirectory(
	dir: string,
	entries: Dirent[],
): AsyncGenerator<WalkItem> {
	const descend: string[] = []
	const files: Dirent[] = []

	for (const entry of entries) {
		const path = join(dir, entry.name)

		if (entry.isDirectory()) {
			const platform = await directoryUnitPlatform(dir, entry.name)
			if (platform) {
				yield { kind: "unit", path, name: entry.name, platform }
			} else {
				yield { kind: "dir", path, name: entry.name }
				descend.push(path)
			}
		} else if (entry.isSymbolicLink()) {
			// Linked folders are counted but not followed; linked files are games like any other
			if (await isDirectory(path)) {
				yield { kind: "dir", path, name: entry.name }
			} else {
				files.push(entry)
			}
		} else if (entry.isFile()) {
			files.push(entry)
		}
	}

	for (const entry of files) {
		yield { kind: "file", path: join(dir, entry.name), name: entry.name, dir }
	}

	for (const sub of descend) {
		let children: Dirent[]
		try {
			children = await readSorted(sub)
		} catch (err) {
			log.scan.warn(
				{ dir: sub, error: err instanceof Error ? err.message : String(err) },
				"skipping unreadable directory",
			)
			continue
		}
		yield* walkDirectory(sub, children)
	}
}

/**
 * Walk a library root.
 *
 * Rejects on the first `next()` when the root itself cannot be read;
 * unreadable subdirectories are logged and skipped.
 */
export async function* walkLibrary(root: string): AsyncGenerator<WalkItem> {
	const entries = await readSorted(root)
	yield* walkDirectory(root, entries)
}

/**
 * Number of items a scan of `roots` will process. Uses the same pruning
 * rules as the walk itself so progress ends at exactly total/total.
 */
export async function countLibraryItems(roots: string[]): Promise<number> {
	let total = 0
	for (const root of roots) {
		try {
			for await (const _item of walkLibrary(root)) {
				total++
			}
		} catch (err) {
			log.scan.debug(
				{ root, error: err instanceof Error ? err.message : String(err) },
				"root not counted",
			)
		}
	}
	return total
}
