/**
 * On-disk size of catalog items
 */

import type { Dirent } from "node:fs"
import { readdir, stat } from "node:fs/promises"
import { join } from "node:path"
import pLimit from "p-limit"
import { log } from "../logger.js"

/** Concurrent stat() calls while summing a directory */
const STAT_CONCURRENCY = 16

const limit = pLimit(STAT_CONCURRENCY)

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

async function fileSize(path: string): Promise<number> {
	try {
		const info = await stat(path)
		return info.isFile() ? info.size : 0
	} catch (err) {
		log.scan.debug({ path, error: errorMessage(err) }, "file vanished, size 0")
		return 0
	}
}

async function directorySize(dir: string): Promise<number> {
	let entries: Dirent[]
	try {
		entries = await readdir(dir, { withFileTypes: true })
	} catch (err) {
		log.scan.debug({ dir, error: errorMessage(err) }, "directory unreadable, size 0")
		return 0
	}

	const sizes = await Promise.all(
		entries.map(entry => {
			const path = join(dir, entry.name)
			if (entry.isDirectory()) return directorySize(path)
			if (entry.isFile() || entry.isSymbolicLink()) {
				return limit(() => fileSize(path))
			}
			return 0
		}),
	)
	return sizes.reduce((sum, size) => sum + size, 0)
}

/**
 * Total bytes for a file, or the recursive sum of regular files for a
 * directory. Anything that disappears mid-scan counts as 0.
 */
export async function pathSize(path: string): Promise<number> {
	try {
		const info = await stat(path)
		return info.isDirectory() ? await directorySize(path) : info.size
	} catch (err) {
		log.scan.debug({ path, error: errorMessage(err) }, "item vanished, size 0")
		return 0
	}
}
