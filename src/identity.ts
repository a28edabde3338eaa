/**
 * Stable catalog identity
 *
 * A key depends only on where an entry lives, never on its content: the
 * canonical path is hashed with SHA-256 and truncated to 32 hex chars.
 */

import { createHash } from "node:crypto"
import { realpathSync } from "node:fs"
import { resolve } from "node:path"

const KEY_LENGTH = 32

/** Hosts whose default filesystems compare names case-insensitively */
const CASE_INSENSITIVE_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set([
	"win32",
	"darwin",
])

function realOrResolved(path: string): string {
	const absolute = resolve(path)
	try {
		return realpathSync.native(absolute)
	} catch {
		// Not on disk (yet); the resolved path is the best we have
		return absolute
	}
}

/**
 * Canonical form of a path used for hashing.
 *
 * Symlinks are resolved when the path exists so two aliases of one file
 * share a key; separators are unified and case is folded on
 * case-insensitive hosts.
 */
export function canonicalPath(
	path: string,
	platform: NodeJS.Platform = process.platform,
): string {
	let canonical = realOrResolved(path).replace(/\\/g, "/")
	if (canonical.length > 1) {
		canonical = canonical.replace(/\/+$/, "")
	}
	return CASE_INSENSITIVE_PLATFORMS.has(platform)
		? canonical.toLowerCase()
		: canonical
}

/**
 * Derive the catalog key for a filesystem path.
 */
export function computeKey(
	path: string,
	platform: NodeJS.Platform = process.platform,
): string {
	return createHash("sha256")
		.update(canonicalPath(path, platform), "utf8")
		.digest("hex")
		.slice(0, KEY_LENGTH)
}
