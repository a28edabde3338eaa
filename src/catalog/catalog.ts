/**
 * In-memory catalog helpers
 */

import { existsSync } from "node:fs"
import type { Catalog, CatalogEntry, EntryMetadata } from "../types.js"

export function createCatalog(): Catalog {
	return { entries: new Map(), byPlatform: new Map() }
}

/**
 * Add an entry to both the flat map and its platform bucket.
 * Returns false (and changes nothing) when the key is already present.
 */
export function addEntry(catalog: Catalog, entry: CatalogEntry): boolean {
	if (catalog.entries.has(entry.key)) return false
	catalog.entries.set(entry.key, entry)
	const bucket = catalog.byPlatform.get(entry.platform)
	if (bucket) {
		bucket.push(entry)
	} else {
		catalog.byPlatform.set(entry.platform, [entry])
	}
	return true
}

/** Build a catalog (with platform buckets) from a list of entries */
export function buildCatalog(entries: Iterable<CatalogEntry>): Catalog {
	const catalog = createCatalog()
	for (const entry of entries) addEntry(catalog, entry)
	return catalog
}

export function cloneMetadata(metadata: EntryMetadata): EntryMetadata {
	return { ...metadata, ...(metadata.tags && { tags: [...metadata.tags] }) }
}

/** True when the file or folder behind an entry is gone since the last scan */
export function isMissing(entry: CatalogEntry): boolean {
	return !existsSync(entry.path)
}
