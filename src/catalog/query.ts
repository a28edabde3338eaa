/**
 * Catalog views: filtering, searching and sorting entries for display
 */

import type { Catalog, CatalogEntry, LibraryConfig, Platform } from "../types.js"

export type CatalogView = "all" | "favorites" | "recents" | "platform"
export type CatalogSort = "name" | "size-asc" | "size-desc" | "playtime"

export const CATALOG_VIEWS: readonly CatalogView[] = ["all", "favorites", "recents", "platform"]
export const CATALOG_SORTS: readonly CatalogSort[] = ["name", "size-asc", "size-desc", "playtime"]

export interface CatalogQuery {
	view?: CatalogView
	/** Required for the "platform" view */
	platform?: Platform
	/** Case-insensitive substring of the title */
	search?: string
	/** Ignored by the "recents" view unless given explicitly */
	sort?: CatalogSort
}

// Shortest key prefix findEntries() accepts
const KEY_PREFIX = /^[0-9a-f]{6,}$/

function byTitle(a: CatalogEntry, b: CatalogEntry): number {
	return a.title.toLowerCase().localeCompare(b.title.toLowerCase())
}

const COMPARATORS: Record<CatalogSort, (a: CatalogEntry, b: CatalogEntry) => number> = {
	name: byTitle,
	"size-asc": (a, b) => a.size - b.size || byTitle(a, b),
	"size-desc": (a, b) => b.size - a.size || byTitle(a, b),
	playtime: (a, b) =>
		(b.metadata.playtime ?? 0) - (a.metadata.playtime ?? 0) || byTitle(a, b),
}

function pick(catalog: Catalog, keys: readonly string[]): CatalogEntry[] {
	const entries: CatalogEntry[] = []
	for (const key of keys) {
		const entry = catalog.entries.get(key)
		if (entry) entries.push(entry)
	}
	return entries
}

/**
 * List the entries of a view. Favorites and recents that are not in the
 * catalog (removed or under an unreachable root) are left out. Recents keep
 * their most-recent-first order when no sort is requested.
 */
export function queryCatalog(
	catalog: Catalog,
	config: Pick<LibraryConfig, "favorites" | "recents">,
	query: CatalogQuery = {},
): CatalogEntry[] {
	const view = query.view ?? "all"

	let entries: CatalogEntry[]
	switch (view) {
		case "all":
			entries = [...catalog.entries.values()]
			break
		case "favorites":
			entries = pick(catalog, config.favorites)
			break
		case "recents":
			entries = pick(catalog, config.recents)
			break
		case "platform": {
			const wanted = query.platform?.toLowerCase()
			entries = []
			for (const [platform, bucket] of catalog.byPlatform) {
				if (platform.toLowerCase() === wanted) entries.push(...bucket)
			}
			break
		}
	}

	const search = query.search?.trim().toLowerCase()
	if (search) {
		entries = entries.filter(entry => entry.title.toLowerCase().includes(search))
	}

	const sort = query.sort ?? (view === "recents" ? undefined : "name")
	return sort ? entries.sort(COMPARATORS[sort]) : entries
}

/**
 * Resolve what a user typed into catalog entries: an exact key, then a key
 * prefix of at least six hex digits, then an exact title (case-insensitive),
 * then a title substring. The first rule with any match decides.
 */
export function findEntries(catalog: Catalog, query: string): CatalogEntry[] {
	const needle = query.trim()
	if (!needle) return []

	const exact = catalog.entries.get(needle.toLowerCase())
	if (exact) return [exact]

	const all = [...catalog.entries.values()]
	const lower = needle.toLowerCase()
	const rules: Array<(entry: CatalogEntry) => boolean> = [
		entry => KEY_PREFIX.test(lower) && entry.key.startsWith(lower),
		entry => entry.title.toLowerCase() === lower,
		entry => entry.title.toLowerCase().includes(lower),
	]

	for (const rule of rules) {
		const matches = all.filter(rule)
		if (matches.length > 0) return matches.sort(byTitle)
	}
	return []
}
