import type { Catalog, CatalogEntry, EntryMetadata, Platform } from "../types.js"

export interface CatalogStats {
	totals: {
		entries: number
		bytes: number
		platforms: number
	}
	perPlatform: Array<{ platform: Platform; entries: number; bytes: number }>
	playtime: {
		/** Seconds across every entry */
		totalSeconds: number
		playedEntries: number
		/** Most played first */
		topTitles: Array<{ key: string; title: string; seconds: number }>
	}
	metadata: {
		withNotes: number
		withTags: number
		withCustomEmulator: number
	}
	tags: Array<{ tag: string; count: number }>
}

function sortCountsDesc(
	a: { count: number; tag: string },
	b: { count: number; tag: string },
): number {
	if (b.count !== a.count) return b.count - a.count
	return a.tag.toLowerCase().localeCompare(b.tag.toLowerCase())
}

function bump(map: Map<string, number>, key: string, amount = 1): void {
	map.set(key, (map.get(key) ?? 0) + amount)
}

function countMetadata(metadata: EntryMetadata, tagCounts: Map<string, number>): void {
	for (const tag of new Set(metadata.tags ?? [])) {
		const trimmed = tag.trim()
		if (trimmed) bump(tagCounts, trimmed)
	}
}

export function computeCatalogStats(
	catalog: Catalog,
	options: { topN?: number } = {},
): CatalogStats {
	const topN = options.topN ?? 8

	let bytes = 0
	let totalSeconds = 0
	let withNotes = 0
	let withTags = 0
	let withCustomEmulator = 0
	const played: CatalogEntry[] = []
	const tagCounts = new Map<string, number>()

	for (const entry of catalog.entries.values()) {
		bytes += entry.size
		const seconds = entry.metadata.playtime ?? 0
		if (seconds > 0) {
			totalSeconds += seconds
			played.push(entry)
		}
		if (entry.metadata.notes?.trim()) withNotes++
		if (entry.metadata.tags?.length) withTags++
		if (entry.metadata.customEmulator) withCustomEmulator++
		countMetadata(entry.metadata, tagCounts)
	}

	const perPlatform = [...catalog.byPlatform]
		.map(([platform, bucket]) => ({
			platform,
			entries: bucket.length,
			bytes: bucket.reduce((sum, entry) => sum + entry.size, 0),
		}))
		.sort((a, b) => b.entries - a.entries || a.platform.localeCompare(b.platform))

	const topTitles = played
		.map(entry => ({
			key: entry.key,
			title: entry.title,
			seconds: entry.metadata.playtime ?? 0,
		}))
		.sort((a, b) => b.seconds - a.seconds || a.title.localeCompare(b.title))
		.slice(0, topN)

	const tags = [...tagCounts.entries()]
		.map(([tag, count]) => ({ tag, count }))
		.sort(sortCountsDesc)

	return {
		totals: {
			entries: catalog.entries.size,
			bytes,
			platforms: catalog.byPlatform.size,
		},
		perPlatform,
		playtime: {
			totalSeconds,
			playedEntries: played.length,
			topTitles,
		},
		metadata: { withNotes, withTags, withCustomEmulator },
		tags,
	}
}
