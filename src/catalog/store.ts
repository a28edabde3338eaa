/**
 * Catalog Store (JSON cache file)
 *
 * Persists the catalog as one flat key → entry object so the library can
 * be shown instantly on the next start. Platform buckets are rebuilt on
 * load. Anything that does not validate is discarded and the file removed,
 * which forces a fresh scan.
 */

import { existsSync, readFileSync, renameSync, rmSync, writeFileSync, mkdirSync } from "node:fs"
import { dirname } from "node:path"
import { z } from "zod"
import { log } from "../logger.js"
import { isKnownPlatform } from "../platforms.js"
import type { Catalog, CatalogEntry, EntryMetadata } from "../types.js"
import { buildCatalog } from "./catalog.js"

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

const CachedEntrySchema = z.object({
	hash: z.string().min(1),
	title: z.string(),
	path: z.string().min(1),
	size: z.number().int().nonnegative(),
	platform: z.string().refine(isKnownPlatform, "unknown platform"),
	playtime: z.number().nonnegative().optional(),
	custom_emulator: z.string().optional(),
	notes: z.string().optional(),
	tags: z.array(z.string()).optional(),
})

const CatalogCacheSchema = z
	.record(z.string(), CachedEntrySchema)
	.superRefine((entries, ctx) => {
		for (const [key, entry] of Object.entries(entries)) {
			if (entry.hash !== key) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: [key, "hash"],
					message: "entry hash does not match its key",
				})
			}
		}
	})

type CachedEntry = z.infer<typeof CachedEntrySchema>

// ─────────────────────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────────────────────

function toCached(entry: CatalogEntry): CachedEntry {
	const { playtime, customEmulator, notes, tags } = entry.metadata
	return {
		hash: entry.key,
		title: entry.title,
		path: entry.path,
		size: entry.size,
		platform: entry.platform,
		...(playtime !== undefined && { playtime }),
		...(customEmulator !== undefined && { custom_emulator: customEmulator }),
		...(notes !== undefined && { notes }),
		...(tags !== undefined && { tags }),
	}
}

function fromCached(cached: CachedEntry): CatalogEntry {
	const metadata: EntryMetadata = {
		...(cached.playtime !== undefined && { playtime: cached.playtime }),
		...(cached.custom_emulator !== undefined && {
			customEmulator: cached.custom_emulator,
		}),
		...(cached.notes !== undefined && { notes: cached.notes }),
		...(cached.tags !== undefined && { tags: cached.tags }),
	}
	return {
		key: cached.hash,
		title: cached.title,
		path: cached.path,
		size: cached.size,
		platform: cached.platform,
		metadata,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// CatalogStore Class
// ─────────────────────────────────────────────────────────────────────────────

export class CatalogStore {
	readonly cachePath: string

	/**
	 * @param cachePath - Location of the JSON cache file
	 */
	constructor(cachePath: string) {
		this.cachePath = cachePath
	}

	/**
	 * Load the cached catalog.
	 *
	 * @returns The catalog, or null when there is no cache or it was rejected
	 */
	load(): Catalog | null {
		if (!existsSync(this.cachePath)) return null

		let parsed: unknown
		try {
			parsed = JSON.parse(readFileSync(this.cachePath, "utf8"))
		} catch (err) {
			this.reject(err instanceof Error ? err.message : String(err))
			return null
		}

		const result = CatalogCacheSchema.safeParse(parsed)
		if (!result.success) {
			this.reject(result.error.issues[0]?.message ?? "invalid catalog cache")
			return null
		}

		const catalog = buildCatalog(Object.values(result.data).map(fromCached))
		log.catalog.debug(
			{ path: this.cachePath, entries: catalog.entries.size },
			"catalog loaded from cache",
		)
		return catalog
	}

	/**
	 * Write the whole catalog. Goes through a temp file so a crash mid-write
	 * never leaves a truncated cache behind.
	 */
	save(catalog: Catalog): void {
		const payload: Record<string, CachedEntry> = {}
		for (const [key, entry] of catalog.entries) {
			payload[key] = toCached(entry)
		}

		mkdirSync(dirname(this.cachePath), { recursive: true })
		const tmpPath = `${this.cachePath}.tmp`
		writeFileSync(tmpPath, JSON.stringify(payload), "utf8")
		renameSync(tmpPath, this.cachePath)
		log.catalog.debug(
			{ path: this.cachePath, entries: catalog.entries.size },
			"catalog saved",
		)
	}

	/** Delete the cache file; the next load() returns null. */
	invalidate(): void {
		rmSync(this.cachePath, { force: true })
	}

	private reject(reason: string): void {
		log.catalog.warn({ path: this.cachePath, reason }, "catalog cache rejected")
		this.invalidate()
	}
}
