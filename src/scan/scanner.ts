/**
 * Library Scanner
 *
 * Walks every configured root, classifies what it finds, and builds a
 * deduplicated catalog. Uses an async generator so the caller decides how
 * progress is shown: a finite stream of events ending with exactly one
 * `scan:complete` that carries the whole snapshot.
 *
 * Usage:
 * ```ts
 * for await (const event of scanLibrary({ roots, metadata })) {
 *   switch (event.type) {
 *     case "progress": bar.update(event.processed, event.total); break
 *     case "scan:complete": store.save(event.catalog); break
 *   }
 * }
 * ```
 */

import { resolve } from "node:path"
import { classify } from "../classify.js"
import { computeKey } from "../identity.js"
import { log } from "../logger.js"
import { normalizePlatform } from "../platforms.js"
import { cleanTitle } from "../title.js"
import type { Catalog, CatalogEntry, EntryMetadata, Platform } from "../types.js"
import { addEntry, cloneMetadata, createCatalog } from "../catalog/catalog.js"
import { pathSize } from "./size.js"
import { countLibraryItems, walkLibrary, type WalkItem } from "./walk.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScanOptions {
	/** Library roots, scanned in order */
	roots: string[]
	/** Stored metadata overlay, merged into entries whose key survives */
	metadata?: ReadonlyMap<string, EntryMetadata>
}

/** Events emitted during a library scan */
export type ScanEvent =
	| { type: "scan:start"; roots: string[]; total: number }
	| { type: "root:start"; root: string }
	| { type: "root:skipped"; root: string; error: string }
	| { type: "progress"; processed: number; total: number; path: string }
	| { type: "entry"; entry: CatalogEntry }
	| {
			type: "scan:complete"
			catalog: Catalog
			processed: number
			skippedRoots: string[]
			durationMs: number
	  }

export type ScannerState = "idle" | "scanning" | "finished"

// ═══════════════════════════════════════════════════════════════════════════════
// Main Generator
// ═══════════════════════════════════════════════════════════════════════════════

function platformFor(item: WalkItem, root: string): Platform | null {
	switch (item.kind) {
		case "unit":
			return item.platform
		case "file":
			return classify(item.dir, item.name, { root })
		case "dir":
			return null
	}
}

async function buildEntry(
	item: WalkItem,
	key: string,
	platform: Platform,
	metadata: ReadonlyMap<string, EntryMetadata> | undefined,
): Promise<CatalogEntry> {
	const stored = metadata?.get(key)
	return {
		key,
		title: cleanTitle(item.name, { isFile: item.kind === "file" }),
		path: item.path,
		size: await pathSize(item.path),
		platform,
		metadata: stored ? cloneMetadata(stored) : {},
	}
}

/**
 * Async generator that scans library roots into a fresh catalog.
 *
 * A root that cannot be read is reported with `root:skipped` and the scan
 * carries on with the next one. The catalog is only exposed by the final
 * `scan:complete` event, never partially.
 */
export async function* scanLibrary(
	options: ScanOptions,
): AsyncGenerator<ScanEvent> {
	const startTime = Date.now()
	const roots = options.roots.map(root => resolve(root))
	const catalog = createCatalog()
	const skippedRoots: string[] = []

	let total = await countLibraryItems(roots)
	let processed = 0

	yield { type: "scan:start", roots, total }

	for (const root of roots) {
		yield { type: "root:start", root }
		try {
			for await (const item of walkLibrary(root)) {
				processed++
				// Files created after the counting pass must not push progress past 100%
				if (processed > total) total = processed
				yield { type: "progress", processed, total, path: item.path }

				const classified = platformFor(item, root)
				if (!classified) continue

				const key = computeKey(item.path)
				if (catalog.entries.has(key)) {
					log.scan.debug({ path: item.path, key }, "duplicate path, skipped")
					continue
				}

				const entry = await buildEntry(
					item,
					key,
					normalizePlatform(classified),
					options.metadata,
				)
				addEntry(catalog, entry)
				yield { type: "entry", entry }
			}
		} catch (err) {
			const error = err instanceof Error ? err.message : String(err)
			log.scan.warn({ root, error }, "library root unreadable, skipped")
			skippedRoots.push(root)
			yield { type: "root:skipped", root, error }
		}
	}

	log.scan.info(
		{
			roots: roots.length,
			entries: catalog.entries.size,
			processed,
			durationMs: Date.now() - startTime,
		},
		"scan complete",
	)

	yield {
		type: "scan:complete",
		catalog,
		processed,
		skippedRoots,
		durationMs: Date.now() - startTime,
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Scanner
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Single-flight wrapper around scanLibrary().
 *
 * idle → scanning → finished; a finished scanner can scan again. Asking for
 * a scan while one is in flight is a no-op that resolves to null.
 */
export class LibraryScanner {
	private current: ScannerState = "idle"

	get state(): ScannerState {
		return this.current
	}

	async scan(
		options: ScanOptions,
		onEvent?: (event: ScanEvent) => void,
	): Promise<Catalog | null> {
		if (this.current === "scanning") {
			log.scan.debug("scan already in progress, request ignored")
			return null
		}

		this.current = "scanning"
		try {
			for await (const event of scanLibrary(options)) {
				onEvent?.(event)
				if (event.type === "scan:complete") return event.catalog
			}
			throw new Error("Library scan ended without a snapshot")
		} finally {
			this.current = "finished"
		}
	}
}
