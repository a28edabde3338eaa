/**
 * Library orchestrator
 *
 * Owns the configuration, the live catalog and both stores. Every write to
 * disk goes through here, one at a time, so the config file and the
 * catalog cache never see interleaved updates.
 */

import { resolve } from "node:path"
import { addEntry, cloneMetadata, createCatalog } from "./catalog/catalog.js"
import { findEntries, queryCatalog, type CatalogQuery } from "./catalog/query.js"
import { CatalogStore } from "./catalog/store.js"
import {
	ConfigStore,
	MAX_RECENTS,
	createDefaultConfig,
	resolveAppPaths,
	type AppPaths,
} from "./config.js"
import { EmulatorRegistry, EmulatorRegistryError } from "./emulators/registry.js"
import type { SplitOptions } from "./launch/args.js"
import {
	createPlaytimeTracker,
	type PlaytimeTracker,
	type PlaytimeTrackerOptions,
} from "./launch/playtime.js"
import {
	createProcessWatcher,
	launchEntry,
	nodeSpawner,
	type ProcessWatcher,
	type Spawner,
} from "./launch/process.js"
import { resolveLaunch } from "./launch/resolver.js"
import { log } from "./logger.js"
import { isDirectPlatform } from "./platforms.js"
import { LibraryScanner, type ScanEvent } from "./scan/scanner.js"
import { computeCatalogStats, type CatalogStats } from "./scan/stats.js"
import type {
	Catalog,
	CatalogEntry,
	EmulatorProfile,
	EntryMetadata,
	LaunchError,
	LaunchResult,
	LibraryConfig,
	Platform,
	ProcessHandle,
	ResolveResult,
} from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════════════════════════════════════

export interface LibraryOptions {
	/** App home; defaults to ROMDECK_HOME or ~/.romdeck */
	home?: string
	spawner?: Spawner
	/** Liveness probe for playtime; null disables tracking */
	watcher?: ProcessWatcher | null
	playtime?: PlaytimeTrackerOptions
	/** Word splitting of emulator argument templates */
	split?: SplitOptions
}

export interface OpenResult {
	source: "cache" | "scan"
	catalog: Catalog
}

export type EmulatorChoice =
	| { kind: "none" }
	| { kind: "resolved"; profile: EmulatorProfile; reason: "custom" | "default" | "only" }
	| { kind: "choose"; candidates: EmulatorProfile[] }
	| { kind: "error"; error: LaunchError }

// ═══════════════════════════════════════════════════════════════════════════════
// Library
// ═══════════════════════════════════════════════════════════════════════════════

export class Library {
	readonly paths: AppPaths
	private readonly configStore: ConfigStore
	private readonly catalogStore: CatalogStore
	private readonly scanner = new LibraryScanner()
	private readonly spawner: Spawner
	private readonly tracker: PlaytimeTracker | null
	private readonly split: SplitOptions
	private currentConfig: LibraryConfig = createDefaultConfig()
	private currentCatalog: Catalog = createCatalog()
	/** False until open() or rescan() produced a catalog; only then is the cache written */
	private catalogLoaded = false

	constructor(options: LibraryOptions = {}) {
		this.paths = resolveAppPaths(options.home)
		this.configStore = new ConfigStore(this.paths.configPath)
		this.catalogStore = new CatalogStore(this.paths.catalogPath)
		this.spawner = options.spawner ?? nodeSpawner
		this.split = options.split ?? { escapes: process.platform !== "win32" }
		this.tracker = createPlaytimeTracker(
			options.watcher === undefined ? createProcessWatcher() : options.watcher,
			(key, seconds) => this.addPlaytime(key, seconds),
			options.playtime ?? {},
		)
	}

	get config(): LibraryConfig {
		return this.currentConfig
	}

	get catalog(): Catalog {
		return this.currentCatalog
	}

	get emulators(): EmulatorRegistry {
		return new EmulatorRegistry(this.currentConfig)
	}

	get canTrackPlaytime(): boolean {
		return this.tracker !== null
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Loading & scanning
	// ─────────────────────────────────────────────────────────────────────────

	/**
	 * Load the configuration, then the cached catalog, falling back to a
	 * full scan when there is no usable cache.
	 */
	async open(onEvent?: (event: ScanEvent) => void): Promise<OpenResult> {
		this.currentConfig = this.configStore.load()

		const cached = this.catalogStore.load()
		if (cached) {
			this.currentCatalog = cached
			this.catalogLoaded = true
			this.applyOverlay()
			return { source: "cache", catalog: this.currentCatalog }
		}

		const scanned = await this.rescan(onEvent)
		return { source: "scan", catalog: scanned ?? this.currentCatalog }
	}

	/** Load only the configuration (commands that never touch the catalog) */
	loadConfig(): LibraryConfig {
		this.currentConfig = this.configStore.load()
		return this.currentConfig
	}

	/**
	 * Replace the catalog with a fresh scan of every root. Resolves to null
	 * when a scan is already running.
	 */
	async rescan(onEvent?: (event: ScanEvent) => void): Promise<Catalog | null> {
		this.catalogStore.invalidate()
		const catalog = await this.scanner.scan(
			{ roots: this.currentConfig.libraryRoots, metadata: this.currentConfig.metadata },
			onEvent,
		)
		if (!catalog) return null

		// Metadata edits made while the walk was running win over its snapshot
		this.currentCatalog = catalog
		this.catalogLoaded = true
		this.applyOverlay({ authoritative: true })
		this.catalogStore.save(this.currentCatalog)
		return this.currentCatalog
	}

	clearCache(): void {
		this.catalogStore.invalidate()
		log.catalog.info({ path: this.paths.catalogPath }, "catalog cache cleared")
	}

	query(query: CatalogQuery = {}): CatalogEntry[] {
		return queryCatalog(this.currentCatalog, this.currentConfig, query)
	}

	find(query: string): CatalogEntry[] {
		return findEntries(this.currentCatalog, query)
	}

	stats(): CatalogStats {
		return computeCatalogStats(this.currentCatalog)
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Roots, favorites, recents
	// ─────────────────────────────────────────────────────────────────────────

	/** Returns false when the root is already configured */
	addRoot(path: string): boolean {
		const root = resolve(path)
		if (this.currentConfig.libraryRoots.includes(root)) return false
		this.currentConfig.libraryRoots.push(root)
		this.saveConfig()
		return true
	}

	/** Returns false when the root was not configured */
	removeRoot(path: string): boolean {
		const root = resolve(path)
		const roots = this.currentConfig.libraryRoots
		const next = roots.filter(candidate => candidate !== root && candidate !== path)
		if (next.length === roots.length) return false
		this.currentConfig.libraryRoots = next
		this.saveConfig()
		return true
	}

	isFavorite(key: string): boolean {
		return this.currentConfig.favorites.includes(key)
	}

	/** Flip favorite status; returns the new status */
	toggleFavorite(key: string): boolean {
		const favorites = this.currentConfig.favorites
		const favorite = !favorites.includes(key)
		this.currentConfig.favorites = favorite
			? [...favorites, key]
			: favorites.filter(candidate => candidate !== key)
		this.saveConfig()
		return favorite
	}

	recordRecent(key: string): void {
		this.currentConfig.recents = [
			key,
			...this.currentConfig.recents.filter(candidate => candidate !== key),
		].slice(0, MAX_RECENTS)
		this.saveConfig()
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Metadata
	// ─────────────────────────────────────────────────────────────────────────

	/** Set or clear (undefined) the per-entry emulator override */
	setCustomEmulator(key: string, name: string | undefined): void {
		if (name !== undefined && !this.emulators.has(name)) {
			throw new EmulatorRegistryError(`No emulator named "${name}"`)
		}
		this.updateMetadata(key, ({ customEmulator: _previous, ...rest }) =>
			name === undefined ? rest : { ...rest, customEmulator: name },
		)
	}

	setNotes(key: string, notes: string | undefined): void {
		const text = notes?.trim()
		this.updateMetadata(key, ({ notes: _previous, ...rest }) =>
			text ? { ...rest, notes: text } : rest,
		)
	}

	setTags(key: string, tags: string[]): void {
		const unique = [...new Set(tags.map(tag => tag.trim()).filter(Boolean))]
		this.updateMetadata(key, ({ tags: _previous, ...rest }) =>
			unique.length > 0 ? { ...rest, tags: unique } : rest,
		)
	}

	/** Add whole seconds of play; non-positive amounts are ignored */
	addPlaytime(key: string, seconds: number): void {
		if (!(seconds > 0)) return
		this.updateMetadata(key, metadata => ({
			...metadata,
			playtime: (metadata.playtime ?? 0) + Math.round(seconds),
		}))
		log.playtime.info({ key, seconds }, "playtime recorded")
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Emulators
	// ─────────────────────────────────────────────────────────────────────────

	addEmulator(profile: EmulatorProfile): void {
		this.emulators.add(profile)
		this.saveConfig()
	}

	updateEmulator(name: string, profile: EmulatorProfile): void {
		this.emulators.update(name, profile)
		this.applyOverlay()
		this.saveAll()
	}

	removeEmulator(name: string): void {
		this.emulators.remove(name)
		this.applyOverlay()
		this.saveAll()
	}

	setPlatformDefault(platform: Platform, name: string): void {
		if (!this.emulators.has(name)) {
			throw new EmulatorRegistryError(`No emulator named "${name}"`)
		}
		this.currentConfig.platformDefaults.set(platform, name)
		this.saveConfig()
	}

	/** Returns false when the platform had no default */
	clearPlatformDefault(platform: Platform): boolean {
		const removed = this.currentConfig.platformDefaults.delete(platform)
		if (removed) this.saveConfig()
		return removed
	}

	/**
	 * Decide which emulator runs an entry: its custom emulator, then the
	 * platform default, then the only candidate. Several candidates leave
	 * the choice to the caller.
	 */
	chooseEmulator(entry: CatalogEntry): EmulatorChoice {
		if (isDirectPlatform(entry.platform)) return { kind: "none" }

		const registry = this.emulators
		const custom = entry.metadata.customEmulator
		if (custom !== undefined) {
			const profile = registry.get(custom)
			return profile
				? { kind: "resolved", profile, reason: "custom" }
				: { kind: "error", error: { kind: "UnknownEmulator", name: custom } }
		}

		const defaultName = this.currentConfig.platformDefaults.get(entry.platform)
		const fallback = defaultName === undefined ? undefined : registry.get(defaultName)
		if (fallback) return { kind: "resolved", profile: fallback, reason: "default" }

		const candidates = registry.forPlatform(entry.platform)
		const [only] = candidates
		if (candidates.length === 1 && only) {
			return { kind: "resolved", profile: only, reason: "only" }
		}
		if (candidates.length > 1) return { kind: "choose", candidates }
		return { kind: "error", error: { kind: "MissingEmulator", platform: entry.platform } }
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Launching
	// ─────────────────────────────────────────────────────────────────────────

	/**
	 * Work out the launch plan for an entry without starting anything.
	 * Without an explicit profile the emulator is chosen by
	 * chooseEmulator(); a choice between several candidates is reported as
	 * EmulatorChoiceRequired.
	 */
	planLaunch(key: string, profile?: EmulatorProfile): ResolveResult {
		const entry = this.currentCatalog.entries.get(key)
		if (!entry) return { ok: false, error: { kind: "UnknownEntry", key } }

		let emulator = profile
		if (!emulator) {
			const choice = this.chooseEmulator(entry)
			switch (choice.kind) {
				case "resolved":
					emulator = choice.profile
					break
				case "choose":
					return {
						ok: false,
						error: {
							kind: "EmulatorChoiceRequired",
							platform: entry.platform,
							candidates: choice.candidates.map(candidate => candidate.name),
						},
					}
				case "error":
					return { ok: false, error: choice.error }
				case "none":
					break
			}
		}

		const resolved = resolveLaunch(entry, emulator, this.split)
		if (!resolved.ok) {
			log.launch.warn({ key, error: resolved.error }, "launch not resolved")
		}
		return resolved
	}

	/**
	 * Plan and start an entry. A successful start moves the entry to the
	 * front of the recents.
	 */
	async launch(key: string, profile?: EmulatorProfile): Promise<LaunchResult> {
		const planned = this.planLaunch(key, profile)
		if (!planned.ok) return planned

		const result = await launchEntry(planned.plan, this.spawner)
		if (result.ok) this.recordRecent(key)
		return result
	}

	/**
	 * Wait for a launched process to exit and record its playtime. Resolves
	 * to the seconds played, or null when playtime cannot be tracked here.
	 */
	trackPlaytime(handle: ProcessHandle, key: string): Promise<number | null> {
		if (!this.tracker) return Promise.resolve(null)
		return this.tracker.track(handle, key)
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Internals
	// ─────────────────────────────────────────────────────────────────────────

	private updateMetadata(
		key: string,
		update: (metadata: EntryMetadata) => EntryMetadata,
	): void {
		const current = this.currentConfig.metadata.get(key) ?? {}
		const next = update(cloneMetadata(current))

		if (Object.keys(next).length === 0) this.currentConfig.metadata.delete(key)
		else this.currentConfig.metadata.set(key, next)

		const entry = this.currentCatalog.entries.get(key)
		if (entry) entry.metadata = cloneMetadata(next)

		this.saveConfig()
		if (entry) this.catalogStore.save(this.currentCatalog)
	}

	/**
	 * The config overlay is authoritative for every key it holds. With
	 * `authoritative`, keys it does not hold lose their metadata too.
	 */
	private applyOverlay(options: { authoritative?: boolean } = {}): void {
		const rebuilt = createCatalog()
		for (const entry of this.currentCatalog.entries.values()) {
			const stored = this.currentConfig.metadata.get(entry.key)
			if (stored) addEntry(rebuilt, { ...entry, metadata: cloneMetadata(stored) })
			else if (options.authoritative) addEntry(rebuilt, { ...entry, metadata: {} })
			else addEntry(rebuilt, entry)
		}
		this.currentCatalog = rebuilt
	}

	private saveConfig(): void {
		this.configStore.save(this.currentConfig)
	}

	/** Config always; the cache only once a catalog is loaded */
	private saveAll(): void {
		this.saveConfig()
		if (this.catalogLoaded) this.catalogStore.save(this.currentCatalog)
	}
}

// ═══════════════════════════════════════════════════════════════════════════════
// Messages
// ═══════════════════════════════════════════════════════════════════════════════

export function describeLaunchError(error: LaunchError): string {
	switch (error.kind) {
		case "MissingEmulator":
			return `No emulator is configured for ${error.platform}`
		case "EmulatorChoiceRequired":
			return `Several emulators can run ${error.platform} (${error.candidates.join(", ")}); pick one or set a default`
		case "NoLaunchTarget":
			return `Nothing to launch at ${error.path}: ${error.reason}`
		case "InstallRequired":
			return `${error.path} is an installer package; install it in the emulator first`
		case "InvalidArguments":
			return `Arguments of emulator "${error.emulator}" cannot be parsed: ${error.message}`
		case "ProcessStartFailed":
			return `Failed to start ${error.command}: ${error.message}`
		case "UnknownEntry":
			return `No catalog entry with key ${error.key}`
		case "UnknownEmulator":
			return `No emulator named "${error.name}"`
	}
}
