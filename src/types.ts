/**
 * Shared type definitions for romdeck
 */

// ─────────────────────────────────────────────────────────────────────────────
// Platforms
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Platform label ("Super Nintendo", "PlayStation 3", "PC", ...).
 * The set is closed: every label comes from data/platforms.json, see
 * `isKnownPlatform()`.
 */
export type Platform = string

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

export interface EntryMetadata {
	/** Accumulated play time in seconds */
	playtime?: number
	/** Emulator profile name that overrides the platform default */
	customEmulator?: string
	notes?: string
	tags?: string[]
}

export interface CatalogEntry {
	/** Path-derived identity, see computeKey() */
	key: string
	title: string
	/** Absolute path to the file or directory representing the game */
	path: string
	/** Bytes; recursive sum for directories */
	size: number
	platform: Platform
	metadata: EntryMetadata
}

export interface Catalog {
	/** Flat key → entry map, exactly one entry per key */
	entries: Map<string, CatalogEntry>
	/** Platform buckets, derived from `entries` */
	byPlatform: Map<Platform, CatalogEntry[]>
}

// ─────────────────────────────────────────────────────────────────────────────
// Emulators & Config
// ─────────────────────────────────────────────────────────────────────────────

export interface EmulatorProfile {
	/** Unique label, used as registry key */
	name: string
	executablePath: string
	systems: Platform[]
	/** Argument string, optionally containing the %ROM% placeholder */
	argsTemplate: string
}

export interface LibraryConfig {
	libraryRoots: string[]
	emulators: Map<string, EmulatorProfile>
	/** platform → emulator name */
	platformDefaults: Map<Platform, string>
	favorites: string[]
	/** Most recent first, capped at MAX_RECENTS */
	recents: string[]
	/** Metadata overlay keyed by entry key, merged into entries on every scan */
	metadata: Map<string, EntryMetadata>
}

// ─────────────────────────────────────────────────────────────────────────────
// Launching
// ─────────────────────────────────────────────────────────────────────────────

export interface LaunchPlan {
	/** Program to execute (emulator binary, or the game itself) */
	command: string
	args: string[]
	cwd?: string
	/** The file or container handed to the emulator / executed directly */
	target: string
}

export type LaunchError =
	| { kind: "MissingEmulator"; platform: Platform }
	| { kind: "EmulatorChoiceRequired"; platform: Platform; candidates: string[] }
	| { kind: "NoLaunchTarget"; path: string; reason: string }
	| { kind: "InstallRequired"; path: string }
	| { kind: "InvalidArguments"; emulator: string; message: string }
	| { kind: "ProcessStartFailed"; command: string; message: string }
	| { kind: "UnknownEntry"; key: string }
	| { kind: "UnknownEmulator"; name: string }

export type ResolveResult =
	| { ok: true; plan: LaunchPlan }
	| { ok: false; error: LaunchError }

/** A started process as seen by the playtime tracker */
export interface ProcessHandle {
	pid: number
	/** Epoch milliseconds */
	startedAt: number
}

export type LaunchResult =
	| { ok: true; plan: LaunchPlan; handle: ProcessHandle }
	| { ok: false; error: LaunchError }
