/**
 * Library configuration with Zod validation
 *
 * One JSON file holds the library roots, emulator profiles, platform
 * defaults, favorites/recents and the per-entry metadata overlay. It is
 * loaded once at startup and written on every structural change.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs"
import { homedir } from "node:os"
import { dirname, join, resolve } from "node:path"
import { z } from "zod"
import { log } from "./logger.js"
import type { EmulatorProfile, EntryMetadata, LibraryConfig } from "./types.js"

export const MAX_RECENTS = 20

const CONFIG_FILE = "config.json"
const CATALOG_FILE = "catalog.json"

// ─────────────────────────────────────────────────────────────────────────────
// File format
// ─────────────────────────────────────────────────────────────────────────────

const EmulatorSchema = z.object({
	path: z.string().min(1),
	systems: z.array(z.string()).default([]),
	args: z.string().default(""),
})

const MetadataSchema = z.object({
	playtime: z.number().nonnegative().optional(),
	custom_emulator: z.string().optional(),
	notes: z.string().optional(),
	tags: z.array(z.string()).optional(),
})

const ConfigFileSchema = z.object({
	libraryRoots: z.array(z.string()).default([]),
	emulators: z.record(z.string(), EmulatorSchema).default({}),
	platformDefaults: z.record(z.string(), z.string()).default({}),
	favorites: z.array(z.string()).default([]),
	recents: z.array(z.string()).default([]),
	metadata: z.record(z.string(), MetadataSchema).default({}),
})

export type ConfigFile = z.infer<typeof ConfigFileSchema>

/**
 * Raised when the configuration file exists but cannot be used.
 * This is the one blocking error: the user has to fix or remove the file.
 */
export class ConfigError extends Error {
	readonly path: string
	readonly issues: string[]

	constructor(path: string, issues: string[]) {
		super(`Invalid configuration file ${path}: ${issues.join("; ")}`)
		this.name = "ConfigError"
		this.path = path
		this.issues = issues
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Paths
// ─────────────────────────────────────────────────────────────────────────────

export interface AppPaths {
	home: string
	configPath: string
	catalogPath: string
}

/**
 * Where romdeck keeps its files: `home` argument, then ROMDECK_HOME,
 * then ~/.romdeck
 */
export function resolveAppPaths(home?: string): AppPaths {
	const dir = resolve(home ?? process.env["ROMDECK_HOME"] ?? join(homedir(), ".romdeck"))
	return {
		home: dir,
		configPath: join(dir, CONFIG_FILE),
		catalogPath: join(dir, CATALOG_FILE),
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────────────────────

export function createDefaultConfig(): LibraryConfig {
	return {
		libraryRoots: [],
		emulators: new Map(),
		platformDefaults: new Map(),
		favorites: [],
		recents: [],
		metadata: new Map(),
	}
}

function dedupe(values: string[]): string[] {
	return [...new Set(values)]
}

function fromFile(file: ConfigFile): LibraryConfig {
	const emulators = new Map<string, EmulatorProfile>()
	for (const [name, emulator] of Object.entries(file.emulators)) {
		emulators.set(name, {
			name,
			executablePath: emulator.path,
			systems: emulator.systems,
			argsTemplate: emulator.args,
		})
	}

	const metadata = new Map<string, EntryMetadata>()
	for (const [key, stored] of Object.entries(file.metadata)) {
		metadata.set(key, {
			...(stored.playtime !== undefined && { playtime: stored.playtime }),
			...(stored.custom_emulator !== undefined && {
				customEmulator: stored.custom_emulator,
			}),
			...(stored.notes !== undefined && { notes: stored.notes }),
			...(stored.tags !== undefined && { tags: stored.tags }),
		})
	}

	return {
		libraryRoots: dedupe(file.libraryRoots),
		emulators,
		platformDefaults: new Map(Object.entries(file.platformDefaults)),
		favorites: dedupe(file.favorites),
		recents: dedupe(file.recents).slice(0, MAX_RECENTS),
		metadata,
	}
}

function toFile(config: LibraryConfig): ConfigFile {
	const emulators: ConfigFile["emulators"] = {}
	for (const profile of config.emulators.values()) {
		emulators[profile.name] = {
			path: profile.executablePath,
			systems: profile.systems,
			args: profile.argsTemplate,
		}
	}

	const metadata: ConfigFile["metadata"] = {}
	for (const [key, value] of config.metadata) {
		metadata[key] = {
			...(value.playtime !== undefined && { playtime: value.playtime }),
			...(value.customEmulator !== undefined && {
				custom_emulator: value.customEmulator,
			}),
			...(value.notes !== undefined && { notes: value.notes }),
			...(value.tags !== undefined && { tags: value.tags }),
		}
	}

	return {
		libraryRoots: config.libraryRoots,
		emulators,
		platformDefaults: Object.fromEntries(config.platformDefaults),
		favorites: config.favorites,
		recents: config.recents,
		metadata,
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Load / Save
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Load the library configuration.
 *
 * A missing file yields the defaults; a file that is not JSON or does not
 * match the schema throws ConfigError.
 */
export function loadLibraryConfig(path: string): LibraryConfig {
	if (!existsSync(path)) {
		log.config.debug({ path }, "no configuration file, using defaults")
		return createDefaultConfig()
	}

	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(path, "utf8"))
	} catch (err) {
		throw new ConfigError(path, [err instanceof Error ? err.message : String(err)])
	}

	const result = ConfigFileSchema.safeParse(raw)
	if (!result.success) {
		throw new ConfigError(
			path,
			result.error.issues.map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
		)
	}
	return fromFile(result.data)
}

export function saveLibraryConfig(path: string, config: LibraryConfig): void {
	mkdirSync(dirname(path), { recursive: true })
	const tmpPath = `${path}.tmp`
	writeFileSync(tmpPath, JSON.stringify(toFile(config), null, 2), "utf8")
	renameSync(tmpPath, path)
	log.config.debug({ path }, "configuration saved")
}

/**
 * Thin handle on the config file so components never touch ambient state.
 */
export class ConfigStore {
	readonly path: string

	constructor(path: string) {
		this.path = path
	}

	load(): LibraryConfig {
		return loadLibraryConfig(this.path)
	}

	save(config: LibraryConfig): void {
		saveLibraryConfig(this.path, config)
	}
}
