/**
 * Platform tables: folder aliases, file extensions, directory units and
 * nested package layouts. Loaded from data/platforms.json.
 */

import { readFileSync } from "node:fs"
import { z } from "zod"
import type { Platform } from "./types.js"

const NestedPackageSchema = z.object({
	/** Subdirectory that marks the container */
	marker: z.string().min(1),
	/** Relative path segments from the container to the real executable */
	executable: z.array(z.string().min(1)).min(1),
	/** Extensions that have to be installed into the emulator first */
	installOnly: z.array(z.string()).default([]),
})

const PlatformTablesSchema = z.object({
	folderAliases: z.record(z.string(), z.string()),
	extensions: z.record(z.string(), z.string()),
	mergedPlatforms: z.record(z.string(), z.string()).default({}),
	directExecution: z.object({
		platform: z.string(),
		executableExtensions: z.array(z.string()),
	}),
	directoryUnits: z.array(
		z.object({ marker: z.string().min(1), platform: z.string() }),
	),
	nestedPackages: z.record(z.string(), NestedPackageSchema).default({}),
})

export type NestedPackage = z.infer<typeof NestedPackageSchema>
export type PlatformTables = z.infer<typeof PlatformTablesSchema>

function loadPlatformTables(): PlatformTables {
	const url = new URL("../data/platforms.json", import.meta.url)
	const raw: unknown = JSON.parse(readFileSync(url, "utf8"))
	return PlatformTablesSchema.parse(raw)
}

const tables = loadPlatformTables()

/** Lower-cased folder name → platform */
export const PLATFORM_FOLDER_ALIASES: ReadonlyMap<string, Platform> = new Map(
	Object.entries(tables.folderAliases).map(([alias, platform]) => [
		alias.toLowerCase(),
		platform,
	]),
)

/** Lower-cased extension (with leading dot, may be compound) → platform */
export const EXTENSION_PLATFORMS: ReadonlyMap<string, Platform> = new Map(
	Object.entries(tables.extensions).map(([ext, platform]) => [
		ext.toLowerCase(),
		platform,
	]),
)

// Longest first so ".xiso.iso" is tried before ".iso"
const EXTENSIONS_BY_LENGTH = [...EXTENSION_PLATFORMS.keys()].sort(
	(a, b) => b.length - a.length,
)

/** Platform whose entries run without an emulator */
export const DIRECT_PLATFORM: Platform = tables.directExecution.platform

const EXECUTABLE_EXTENSIONS = new Set(
	tables.directExecution.executableExtensions.map(ext => ext.toLowerCase()),
)

/** Directories containing one of these markers are cataloged as one game */
export const DIRECTORY_UNITS: ReadonlyArray<{
	marker: string
	platform: Platform
}> = tables.directoryUnits

const NESTED_PACKAGES: ReadonlyMap<Platform, NestedPackage> = new Map(
	Object.entries(tables.nestedPackages),
)

const MERGED_PLATFORMS: ReadonlyMap<Platform, Platform> = new Map(
	Object.entries(tables.mergedPlatforms),
)

const KNOWN_PLATFORMS: ReadonlySet<Platform> = new Set([
	...PLATFORM_FOLDER_ALIASES.values(),
	...EXTENSION_PLATFORMS.values(),
	...MERGED_PLATFORMS.values(),
	...DIRECTORY_UNITS.map(unit => unit.platform),
	DIRECT_PLATFORM,
])

export function isKnownPlatform(label: string): label is Platform {
	return KNOWN_PLATFORMS.has(label)
}

/** All platform labels, sorted */
export function knownPlatforms(): Platform[] {
	return [...KNOWN_PLATFORMS].sort((a, b) => a.localeCompare(b))
}

export function isDirectPlatform(platform: Platform): boolean {
	return platform === DIRECT_PLATFORM
}

/**
 * Collapse platforms that share a catalog bucket
 * ("Game Boy Color" is stored as "Game Boy").
 */
export function normalizePlatform(platform: Platform): Platform {
	return MERGED_PLATFORMS.get(platform) ?? platform
}

export function nestedPackageFor(platform: Platform): NestedPackage | undefined {
	return NESTED_PACKAGES.get(platform)
}

/** Matching extension from the table (longest suffix wins), or undefined */
export function matchExtension(filename: string): string | undefined {
	const lower = filename.toLowerCase()
	return EXTENSIONS_BY_LENGTH.find(
		ext => lower.endsWith(ext) && lower.length > ext.length,
	)
}

/** True for files the direct-execution platform can run or open */
export function isExecutableFile(filename: string): boolean {
	const lower = filename.toLowerCase()
	const dot = lower.lastIndexOf(".")
	if (dot <= 0) return false
	return EXECUTABLE_EXTENSIONS.has(lower.slice(dot))
}
