#!/usr/bin/env node
/**
 * romdeck CLI - game library catalog and launcher
 */

import { join } from "node:path"
import { Command } from "commander"
import { ConfigError } from "../config.js"
import { detectEmulatorsIn } from "../emulators/detect.js"
import { EmulatorRegistryError } from "../emulators/registry.js"
import { formatBytes, formatPlaytime } from "../format.js"
import { Library, describeLaunchError } from "../library.js"
import { flushLogs, log, logToFile, logger } from "../logger.js"
import { knownPlatforms } from "../platforms.js"
import { createScanProgress } from "../progress.js"
import {
	promptConfirmRemoveEmulator,
	promptEmulatorChoice,
	promptSetDefault,
	setupPromptHandlers,
} from "../prompts.js"
import { isMissing } from "../catalog/catalog.js"
import { CATALOG_SORTS, CATALOG_VIEWS, type CatalogSort, type CatalogView } from "../catalog/query.js"
import { createSpinner, stopSpinner } from "../spinner.js"
import { ui } from "../ui.js"
import type { Catalog, CatalogEntry, EmulatorProfile, Platform } from "../types.js"

const VERSION = "0.1.0"

/** Bad command-line input; reported without a stack trace */
class UsageError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "UsageError"
	}
}

interface GlobalOptions {
	home?: string
	quiet: boolean
	verbose: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	await flushLogs()
	process.exitCode = code
}

function globalOptions(): GlobalOptions {
	return program.opts<GlobalOptions>()
}

function createLibrary(): Library {
	const { home } = globalOptions()
	return new Library(home === undefined ? {} : { home })
}

/** Scan with a progress bar (or plain lines in quiet mode) */
async function openLibrary(library: Library): Promise<void> {
	const { quiet } = globalOptions()
	const progress = createScanProgress(quiet || !process.stdout.isTTY)
	try {
		const opened = await library.open(event => progress.handle(event))
		if (opened.source === "scan") reportScan(library)
	} finally {
		progress.stop()
	}
}

function reportScan(library: Library): void {
	const stats = library.stats()
	ui.success(
		`${stats.totals.entries} games across ${stats.totals.platforms} platforms (${formatBytes(stats.totals.bytes)})`,
	)
}

/**
 * Run a command body, turning the errors users can fix into a message and
 * a non-zero exit code
 */
function action<A extends unknown[]>(
	fn: (...args: A) => Promise<void> | void,
): (...args: A) => Promise<void> {
	return async (...args: A) => {
		try {
			await fn(...args)
		} catch (err) {
			if (
				err instanceof ConfigError ||
				err instanceof EmulatorRegistryError ||
				err instanceof UsageError
			) {
				ui.error(err.message)
				await exitWithCode(1)
				return
			}
			throw err
		}
	}
}

/** Exactly one entry for a user query, or null after reporting why not */
function resolveEntry(library: Library, query: string): CatalogEntry | null {
	const matches = library.find(query)
	if (matches.length === 1 && matches[0]) return matches[0]

	if (matches.length === 0) {
		ui.error(`No game matches "${query}"`)
	} else {
		ui.warn(`"${query}" matches ${matches.length} games, use a key instead:`)
		for (const entry of matches.slice(0, 20)) {
			ui.entryLine(entry, library.isFavorite(entry.key))
		}
	}
	process.exitCode = 1
	return null
}

/** Case-insensitive lookup of a platform label */
function resolvePlatform(input: string): Platform | null {
	const wanted = input.trim().toLowerCase()
	const platform = knownPlatforms().find(label => label.toLowerCase() === wanted)
	if (!platform) {
		ui.error(`Unknown platform "${input}". Known platforms: ${knownPlatforms().join(", ")}`)
		process.exitCode = 1
		return null
	}
	return platform
}

function splitList(value: string | undefined): string[] {
	if (!value) return []
	return value
		.split(",")
		.map(item => item.trim())
		.filter(Boolean)
}

function parseChoice<T extends string>(value: string, allowed: readonly T[], label: string): T {
	const match = allowed.find(candidate => candidate === value)
	if (!match) {
		throw new UsageError(`Invalid ${label} "${value}". Expected one of: ${allowed.join(", ")}`)
	}
	return match
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("romdeck")
	.version(VERSION)
	.description("Catalog emulator games across your folders and launch them")
	.option("--home <dir>", "Directory holding config.json and catalog.json (default: $ROMDECK_HOME or ~/.romdeck)")
	.option("-q, --quiet", "Minimal output", false)
	.option("--verbose", "Debug output", false)
	.hook("preAction", () => {
		const { verbose } = globalOptions()
		if (verbose) logger.level = "debug"
	})

// ─────────────────────────────────────────────────────────────────────────────
// Catalog
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("scan")
	.description("Rescan every library root and rebuild the catalog")
	.option("--log-file [path]", "Write logs to a file while the progress bar is shown")
	.action(
		action(async (options: { logFile?: string | boolean }) => {
			const { quiet, verbose } = globalOptions()
			const library = createLibrary()
			if (options.logFile) {
				const logFilePath = logToFile({
					dir: join(library.paths.home, "logs"),
					...(typeof options.logFile === "string" && { logFilePath: options.logFile }),
				})
				ui.debug(`Logging to ${logFilePath}`, verbose)
			}

			library.loadConfig()
			if (library.config.libraryRoots.length === 0) {
				ui.warn("No library roots configured. Add one with: romdeck roots add <dir>")
				return
			}

			if (!quiet) {
				ui.banner(VERSION, library.paths.home, library.config.libraryRoots.length)
			}

			const progress = createScanProgress(quiet || !process.stdout.isTTY)
			const skipped: string[] = []
			let catalog: Catalog | null
			try {
				catalog = await library.rescan(event => {
					progress.handle(event)
					if (event.type === "root:skipped") skipped.push(`${event.root}: ${event.error}`)
				})
			} finally {
				progress.stop()
			}

			if (!catalog) {
				ui.warn("A scan is already running")
				return
			}

			ui.summarySection("Skipped roots", skipped, "red")
			reportScan(library)
			if (!quiet) {
				for (const row of library.stats().perPlatform) {
					ui.info(`${row.platform}: ${row.entries} (${formatBytes(row.bytes)})`)
				}
			}
		}),
	)

program
	.command("list")
	.description("List games in the catalog")
	.option("--view <view>", `One of: ${CATALOG_VIEWS.join(", ")}`, "all")
	.option("-p, --platform <name>", "Only this platform (implies --view platform)")
	.option("-s, --search <text>", "Case-insensitive title filter")
	.option("--sort <order>", `One of: ${CATALOG_SORTS.join(", ")}`)
	.option("--json", "Print entries as JSON", false)
	.action(
		action(
			async (options: {
				view: string
				platform?: string
				search?: string
				sort?: string
				json: boolean
			}) => {
				let view: CatalogView = parseChoice(options.view, CATALOG_VIEWS, "view")
				const sort: CatalogSort | undefined =
					options.sort === undefined
						? undefined
						: parseChoice(options.sort, CATALOG_SORTS, "sort order")

				let platform: Platform | undefined
				if (options.platform !== undefined) {
					const resolved = resolvePlatform(options.platform)
					if (!resolved) return
					platform = resolved
					view = "platform"
				}

				const library = createLibrary()
				await openLibrary(library)
				const entries = library.query({
					view,
					...(platform !== undefined && { platform }),
					...(options.search !== undefined && { search: options.search }),
					...(sort !== undefined && { sort }),
				})

				if (options.json) {
					const rows = entries.map(entry => ({ ...entry, missing: isMissing(entry) }))
					console.log(JSON.stringify(rows, null, 2))
					return
				}
				if (entries.length === 0) {
					ui.info("No games found")
					return
				}
				for (const entry of entries) {
					ui.entryLine(entry, library.isFavorite(entry.key))
				}
				if (!globalOptions().quiet) ui.info(`${entries.length} games`)
			},
		),
	)

program
	.command("info")
	.description("Show everything known about one game")
	.argument("<game>", "Key, key prefix or title")
	.action(
		action(async (query: string) => {
			const library = createLibrary()
			await openLibrary(library)
			const entry = resolveEntry(library, query)
			if (!entry) return

			ui.entryDetails(entry, library.isFavorite(entry.key))
			const choice = library.chooseEmulator(entry)
			switch (choice.kind) {
				case "none":
					ui.info("Runs directly, no emulator needed")
					break
				case "resolved":
					ui.info(`Launches with ${choice.profile.name} (${choice.reason})`)
					break
				case "choose":
					ui.info(`Emulators available: ${choice.candidates.map(c => c.name).join(", ")}`)
					break
				case "error":
					ui.warn(describeLaunchError(choice.error))
					break
			}
		}),
	)

program
	.command("stats")
	.description("Catalog totals, platforms and most played games")
	.action(
		action(async () => {
			const library = createLibrary()
			await openLibrary(library)
			const stats = library.stats()

			ui.header("Library")
			ui.info(
				`${stats.totals.entries} games, ${stats.totals.platforms} platforms, ${formatBytes(stats.totals.bytes)}`,
			)
			for (const row of stats.perPlatform) {
				ui.info(`${row.platform}: ${row.entries} (${formatBytes(row.bytes)})`)
			}

			ui.header("Playtime")
			ui.info(
				`${formatPlaytime(stats.playtime.totalSeconds)} across ${stats.playtime.playedEntries} games`,
			)
			for (const title of stats.playtime.topTitles) {
				ui.info(`${title.title}: ${formatPlaytime(title.seconds)}`)
			}
			if (stats.tags.length > 0) {
				ui.info(`Tags: ${stats.tags.map(t => `${t.tag} ${t.count}`).join(", ")}`)
			}
		}),
	)

// ─────────────────────────────────────────────────────────────────────────────
// Launching
// ─────────────────────────────────────────────────────────────────────────────

/** Pick an emulator interactively when several qualify */
async function chooseInteractively(
	library: Library,
	entry: CatalogEntry,
): Promise<EmulatorProfile | null | undefined> {
	const choice = library.chooseEmulator(entry)
	if (choice.kind !== "choose") return undefined
	if (!process.stdin.isTTY) return null

	const picked = await promptEmulatorChoice(entry.platform, choice.candidates)
	if (picked && (await promptSetDefault(entry.platform, picked.name))) {
		library.setPlatformDefault(entry.platform, picked.name)
		ui.success(`${picked.name} is now the default for ${entry.platform}`)
	}
	return picked
}

program
	.command("launch")
	.description("Start a game and track its playtime")
	.argument("<game>", "Key, key prefix or title")
	.option("-e, --emulator <name>", "Use this emulator profile")
	.option("--no-wait", "Return right after starting (no playtime tracking)")
	.option("-n, --dry-run", "Print the command without starting it", false)
	.action(
		action(
			async (
				query: string,
				options: { emulator?: string; wait: boolean; dryRun: boolean },
			) => {
				setupPromptHandlers()
				const library = createLibrary()
				await openLibrary(library)
				const entry = resolveEntry(library, query)
				if (!entry) return

				let profile: EmulatorProfile | undefined
				if (options.emulator !== undefined) {
					profile = library.emulators.get(options.emulator)
					if (!profile) {
						ui.error(describeLaunchError({ kind: "UnknownEmulator", name: options.emulator }))
						await exitWithCode(1)
						return
					}
				} else {
					const picked = await chooseInteractively(library, entry)
					if (picked === null) {
						ui.error(
							`Several emulators can run ${entry.platform}; pass --emulator or set a default`,
						)
						await exitWithCode(1)
						return
					}
					profile = picked
				}

				if (options.dryRun) {
					const planned = library.planLaunch(entry.key, profile)
					if (!planned.ok) {
						ui.error(describeLaunchError(planned.error))
						await exitWithCode(1)
						return
					}
					console.log([planned.plan.command, ...planned.plan.args].join(" "))
					return
				}

				const result = await library.launch(entry.key, profile)
				if (!result.ok) {
					ui.error(describeLaunchError(result.error))
					await exitWithCode(1)
					return
				}
				ui.success(`Started ${entry.title} (pid ${result.handle.pid})`)

				if (!options.wait || !library.canTrackPlaytime) return

				const spinner = createSpinner(`Playing ${entry.title}...`, globalOptions().quiet)
				const seconds = await library.trackPlaytime(result.handle, entry.key)
				if (spinner) {
					await stopSpinner({ ok: true, text: `Played ${formatPlaytime(seconds ?? 0)}` })
				} else {
					ui.info(`Played ${formatPlaytime(seconds ?? 0)}`)
				}
			},
		),
	)

// ─────────────────────────────────────────────────────────────────────────────
// Favorites & metadata
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("favorite")
	.description("Toggle a game's favorite flag")
	.argument("<game>", "Key, key prefix or title")
	.action(
		action(async (query: string) => {
			const library = createLibrary()
			await openLibrary(library)
			const entry = resolveEntry(library, query)
			if (!entry) return
			const favorite = library.toggleFavorite(entry.key)
			ui.success(`${entry.title} ${favorite ? "added to" : "removed from"} favorites`)
		}),
	)

program
	.command("meta")
	.description("Edit notes, tags or the emulator override of a game")
	.argument("<game>", "Key, key prefix or title")
	.option("--notes <text>", "Replace the notes")
	.option("--clear-notes", "Remove the notes", false)
	.option("--tags <list>", "Comma-separated tags (empty to clear)")
	.option("-e, --emulator <name>", "Always launch this game with this emulator")
	.option("--clear-emulator", "Go back to the platform default", false)
	.action(
		action(
			async (
				query: string,
				options: {
					notes?: string
					clearNotes: boolean
					tags?: string
					emulator?: string
					clearEmulator: boolean
				},
			) => {
				const library = createLibrary()
				await openLibrary(library)
				const entry = resolveEntry(library, query)
				if (!entry) return

				if (options.clearNotes) library.setNotes(entry.key, undefined)
				else if (options.notes !== undefined) library.setNotes(entry.key, options.notes)

				if (options.tags !== undefined) library.setTags(entry.key, splitList(options.tags))

				if (options.clearEmulator) library.setCustomEmulator(entry.key, undefined)
				else if (options.emulator !== undefined) {
					library.setCustomEmulator(entry.key, options.emulator)
				}

				const updated = library.catalog.entries.get(entry.key) ?? entry
				ui.entryDetails(updated, library.isFavorite(entry.key))
			},
		),
	)

// ─────────────────────────────────────────────────────────────────────────────
// Library roots
// ─────────────────────────────────────────────────────────────────────────────

const roots = program.command("roots").description("Manage library folders")

roots
	.command("list")
	.description("Show configured library roots")
	.action(
		action(() => {
			const library = createLibrary()
			const config = library.loadConfig()
			if (config.libraryRoots.length === 0) {
				ui.info("No library roots configured")
				return
			}
			for (const root of config.libraryRoots) console.log(root)
		}),
	)

roots
	.command("add")
	.description("Add a library root (run scan afterwards)")
	.argument("<dir>", "Folder to catalog")
	.action(
		action((dir: string) => {
			const library = createLibrary()
			library.loadConfig()
			if (library.addRoot(dir)) ui.success(`Added ${dir}`)
			else ui.info(`${dir} is already a library root`)
		}),
	)

roots
	.command("remove")
	.description("Remove a library root (run scan afterwards)")
	.argument("<dir>", "Configured folder")
	.action(
		action(async (dir: string) => {
			const library = createLibrary()
			library.loadConfig()
			if (library.removeRoot(dir)) {
				ui.success(`Removed ${dir}`)
				return
			}
			ui.error(`${dir} is not a library root`)
			await exitWithCode(1)
		}),
	)

// ─────────────────────────────────────────────────────────────────────────────
// Emulators
// ─────────────────────────────────────────────────────────────────────────────

const emulators = program.command("emulators").description("Manage emulator profiles")

emulators
	.command("list")
	.description("Show emulator profiles and platform defaults")
	.action(
		action(() => {
			const library = createLibrary()
			const config = library.loadConfig()
			const profiles = library.emulators.list()
			if (profiles.length === 0) {
				ui.info("No emulators configured. Try: romdeck emulators detect <dir> --add")
				return
			}
			for (const profile of profiles) {
				const defaults = [...config.platformDefaults]
					.filter(([, name]) => name === profile.name)
					.map(([platform]) => platform)
				ui.emulatorLine(profile, defaults)
			}
		}),
	)

emulators
	.command("add")
	.description("Add an emulator profile")
	.argument("<name>", "Unique profile name")
	.argument("<path>", "Emulator executable")
	.option("--systems <list>", "Comma-separated platforms it runs")
	.option("--args <template>", "Arguments; %ROM% marks where the game path goes", "")
	.action(
		action((name: string, path: string, options: { systems?: string; args: string }) => {
			const library = createLibrary()
			library.loadConfig()
			library.addEmulator({
				name,
				executablePath: path,
				systems: splitList(options.systems),
				argsTemplate: options.args,
			})
			ui.success(`Added emulator ${name}`)
		}),
	)

emulators
	.command("update")
	.description("Change an emulator profile")
	.argument("<name>", "Existing profile name")
	.option("--rename <name>", "New profile name")
	.option("--path <path>", "New executable")
	.option("--systems <list>", "Comma-separated platforms it runs")
	.option("--args <template>", "Arguments; %ROM% marks where the game path goes")
	.action(
		action(
			(
				name: string,
				options: { rename?: string; path?: string; systems?: string; args?: string },
			) => {
				const library = createLibrary()
				library.loadConfig()
				const current = library.emulators.get(name)
				if (!current) throw new EmulatorRegistryError(`No emulator named "${name}"`)

				library.updateEmulator(name, {
					name: options.rename ?? current.name,
					executablePath: options.path ?? current.executablePath,
					systems: options.systems === undefined ? current.systems : splitList(options.systems),
					argsTemplate: options.args ?? current.argsTemplate,
				})
				ui.success(`Updated emulator ${options.rename ?? name}`)
			},
		),
	)

emulators
	.command("remove")
	.description("Remove an emulator profile")
	.argument("<name>", "Profile name")
	.option("-y, --yes", "Do not ask for confirmation", false)
	.action(
		action(async (name: string, options: { yes: boolean }) => {
			setupPromptHandlers()
			const library = createLibrary()
			const config = library.loadConfig()

			const references =
				[...config.platformDefaults.values()].filter(value => value === name).length +
				[...config.metadata.values()].filter(meta => meta.customEmulator === name).length
			if (
				references > 0 &&
				!options.yes &&
				process.stdin.isTTY &&
				!(await promptConfirmRemoveEmulator(name, references))
			) {
				ui.info("Nothing removed")
				return
			}

			library.removeEmulator(name)
			ui.success(`Removed emulator ${name}`)
		}),
	)

emulators
	.command("detect")
	.description("Find known emulators in a folder")
	.argument("<dir>", "Folder to search")
	.option("--add", "Add every detected emulator that is not configured yet", false)
	.action(
		action(async (dir: string, options: { add: boolean }) => {
			const library = createLibrary()
			library.loadConfig()

			const spinner = createSpinner(`Searching ${dir}`, globalOptions().quiet)
			let detected: EmulatorProfile[]
			try {
				detected = await detectEmulatorsIn(dir)
			} catch (err) {
				await stopSpinner({ ok: false, text: `Cannot read ${dir}` })
				ui.error(err instanceof Error ? err.message : String(err))
				await exitWithCode(1)
				return
			}
			if (spinner) await stopSpinner({ ok: true, text: `Found ${detected.length} emulators` })

			const added: string[] = []
			for (const profile of detected) {
				ui.emulatorLine(profile, [])
				if (options.add && !library.emulators.has(profile.name)) {
					library.addEmulator(profile)
					added.push(profile.name)
				}
			}
			ui.summarySection("Added", added, "green")
		}),
	)

emulators
	.command("default")
	.description("Set the emulator used for a platform")
	.argument("<platform>", "Platform label, e.g. \"Super Nintendo\"")
	.argument("<name>", "Profile name")
	.action(
		action((input: string, name: string) => {
			const platform = resolvePlatform(input)
			if (!platform) return
			const library = createLibrary()
			library.loadConfig()
			library.setPlatformDefault(platform, name)
			ui.success(`${name} is now the default for ${platform}`)
		}),
	)

emulators
	.command("clear-default")
	.description("Forget the default emulator of a platform")
	.argument("<platform>", "Platform label")
	.action(
		action((input: string) => {
			const platform = resolvePlatform(input)
			if (!platform) return
			const library = createLibrary()
			library.loadConfig()
			if (library.clearPlatformDefault(platform)) ui.success(`Cleared default for ${platform}`)
			else ui.info(`${platform} has no default emulator`)
		}),
	)

// ─────────────────────────────────────────────────────────────────────────────
// Cache
// ─────────────────────────────────────────────────────────────────────────────

program
	.command("cache")
	.description("Catalog cache maintenance")
	.command("clear")
	.description("Delete the catalog cache; the next command rescans")
	.action(
		action(() => {
			const library = createLibrary()
			library.clearCache()
			ui.success(`Removed ${library.paths.catalogPath}`)
		}),
	)

program.parseAsync().catch(async (err: unknown) => {
	ui.error(err instanceof Error ? err.message : String(err))
	log.cli.error({ error: err instanceof Error ? err.stack : String(err) }, "command failed")
	await exitWithCode(1)
})
