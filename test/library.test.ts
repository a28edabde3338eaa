/**
 * Library orchestration: persistence, emulator choice, launching, playtime
 */

import { afterEach, describe, it, expect, vi } from "vitest"
import { join } from "node:path"
import { EmulatorRegistryError } from "../src/emulators/registry.js"
import { computeKey } from "../src/identity.js"
import { Library, describeLaunchError, type LibraryOptions } from "../src/library.js"
import {
	fakeSpawner,
	fakeWatcher,
	makeEntry,
	makeProfile,
	touch,
	withTempDir,
} from "./helpers/index.js"

interface Fixture {
	dir: string
	home: string
	rom: string
	key: string
}

async function withLibrary<T>(
	fn: (fixture: Fixture, library: Library) => Promise<T>,
	options: Omit<LibraryOptions, "home"> = {},
): Promise<T> {
	return withTempDir(async dir => {
		const home = join(dir, "home")
		const rom = await touch(dir, "roms/snes/Mario.sfc", 512)
		const library = new Library({
			home,
			spawner: fakeSpawner(),
			watcher: fakeWatcher(),
			...options,
		})
		await library.open()
		library.addRoot(join(dir, "roms"))
		await library.rescan()
		return fn({ dir, home, rom, key: computeKey(rom) }, library)
	})
}

function reopen(home: string, options: Omit<LibraryOptions, "home"> = {}): Library {
	return new Library({ home, spawner: fakeSpawner(), watcher: fakeWatcher(), ...options })
}

afterEach(() => {
	vi.useRealTimers()
})

// ═══════════════════════════════════════════════════════════════════════════════
// Persistence
// ═══════════════════════════════════════════════════════════════════════════════

describe("Library persistence", () => {
	it("scans when there is no cache and reuses the cache afterwards", async () => {
		await withTempDir(async dir => {
			const home = join(dir, "home")
			const first = await reopen(home).open()
			expect(first.source).toBe("scan")
			expect(first.catalog.entries.size).toBe(0)
		})

		await withLibrary(async ({ home, key }) => {
			const opened = await reopen(home).open()
			expect(opened.source).toBe("cache")
			expect(opened.catalog.entries.get(key)?.title).toBe("Mario")
		})
	})

	it("keeps notes and tags across a rescan", async () => {
		await withLibrary(async ({ key }, library) => {
			library.setNotes(key, "  boss at the end  ")
			library.setTags(key, ["rpg", " rpg", "favorite-ish", ""])

			await library.rescan()

			expect(library.catalog.entries.get(key)?.metadata).toEqual({
				notes: "boss at the end",
				tags: ["rpg", "favorite-ish"],
			})
		})
	})

	it("drops metadata fields that are cleared", async () => {
		await withLibrary(async ({ key }, library) => {
			library.setNotes(key, "temp")
			library.setNotes(key, "   ")
			expect(library.catalog.entries.get(key)?.metadata).toEqual({})
			expect(library.config.metadata.has(key)).toBe(false)
		})
	})

	it("keeps metadata edited while a rescan is running", async () => {
		await withLibrary(async ({ home, key }, library) => {
			library.setNotes(key, "temp")

			await library.rescan(event => {
				if (event.type !== "entry") return
				library.addPlaytime(key, 100)
				library.setNotes(key, undefined)
			})

			expect(library.catalog.entries.get(key)?.metadata).toEqual({ playtime: 100 })
			const reloaded = reopen(home)
			await reloaded.open()
			expect(reloaded.catalog.entries.get(key)?.metadata).toEqual({ playtime: 100 })
		})
	})

	it("persists favorites", async () => {
		await withLibrary(async ({ home, key }, library) => {
			expect(library.toggleFavorite(key)).toBe(true)

			const reloaded = reopen(home)
			await reloaded.open()
			expect(reloaded.isFavorite(key)).toBe(true)
			expect(reloaded.query({ view: "favorites" }).map(entry => entry.key)).toEqual([key])

			expect(reloaded.toggleFavorite(key)).toBe(false)
			expect(reloaded.config.favorites).toEqual([])
		})
	})

	it("keeps the twenty most recent entries, newest first", async () => {
		await withLibrary(async (_fixture, library) => {
			for (let i = 0; i < 25; i++) library.recordRecent(`k${i}`)
			expect(library.config.recents).toHaveLength(20)
			expect(library.config.recents[0]).toBe("k24")
			expect(library.config.recents[19]).toBe("k5")

			library.recordRecent("k10")
			expect(library.config.recents).toHaveLength(20)
			expect(library.config.recents.slice(0, 2)).toEqual(["k10", "k24"])
		})
	})

	it("adds and removes roots once", async () => {
		await withLibrary(async ({ dir }, library) => {
			expect(library.addRoot(join(dir, "roms"))).toBe(false)
			expect(library.removeRoot(join(dir, "roms"))).toBe(true)
			expect(library.removeRoot(join(dir, "roms"))).toBe(false)
			expect(library.config.libraryRoots).toEqual([])
		})
	})
})

// ═══════════════════════════════════════════════════════════════════════════════
// Emulator choice
// ═══════════════════════════════════════════════════════════════════════════════

describe("Library.chooseEmulator", () => {
	it("needs no emulator for PC entries", async () => {
		await withLibrary(async (_fixture, library) => {
			expect(library.chooseEmulator(makeEntry({ platform: "PC" }))).toEqual({ kind: "none" })
		})
	})

	it("reports a platform nobody can run", async () => {
		await withLibrary(async (_fixture, library) => {
			expect(library.chooseEmulator(makeEntry())).toEqual({
				kind: "error",
				error: { kind: "MissingEmulator", platform: "Super Nintendo" },
			})
		})
	})

	it("takes the only candidate, then asks once there are several", async () => {
		await withLibrary(async (_fixture, library) => {
			library.addEmulator(makeProfile())
			expect(library.chooseEmulator(makeEntry())).toEqual({
				kind: "resolved",
				profile: makeProfile(),
				reason: "only",
			})

			library.addEmulator(makeProfile({ name: "bsnes", executablePath: "/opt/emu/bsnes" }))
			const choice = library.chooseEmulator(makeEntry())
			expect(choice.kind === "choose" && choice.candidates.map(p => p.name)).toEqual([
				"bsnes",
				"Snes9x",
			])
		})
	})

	it("prefers the platform default, and the entry override over both", async () => {
		await withLibrary(async (_fixture, library) => {
			library.addEmulator(makeProfile())
			library.addEmulator(makeProfile({ name: "bsnes", executablePath: "/opt/emu/bsnes" }))
			library.setPlatformDefault("Super Nintendo", "bsnes")

			const byDefault = library.chooseEmulator(makeEntry())
			expect(byDefault.kind === "resolved" && [byDefault.profile.name, byDefault.reason]).toEqual([
				"bsnes",
				"default",
			])

			const custom = library.chooseEmulator(makeEntry({ metadata: { customEmulator: "Snes9x" } }))
			expect(custom.kind === "resolved" && [custom.profile.name, custom.reason]).toEqual([
				"Snes9x",
				"custom",
			])
		})
	})

	it("reports an override naming a removed emulator", async () => {
		await withLibrary(async (_fixture, library) => {
			expect(library.chooseEmulator(makeEntry({ metadata: { customEmulator: "Gone" } }))).toEqual({
				kind: "error",
				error: { kind: "UnknownEmulator", name: "Gone" },
			})
		})
	})

	it("refuses unknown names for overrides and defaults", async () => {
		await withLibrary(async ({ key }, library) => {
			expect(() => library.setCustomEmulator(key, "Gone")).toThrow(EmulatorRegistryError)
			expect(() => library.setPlatformDefault("Super Nintendo", "Gone")).toThrow(
				'No emulator named "Gone"',
			)
		})
	})
})

// ═══════════════════════════════════════════════════════════════════════════════
// Launching
// ═══════════════════════════════════════════════════════════════════════════════

describe("Library.launch", () => {
	it("starts the emulator with the ROM and records a recent", async () => {
		const spawner = fakeSpawner()
		await withLibrary(
			async ({ rom, key }, library) => {
				library.addEmulator(makeProfile())

				const result = await library.launch(key)

				expect(result.ok).toBe(true)
				expect(spawner.plans).toEqual([
					{ command: "/opt/emu/snes9x", args: [rom], target: rom },
				])
				expect(library.config.recents).toEqual([key])
			},
			{ spawner },
		)
	})

	it("asks for a choice between several emulators", async () => {
		await withLibrary(async ({ key }, library) => {
			library.addEmulator(makeProfile())
			library.addEmulator(makeProfile({ name: "bsnes", executablePath: "/opt/emu/bsnes" }))

			expect(library.planLaunch(key)).toEqual({
				ok: false,
				error: {
					kind: "EmulatorChoiceRequired",
					platform: "Super Nintendo",
					candidates: ["bsnes", "Snes9x"],
				},
			})

			const chosen = library.planLaunch(key, makeProfile({ name: "bsnes", executablePath: "/opt/emu/bsnes" }))
			expect(chosen.ok && chosen.plan.command).toBe("/opt/emu/bsnes")
		})
	})

	it("reports unknown keys", async () => {
		await withLibrary(async (_fixture, library) => {
			expect(await library.launch("nope")).toEqual({
				ok: false,
				error: { kind: "UnknownEntry", key: "nope" },
			})
		})
	})

	it("leaves recents alone when the process fails to start", async () => {
		await withLibrary(
			async ({ key }, library) => {
				library.addEmulator(makeProfile())

				expect(await library.launch(key)).toEqual({
					ok: false,
					error: {
						kind: "ProcessStartFailed",
						command: "/opt/emu/snes9x",
						message: "spawn /opt/emu/snes9x ENOENT",
					},
				})
				expect(library.config.recents).toEqual([])
			},
			{ spawner: fakeSpawner({ fail: "spawn /opt/emu/snes9x ENOENT" }) },
		)
	})
})

// ═══════════════════════════════════════════════════════════════════════════════
// Playtime
// ═══════════════════════════════════════════════════════════════════════════════

describe("Library playtime", () => {
	it("adds the session length once the process exits", async () => {
		const watcher = fakeWatcher()
		let clock = 1_000_000
		await withLibrary(
			async ({ home, key }, library) => {
				vi.useFakeTimers({ toFake: ["setInterval", "clearInterval"] })
				library.addPlaytime(key, 60)

				const session = library.trackPlaytime({ pid: 7, startedAt: 1_000_000 }, key)
				clock += 125_400
				await vi.advanceTimersByTimeAsync(5000)
				watcher.exit(7)
				await vi.advanceTimersByTimeAsync(5000)

				expect(await session).toBe(125)
				expect(library.catalog.entries.get(key)?.metadata.playtime).toBe(185)

				const reloaded = reopen(home)
				await reloaded.open()
				expect(reloaded.catalog.entries.get(key)?.metadata.playtime).toBe(185)
			},
			{ watcher, playtime: { now: () => clock } },
		)
	})

	it("ignores non-positive amounts", async () => {
		await withLibrary(async ({ key }, library) => {
			library.addPlaytime(key, 0)
			library.addPlaytime(key, -3)
			expect(library.config.metadata.has(key)).toBe(false)
		})
	})

	it("resolves to null without a process watcher", async () => {
		await withLibrary(
			async ({ key }, library) => {
				expect(library.canTrackPlaytime).toBe(false)
				expect(await library.trackPlaytime({ pid: 7, startedAt: 0 }, key)).toBeNull()
			},
			{ watcher: null },
		)
	})
})

// ═══════════════════════════════════════════════════════════════════════════════
// Emulator edits
// ═══════════════════════════════════════════════════════════════════════════════

describe("Library emulator edits", () => {
	it("clears overrides of a removed emulator from the live catalog", async () => {
		await withLibrary(async ({ key }, library) => {
			library.addEmulator(makeProfile())
			library.setCustomEmulator(key, "Snes9x")
			expect(library.catalog.entries.get(key)?.metadata.customEmulator).toBe("Snes9x")

			library.removeEmulator("Snes9x")

			expect(library.catalog.entries.get(key)?.metadata.customEmulator).toBeUndefined()
			expect(library.emulators.has("Snes9x")).toBe(false)
		})
	})

	it("leaves the catalog cache alone when only the config is loaded", async () => {
		await withLibrary(async ({ home, key }, library) => {
			library.addEmulator(makeProfile())
			library.setCustomEmulator(key, "Snes9x")

			const configOnly = reopen(home)
			configOnly.loadConfig()
			configOnly.updateEmulator("Snes9x", makeProfile({ name: "Snes9x 1.62" }))
			configOnly.removeEmulator("Snes9x 1.62")

			const opened = await reopen(home).open()
			expect(opened.source).toBe("cache")
			expect(opened.catalog.entries.size).toBe(1)
			expect(opened.catalog.entries.get(key)?.metadata).toEqual({})
		})
	})

	it("moves overrides along with a renamed emulator", async () => {
		await withLibrary(async ({ key }, library) => {
			library.addEmulator(makeProfile())
			library.setCustomEmulator(key, "Snes9x")

			library.updateEmulator("Snes9x", makeProfile({ name: "Snes9x 1.62" }))

			expect(library.catalog.entries.get(key)?.metadata.customEmulator).toBe("Snes9x 1.62")
		})
	})
})

describe("describeLaunchError", () => {
	it("names what is missing", () => {
		expect(describeLaunchError({ kind: "MissingEmulator", platform: "Wii" })).toBe(
			"No emulator is configured for Wii",
		)
		expect(describeLaunchError({ kind: "UnknownEmulator", name: "Gone" })).toBe(
			'No emulator named "Gone"',
		)
		expect(
			describeLaunchError({
				kind: "EmulatorChoiceRequired",
				platform: "Wii",
				candidates: ["Dolphin", "Cemu"],
			}),
		).toBe("Several emulators can run Wii (Dolphin, Cemu); pick one or set a default")
	})
})
