import { describe, it, expect } from "vitest"
import { mkdir } from "node:fs/promises"
import { join } from "node:path"
import {
	directCommand,
	findLaunchTarget,
	pickFolderExecutable,
	resolveLaunch,
} from "../src/launch/resolver.js"
import { makeEntry, makeProfile, touch, withTempDir } from "./helpers/index.js"

describe("pickFolderExecutable", () => {
	it("prefers a name containing game, then launch, then the first", async () => {
		await withTempDir(async dir => {
			await touch(dir, "a/setup.exe")
			await touch(dir, "a/Launcher.exe")
			await touch(dir, "a/TheGame.exe")
			await touch(dir, "b/setup.exe")
			await touch(dir, "b/launcher.exe")
			await touch(dir, "c/b.exe")
			await touch(dir, "c/a.exe")
			await touch(dir, "c/readme.txt")

			expect(pickFolderExecutable(join(dir, "a"))).toBe(join(dir, "a", "TheGame.exe"))
			expect(pickFolderExecutable(join(dir, "b"))).toBe(join(dir, "b", "launcher.exe"))
			expect(pickFolderExecutable(join(dir, "c"))).toBe(join(dir, "c", "a.exe"))
		})
	})

	it("returns null without executables", async () => {
		await withTempDir(async dir => {
			await touch(dir, "docs/readme.txt")
			expect(pickFolderExecutable(join(dir, "docs"))).toBeNull()
			expect(pickFolderExecutable(join(dir, "missing"))).toBeNull()
		})
	})
})

describe("resolveLaunch", () => {
	// ─────────────────────────────────────────────────────────────────────────
	// Direct execution
	// ─────────────────────────────────────────────────────────────────────────

	it("runs a PC file directly from its folder", async () => {
		await withTempDir(async dir => {
			const exe = await touch(dir, "pc/Doom.exe")
			const result = resolveLaunch(makeEntry({ path: exe, platform: "PC" }))
			expect(result).toEqual({
				ok: true,
				plan: { command: exe, args: [], cwd: join(dir, "pc"), target: exe },
			})
		})
	})

	it("runs the chosen executable of a PC folder", async () => {
		await withTempDir(async dir => {
			const exe = await touch(dir, "pc/Quake/quake_launcher.exe")
			const folder = join(dir, "pc", "Quake")
			const result = resolveLaunch(makeEntry({ path: folder, platform: "PC" }))
			expect(result).toEqual({
				ok: true,
				plan: { command: exe, args: [], cwd: folder, target: exe },
			})
		})
	})

	it("runs shell scripts through sh", async () => {
		await withTempDir(async dir => {
			const script = await touch(dir, "pc/start.sh")
			const result = resolveLaunch(makeEntry({ path: script, platform: "PC" }), undefined, {
				host: "linux",
			})
			expect(result).toEqual({
				ok: true,
				plan: { command: "sh", args: [script], cwd: join(dir, "pc"), target: script },
			})
		})
	})

	it("opens shortcuts with the host's opener", async () => {
		await withTempDir(async dir => {
			const shortcut = await touch(dir, "pc/Half-Life.lnk")
			const entry = makeEntry({ path: shortcut, platform: "PC" })
			const plan = (host: NodeJS.Platform) => {
				const result = resolveLaunch(entry, undefined, { host })
				return result.ok ? [result.plan.command, ...result.plan.args] : result.error.kind
			}

			expect(plan("win32")).toEqual(["explorer.exe", shortcut])
			expect(plan("darwin")).toEqual(["open", shortcut])
			expect(plan("linux")).toEqual(["xdg-open", shortcut])
		})
	})

	it("reports a PC folder without executables", async () => {
		await withTempDir(async dir => {
			await touch(dir, "pc/Empty/readme.txt")
			const folder = join(dir, "pc", "Empty")
			const result = resolveLaunch(makeEntry({ path: folder, platform: "PC" }))
			expect(result).toEqual({
				ok: false,
				error: {
					kind: "NoLaunchTarget",
					path: folder,
					reason: "no executable found in the game folder",
				},
			})
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Emulated platforms
	// ─────────────────────────────────────────────────────────────────────────

	it("requires a profile for emulated platforms", () => {
		const result = resolveLaunch(makeEntry({ platform: "Wii" }))
		expect(result).toEqual({
			ok: false,
			error: { kind: "MissingEmulator", platform: "Wii" },
		})
	})

	it("passes the ROM path to the emulator", async () => {
		await withTempDir(async dir => {
			const rom = await touch(dir, "SNES/Mario.sfc", 2097152)
			const result = resolveLaunch(makeEntry({ path: rom }), makeProfile())
			expect(result).toEqual({
				ok: true,
				plan: { command: "/opt/emu/snes9x", args: [rom], target: rom },
			})
		})
	})

	it("applies the argument template", async () => {
		await withTempDir(async dir => {
			const rom = await touch(dir, "SNES/Mario.sfc")
			const result = resolveLaunch(
				makeEntry({ path: rom }),
				makeProfile({ argsTemplate: "-fullscreen %ROM%" }),
			)
			expect(result.ok && result.plan.args).toEqual(["-fullscreen", rom])
		})
	})

	it("reports a template that cannot be split", async () => {
		await withTempDir(async dir => {
			const rom = await touch(dir, "SNES/Mario.sfc")
			const result = resolveLaunch(
				makeEntry({ path: rom }),
				makeProfile({ name: "Broken", argsTemplate: `"-f %ROM%` }),
			)
			expect(result).toEqual({
				ok: false,
				error: { kind: "InvalidArguments", emulator: "Broken", message: "No closing quotation" },
			})
		})
	})

	it("reports a stored path that is gone", () => {
		const path = "/nonexistent/romdeck/Mario.sfc"
		const result = resolveLaunch(makeEntry({ path }), makeProfile())
		expect(result).toEqual({
			ok: false,
			error: { kind: "NoLaunchTarget", path, reason: "the stored path no longer exists" },
		})
	})
})

describe("directCommand", () => {
	it("runs binaries as they are", () => {
		expect(directCommand("/games/pc/Doom.exe", "win32")).toEqual({
			command: "/games/pc/Doom.exe",
			args: [],
		})
		expect(directCommand("/games/pc/Celeste.AppImage", "linux")).toEqual({
			command: "/games/pc/Celeste.AppImage",
			args: [],
		})
	})

	it("hands batch files and internet shortcuts to the opener", () => {
		expect(directCommand("C:/Games/run.BAT", "win32")).toEqual({
			command: "explorer.exe",
			args: ["C:/Games/run.BAT"],
		})
		expect(directCommand("/games/pc/Store.url", "darwin")).toEqual({
			command: "open",
			args: ["/games/pc/Store.url"],
		})
		expect(directCommand("/games/pc/setup.cmd", "linux")).toEqual({
			command: "xdg-open",
			args: ["/games/pc/setup.cmd"],
		})
	})
})

describe("findLaunchTarget (nested packages)", () => {
	const ps3 = { platform: "PlayStation 3" }

	it("descends to EBOOT.BIN", async () => {
		await withTempDir(async dir => {
			const eboot = await touch(dir, "Demon's Souls/PS3_GAME/USRDIR/EBOOT.BIN", 64)
			const result = findLaunchTarget(makeEntry({ ...ps3, path: join(dir, "Demon's Souls") }))
			expect(result).toEqual({ ok: true, target: eboot })
		})
	})

	it("falls back to the container when only the marker exists", async () => {
		await withTempDir(async dir => {
			const container = join(dir, "Game")
			await mkdir(join(container, "PS3_GAME"), { recursive: true })
			expect(findLaunchTarget(makeEntry({ ...ps3, path: container }))).toEqual({
				ok: true,
				target: container,
			})
		})
	})

	it("reports a folder without the marker", async () => {
		await withTempDir(async dir => {
			const container = join(dir, "NotAGame")
			await mkdir(container)
			expect(findLaunchTarget(makeEntry({ ...ps3, path: container }))).toEqual({
				ok: false,
				error: {
					kind: "NoLaunchTarget",
					path: container,
					reason: "no PS3_GAME folder inside the package",
				},
			})
		})
	})

	it("asks for installation of .pkg files", async () => {
		await withTempDir(async dir => {
			const pkg = await touch(dir, "Game.PKG")
			const result = resolveLaunch(makeEntry({ ...ps3, path: pkg }), makeProfile({ name: "RPCS3" }))
			expect(result).toEqual({ ok: false, error: { kind: "InstallRequired", path: pkg } })
		})
	})
})
