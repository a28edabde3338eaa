/**
 * Launch Resolver
 *
 * Works out what to execute for a catalog entry: the entry itself for
 * direct-execution platforms, otherwise an emulator invocation built from
 * its profile. Some platforms store a container rather than the real
 * executable and need a fixed descent first.
 */

import { existsSync, readdirSync, statSync } from "node:fs"
import { dirname, extname, join, normalize } from "node:path"
import {
	isDirectPlatform,
	isExecutableFile,
	nestedPackageFor,
} from "../platforms.js"
import type {
	CatalogEntry,
	EmulatorProfile,
	LaunchError,
	ResolveResult,
} from "../types.js"
import { ShellSyntaxError, buildLaunchCommand, type SplitOptions } from "./args.js"

type TargetResult = { ok: true; target: string } | { ok: false; error: LaunchError }

export interface ResolveOptions extends SplitOptions {
	/** Host the plan runs on, defaults to this process's platform */
	host?: NodeJS.Platform
}

/** Shortcuts and batch files the OS only starts through its file opener */
const OPENED_EXTENSIONS: ReadonlySet<string> = new Set([".lnk", ".url", ".bat", ".cmd"])

function systemOpener(host: NodeJS.Platform): string {
	switch (host) {
		case "win32":
			return "explorer.exe"
		case "darwin":
			return "open"
		default:
			return "xdg-open"
	}
}

/**
 * argv that starts a direct-execution target. Binaries run as they are;
 * shell scripts go through `sh` so they need no execute bit; shortcuts
 * go through the host's opener.
 */
export function directCommand(
	target: string,
	host: NodeJS.Platform = process.platform,
): { command: string; args: string[] } {
	const ext = extname(target).toLowerCase()
	if (ext === ".sh") return { command: "sh", args: [target] }
	if (OPENED_EXTENSIONS.has(ext)) return { command: systemOpener(host), args: [target] }
	return { command: target, args: [] }
}

function isDirectory(path: string): boolean {
	try {
		return statSync(path).isDirectory()
	} catch {
		return false
	}
}

function noTarget(path: string, reason: string): TargetResult {
	return { ok: false, error: { kind: "NoLaunchTarget", path, reason } }
}

/**
 * Pick the executable of a game folder: a name containing "game" first,
 * then "launch", then the first one in name order.
 */
export function pickFolderExecutable(dir: string): string | null {
	let names: string[]
	try {
		names = readdirSync(dir, { withFileTypes: true })
			.filter(entry => (entry.isFile() || entry.isSymbolicLink()) && isExecutableFile(entry.name))
			.map(entry => entry.name)
			.sort()
	} catch {
		return null
	}

	const lower = (name: string) => name.toLowerCase()
	const chosen =
		names.find(name => lower(name).includes("game")) ??
		names.find(name => lower(name).includes("launch")) ??
		names[0]
	return chosen === undefined ? null : join(dir, chosen)
}

/**
 * Locate the concrete file or container to launch for an entry.
 */
export function findLaunchTarget(entry: CatalogEntry): TargetResult {
	if (!existsSync(entry.path)) {
		return noTarget(entry.path, "the stored path no longer exists")
	}

	const isDir = isDirectory(entry.path)

	if (isDirectPlatform(entry.platform)) {
		if (!isDir) return { ok: true, target: entry.path }
		const executable = pickFolderExecutable(entry.path)
		return executable
			? { ok: true, target: executable }
			: noTarget(entry.path, "no executable found in the game folder")
	}

	const nested = nestedPackageFor(entry.platform)
	if (!nested) return { ok: true, target: entry.path }

	if (!isDir) {
		const ext = extname(entry.path).toLowerCase()
		if (nested.installOnly.some(only => only.toLowerCase() === ext)) {
			return { ok: false, error: { kind: "InstallRequired", path: entry.path } }
		}
		return { ok: true, target: entry.path }
	}

	const deep = join(entry.path, ...nested.executable)
	if (existsSync(deep)) return { ok: true, target: deep }
	// The emulator can descend from the container itself
	if (isDirectory(join(entry.path, nested.marker))) {
		return { ok: true, target: entry.path }
	}
	return noTarget(entry.path, `no ${nested.marker} folder inside the package`)
}

/**
 * Resolve an entry (and, for emulated platforms, a profile) into a plan.
 */
export function resolveLaunch(
	entry: CatalogEntry,
	profile?: EmulatorProfile,
	options: ResolveOptions = {},
): ResolveResult {
	const direct = isDirectPlatform(entry.platform)
	if (!direct && !profile) {
		return { ok: false, error: { kind: "MissingEmulator", platform: entry.platform } }
	}

	const found = findLaunchTarget(entry)
	if (!found.ok) return found

	if (direct || !profile) {
		const target = normalize(found.target)
		return {
			ok: true,
			plan: { ...directCommand(target, options.host), cwd: dirname(target), target: found.target },
		}
	}

	let argv: string[]
	try {
		argv = buildLaunchCommand(
			profile.executablePath,
			profile.argsTemplate,
			found.target,
			options,
		)
	} catch (err) {
		if (!(err instanceof ShellSyntaxError)) throw err
		return {
			ok: false,
			error: {
				kind: "InvalidArguments",
				emulator: profile.name,
				message: err.message,
			},
		}
	}

	const [command, ...args] = argv
	if (command === undefined) {
		throw new Error("Launch command is empty")
	}
	return { ok: true, plan: { command, args, target: found.target } }
}
