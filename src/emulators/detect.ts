/**
 * Emulator auto-detection from executable names
 */

import { readFileSync, type Dirent } from "node:fs"
import { readdir } from "node:fs/promises"
import { basename, join } from "node:path"
import { z } from "zod"
import { log } from "../logger.js"
import { isExecutableFile } from "../platforms.js"
import type { EmulatorProfile, Platform } from "../types.js"

const SignatureSchema = z.object({
	name: z.string().min(1),
	/** Lower-case substrings of the executable's file name */
	executables: z.array(z.string().min(1)).min(1),
	systems: z.array(z.string()),
})

const SignatureTableSchema = z.object({
	emulators: z.array(SignatureSchema),
})

export type EmulatorSignature = z.infer<typeof SignatureSchema>

export const AUTO_PREFIX = "[Auto] "

function loadSignatures(): EmulatorSignature[] {
	const url = new URL("../../data/emulators.json", import.meta.url)
	const raw: unknown = JSON.parse(readFileSync(url, "utf8"))
	return SignatureTableSchema.parse(raw).emulators
}

/** Ordered; the first signature that matches wins */
export const EMULATOR_SIGNATURES: readonly EmulatorSignature[] = loadSignatures()

/** Signature for an executable path, matched on its lower-cased file name */
export function matchSignature(executablePath: string): EmulatorSignature | undefined {
	const name = basename(executablePath).toLowerCase()
	return EMULATOR_SIGNATURES.find(signature =>
		signature.executables.some(fragment => name.includes(fragment)),
	)
}

/**
 * Build a profile for a known emulator executable, or null if the name
 * matches nothing in the table.
 */
export function detectEmulator(executablePath: string): EmulatorProfile | null {
	const signature = matchSignature(executablePath)
	if (!signature) return null
	return {
		name: `${AUTO_PREFIX}${signature.name}`,
		executablePath,
		systems: [...signature.systems],
		argsTemplate: "",
	}
}

/** Known emulators that handle `platform` */
export function signaturesFor(platform: Platform): EmulatorSignature[] {
	const wanted = platform.toLowerCase()
	return EMULATOR_SIGNATURES.filter(signature =>
		signature.systems.some(system => system.toLowerCase() === wanted),
	)
}

function isCandidate(name: string): boolean {
	// Linux and macOS builds often ship without an extension
	return isExecutableFile(name) || !name.includes(".")
}

/**
 * Walk a folder and return one profile per detected emulator, in the order
 * the files were found. Unreadable subfolders are skipped.
 */
export async function detectEmulatorsIn(dir: string): Promise<EmulatorProfile[]> {
	const found = new Map<string, EmulatorProfile>()
	const pending = [dir]

	while (pending.length > 0) {
		const current = pending.shift()
		if (current === undefined) break

		let entries: Dirent[]
		try {
			entries = await readdir(current, { withFileTypes: true })
		} catch (err) {
			if (current === dir) throw err
			log.emulators.debug(
				{ path: current, error: err instanceof Error ? err.message : String(err) },
				"folder unreadable, skipped",
			)
			continue
		}

		entries.sort((a, b) => a.name.localeCompare(b.name))
		for (const entry of entries) {
			if (entry.name.startsWith(".")) continue
			const path = join(current, entry.name)
			if (entry.isDirectory()) {
				pending.push(path)
				continue
			}
			if (!entry.isFile() || !isCandidate(entry.name)) continue

			const profile = detectEmulator(path)
			if (profile && !found.has(profile.name)) {
				log.emulators.debug({ path, name: profile.name }, "emulator detected")
				found.set(profile.name, profile)
			}
		}
	}

	return [...found.values()]
}
