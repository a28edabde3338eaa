/**
 * Emulator registry over LibraryConfig.emulators
 *
 * Mutates the config in place; persisting it is the caller's job.
 */

import { log } from "../logger.js"
import type { EmulatorProfile, LibraryConfig, Platform } from "../types.js"

export class EmulatorRegistryError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "EmulatorRegistryError"
	}
}

export class EmulatorRegistry {
	private readonly config: LibraryConfig

	constructor(config: LibraryConfig) {
		this.config = config
	}

	get(name: string): EmulatorProfile | undefined {
		return this.config.emulators.get(name)
	}

	has(name: string): boolean {
		return this.config.emulators.has(name)
	}

	/** Profiles in name order */
	list(): EmulatorProfile[] {
		return [...this.config.emulators.values()].sort((a, b) =>
			a.name.localeCompare(b.name),
		)
	}

	/** Profiles that declare `platform` among their systems (case-insensitive) */
	forPlatform(platform: Platform): EmulatorProfile[] {
		const wanted = platform.toLowerCase()
		return this.list().filter(profile =>
			profile.systems.some(system => system.toLowerCase() === wanted),
		)
	}

	add(profile: EmulatorProfile): void {
		const name = profile.name.trim()
		if (!name) throw new EmulatorRegistryError("Emulator name cannot be empty")
		if (this.config.emulators.has(name)) {
			throw new EmulatorRegistryError(`An emulator named "${name}" already exists`)
		}
		this.config.emulators.set(name, { ...profile, name })
		log.emulators.info({ name, systems: profile.systems }, "emulator added")
	}

	/**
	 * Replace the profile stored as `name`. A rename moves every platform
	 * default and per-entry override along with it.
	 */
	update(name: string, profile: EmulatorProfile): void {
		if (!this.config.emulators.has(name)) {
			throw new EmulatorRegistryError(`No emulator named "${name}"`)
		}
		const next = profile.name.trim()
		if (!next) throw new EmulatorRegistryError("Emulator name cannot be empty")
		if (next !== name && this.config.emulators.has(next)) {
			throw new EmulatorRegistryError(`An emulator named "${next}" already exists`)
		}

		this.config.emulators.delete(name)
		this.config.emulators.set(next, { ...profile, name: next })

		if (next !== name) {
			this.replaceReferences(name, next)
			log.emulators.info({ from: name, to: next }, "emulator renamed")
		}
	}

	/** Remove a profile and every default or override that names it */
	remove(name: string): void {
		if (!this.config.emulators.delete(name)) {
			throw new EmulatorRegistryError(`No emulator named "${name}"`)
		}
		this.replaceReferences(name, undefined)
		log.emulators.info({ name }, "emulator removed")
	}

	private replaceReferences(from: string, to: string | undefined): void {
		for (const [platform, emulator] of this.config.platformDefaults) {
			if (emulator !== from) continue
			if (to === undefined) this.config.platformDefaults.delete(platform)
			else this.config.platformDefaults.set(platform, to)
		}

		for (const [key, metadata] of this.config.metadata) {
			if (metadata.customEmulator !== from) continue
			if (to !== undefined) {
				metadata.customEmulator = to
				continue
			}
			const { customEmulator: _removed, ...rest } = metadata
			this.config.metadata.set(key, rest)
		}
	}
}
