/**
 * Interactive prompts using the prompts library
 */

import prompts from "prompts"
import type { EmulatorProfile, Platform } from "./types.js"

/**
 * Ask which of several emulators should run a game.
 * Returns null when the prompt is cancelled.
 */
export async function promptEmulatorChoice(
	platform: Platform,
	candidates: EmulatorProfile[],
): Promise<EmulatorProfile | null> {
	const response = await prompts({
		type: "select",
		name: "emulator",
		message: `Several emulators can run ${platform}. Which one?`,
		choices: candidates.map(profile => ({
			title: profile.name,
			description: profile.executablePath,
			value: profile.name,
		})),
		initial: 0,
	})

	const chosen: unknown = response.emulator
	return candidates.find(profile => profile.name === chosen) ?? null
}

/**
 * Offer to remember the chosen emulator as the platform default
 */
export async function promptSetDefault(
	platform: Platform,
	emulatorName: string,
): Promise<boolean> {
	const response = await prompts({
		type: "confirm",
		name: "confirm",
		message: `Always use ${emulatorName} for ${platform}?`,
		initial: true,
	})
	return response.confirm === true
}

/**
 * Confirm removal of an emulator that defaults or overrides still name
 */
export async function promptConfirmRemoveEmulator(
	emulatorName: string,
	references: number,
): Promise<boolean> {
	const response = await prompts({
		type: "confirm",
		name: "confirm",
		message: `${emulatorName} is used by ${references} default(s) or game(s). Remove it anyway?`,
		initial: false,
	})
	return response.confirm === true
}

/**
 * Handle Ctrl+C gracefully
 */
export function setupPromptHandlers(): void {
	prompts.override({})

	process.on("SIGINT", () => {
		console.log("\n\nAborted.")
		process.exit(0)
	})
}
