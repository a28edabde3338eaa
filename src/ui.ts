/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: when an ora spinner is active, all output goes through
 * spinnerSafeLog() to avoid conflicts (flickering, line overwrites).
 */

import chalk from "chalk"
import { isMissing } from "./catalog/catalog.js"
import { formatBytes, formatPlaytime } from "./format.js"
import { spinnerSafeLog } from "./spinner.js"
import type { CatalogEntry, EmulatorProfile } from "./types.js"

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		spinnerSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Success message with checkmark */
	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	/** Warning message */
	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	/** Info message */
	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			spinnerSafeLog(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(version: string, home: string, roots: number): void {
		console.log(chalk.bold("romdeck") + ` v${version}`)
		console.log(`Home: ${chalk.cyan(home)}`)
		console.log(`Library roots: ${chalk.cyan(String(roots))}`)
		console.log()
	},

	/** One catalog entry per line: key prefix, title, platform, size, playtime */
	entryLine(entry: CatalogEntry, favorite: boolean): void {
		const star = favorite ? chalk.yellow("★") : " "
		const played = entry.metadata.playtime
			? chalk.gray(` ${formatPlaytime(entry.metadata.playtime)}`)
			: ""
		const missing = isMissing(entry) ? chalk.red(" [MISSING]") : ""
		console.log(
			`${star} ${chalk.dim(entry.key.slice(0, 8))}  ${entry.title}${missing}  ${chalk.cyan(entry.platform)}  ${chalk.gray(formatBytes(entry.size))}${played}`,
		)
	},

	/** Key/value details of a single entry */
	entryDetails(entry: CatalogEntry, favorite: boolean): void {
		const rows: Array<[string, string]> = [
			["Title", entry.title],
			["Key", entry.key],
			["Platform", entry.platform],
			["Path", isMissing(entry) ? `${entry.path} ${chalk.red("[MISSING]")}` : entry.path],
			["Size", formatBytes(entry.size)],
			["Time played", formatPlaytime(entry.metadata.playtime ?? 0)],
			["Favorite", favorite ? "yes" : "no"],
		]
		if (entry.metadata.customEmulator) rows.push(["Emulator", entry.metadata.customEmulator])
		if (entry.metadata.tags?.length) rows.push(["Tags", entry.metadata.tags.join(", ")])
		if (entry.metadata.notes) rows.push(["Notes", entry.metadata.notes])

		for (const [label, value] of rows) {
			console.log(`${chalk.bold(label.padEnd(12))} ${value}`)
		}
	},

	emulatorLine(profile: EmulatorProfile, defaults: string[]): void {
		const marks = defaults.length ? chalk.green(` default for ${defaults.join(", ")}`) : ""
		const args = profile.argsTemplate ? chalk.gray(` ${profile.argsTemplate}`) : ""
		console.log(`${chalk.bold(profile.name)}${marks}`)
		console.log(`  ${profile.executablePath}${args}`)
		console.log(`  ${chalk.cyan(profile.systems.join(", ") || "(no systems)")}`)
	},

	/** Format a list of results for summary */
	summarySection(title: string, items: string[], color: "green" | "red"): void {
		if (items.length === 0) return
		const colorFn = color === "green" ? chalk.green : chalk.red
		const symbol = color === "green" ? "✓" : "✗"
		console.log(colorFn(`${title} (${items.length}):`))
		for (const item of items) {
			console.log(`  ${symbol} ${item}`)
		}
	},
}
