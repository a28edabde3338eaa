/**
 * Scan progress display using cli-progress
 */

import cliProgress from "cli-progress"
import chalk from "chalk"
import type { ScanEvent } from "./scan/scanner.js"

export interface ScanProgress {
	/** Feed every scan event through here */
	handle(event: ScanEvent): void
	stop(): void
}

const MAX_PATH_LENGTH = 45

/** Keep the end of a long path, where the file name is */
function shortenPath(path: string): string {
	return path.length > MAX_PATH_LENGTH
		? "..." + path.slice(path.length - MAX_PATH_LENGTH + 3)
		: path.padEnd(MAX_PATH_LENGTH)
}

/**
 * Create a progress display for a library scan.
 * Quiet mode prints one plain line per root and a final count instead.
 */
export function createScanProgress(quiet: boolean = false): ScanProgress {
	if (quiet) {
		return {
			handle(event: ScanEvent): void {
				switch (event.type) {
					case "root:start":
						console.log(`Scanning ${event.root}`)
						break
					case "scan:complete":
						console.log(
							`Scanned ${event.processed} items, ${event.catalog.entries.size} games`,
						)
						break
				}
			},
			stop: () => {},
		}
	}

	const bar = new cliProgress.SingleBar(
		{
			clearOnComplete: true,
			hideCursor: true,
			fps: 10,
			format: `${chalk.gray("{path}")} {bar} ${chalk.yellow("{value}/{total}")} {entries} games`,
		},
		cliProgress.Presets.shades_grey,
	)

	let started = false
	let entries = 0

	return {
		handle(event: ScanEvent): void {
			switch (event.type) {
				case "scan:start":
					bar.start(Math.max(event.total, 1), 0, { path: shortenPath(""), entries })
					started = true
					break
				case "progress":
					if (!started) return
					bar.setTotal(Math.max(event.total, 1))
					bar.update(event.processed, { path: shortenPath(event.path), entries })
					break
				case "entry":
					entries++
					break
				case "scan:complete":
					if (started) bar.stop()
					started = false
					break
			}
		},
		stop(): void {
			if (started) bar.stop()
			started = false
		},
	}
}
