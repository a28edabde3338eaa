/**
 * Spinner handling shared by every piece of terminal output
 */

import ora, { type Ora } from "ora"
import { log } from "./logger.js"

// Global spinner reference for spinner-safe logging
let activeSpinner: Ora | null = null
let spinnerText = ""

// Serializes log operations so concurrent writers don't interleave
let logLock = Promise.resolve()

/**
 * Log a message while a spinner may be active.
 * Stops the spinner, prints the message, then restarts it.
 */
export function spinnerSafeLog(message: string): void {
	log.cli.debug(message)

	if (activeSpinner) {
		logLock = logLock.then(
			() =>
				new Promise<void>(resolve => {
					if (activeSpinner) {
						activeSpinner.stop()
						console.log(message)
						activeSpinner.start(spinnerText)
					} else {
						console.log(message)
					}
					// Let the terminal render before the next write
					setImmediate(resolve)
				}),
		)
	} else {
		console.log(message)
	}
}

/**
 * Start a spinner that spinnerSafeLog() knows about.
 * Returns null in quiet mode.
 */
export function createSpinner(text: string, quiet: boolean): Ora | null {
	if (quiet) return null
	spinnerText = text
	activeSpinner = ora(text).start()
	return activeSpinner
}

/** Stop the active spinner once pending log writes are out */
export async function stopSpinner(
	outcome: { ok: boolean; text: string } | null = null,
): Promise<void> {
	await logLock
	const spinner = activeSpinner
	activeSpinner = null
	if (!spinner) return
	if (!outcome) spinner.stop()
	else if (outcome.ok) spinner.succeed(outcome.text)
	else spinner.fail(outcome.text)
}
