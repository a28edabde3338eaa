/**
 * Process boundary: starting a launch plan and probing liveness
 */

import { spawn } from "node:child_process"
import { log } from "../logger.js"
import type { LaunchPlan, LaunchResult, ProcessHandle } from "../types.js"

// ─────────────────────────────────────────────────────────────────────────────
// Spawning
// ─────────────────────────────────────────────────────────────────────────────

export interface Spawner {
	/** Start the plan; rejects when the OS refuses to start it */
	spawn(plan: LaunchPlan): Promise<ProcessHandle>
}

/**
 * Starts the plan as a detached child with an argv array (no shell), so
 * the game outlives the launcher. Resolves once the OS reports the spawn.
 */
export const nodeSpawner: Spawner = {
	spawn(plan: LaunchPlan): Promise<ProcessHandle> {
		return new Promise((resolve, reject) => {
			const child = spawn(plan.command, plan.args, {
				cwd: plan.cwd,
				detached: true,
				stdio: "ignore",
				shell: false,
			})

			child.once("error", reject)
			child.once("spawn", () => {
				if (child.pid === undefined) {
					reject(new Error(`No process id for ${plan.command}`))
					return
				}
				child.unref()
				resolve({ pid: child.pid, startedAt: Date.now() })
			})
		})
	},
}

/**
 * Run a resolved plan. Spawn failures come back as ProcessStartFailed with
 * the OS message passed through.
 */
export async function launchEntry(
	plan: LaunchPlan,
	spawner: Spawner = nodeSpawner,
): Promise<LaunchResult> {
	try {
		const handle = await spawner.spawn(plan)
		log.launch.info(
			{ command: plan.command, args: plan.args, pid: handle.pid },
			"process started",
		)
		return { ok: true, plan, handle }
	} catch (err) {
		const message = err instanceof Error ? err.message : String(err)
		log.launch.warn({ command: plan.command, error: message }, "process failed to start")
		return {
			ok: false,
			error: { kind: "ProcessStartFailed", command: plan.command, message },
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Liveness
// ─────────────────────────────────────────────────────────────────────────────

export interface ProcessWatcher {
	isAlive(handle: ProcessHandle): boolean
}

function errorCode(err: unknown): string | undefined {
	if (err instanceof Error && "code" in err && typeof err.code === "string") {
		return err.code
	}
	return undefined
}

/** Probes a pid with signal 0; EPERM means it exists under another user. */
export const pidWatcher: ProcessWatcher = {
	isAlive(handle: ProcessHandle): boolean {
		if (handle.pid <= 0) return false
		try {
			process.kill(handle.pid, 0)
			return true
		} catch (err) {
			return errorCode(err) === "EPERM"
		}
	},
}

/**
 * The host's liveness probe, or null when it has none. Callers skip
 * playtime tracking entirely on null.
 */
export function createProcessWatcher(): ProcessWatcher | null {
	return typeof process.kill === "function" ? pidWatcher : null
}
