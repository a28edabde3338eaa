/**
 * Playtime tracking
 *
 * Polls a started process until it exits, then reports the elapsed wall
 * time once. Each launch gets its own timer; trackers for different games
 * never share state.
 */

import { log } from "../logger.js"
import type { ProcessHandle } from "../types.js"
import type { ProcessWatcher } from "./process.js"

export const DEFAULT_POLL_INTERVAL_MS = 5000

export type PlaytimeCallback = (key: string, seconds: number) => void | Promise<void>

export interface PlaytimeTrackerOptions {
	intervalMs?: number
	/** Clock in epoch milliseconds */
	now?: () => number
}

export class PlaytimeTracker {
	private readonly watcher: ProcessWatcher
	private readonly onExit: PlaytimeCallback
	private readonly intervalMs: number
	private readonly now: () => number
	private readonly active = new Map<number, ReturnType<typeof setInterval>>()

	constructor(
		watcher: ProcessWatcher,
		onExit: PlaytimeCallback,
		options: PlaytimeTrackerOptions = {},
	) {
		this.watcher = watcher
		this.onExit = onExit
		this.intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS
		this.now = options.now ?? Date.now
	}

	/** Sessions still being polled */
	get activeCount(): number {
		return this.active.size
	}

	/**
	 * Poll `handle` until it exits. Resolves with the whole seconds played,
	 * after the exit callback has run.
	 */
	track(handle: ProcessHandle, key: string): Promise<number> {
		log.playtime.debug({ key, pid: handle.pid }, "tracking session")

		return new Promise(resolve => {
			const timer = setInterval(() => {
				if (this.watcher.isAlive(handle)) return

				clearInterval(timer)
				this.active.delete(handle.pid)

				const seconds = Math.max(0, Math.round((this.now() - handle.startedAt) / 1000))
				log.playtime.info({ key, pid: handle.pid, seconds }, "session ended")

				void this.report(key, seconds).then(() => resolve(seconds))
			}, this.intervalMs)

			this.active.set(handle.pid, timer)
		})
	}

	private async report(key: string, seconds: number): Promise<void> {
		try {
			await this.onExit(key, seconds)
		} catch (err) {
			log.playtime.error(
				{ key, seconds, error: err instanceof Error ? err.message : String(err) },
				"failed to record playtime",
			)
		}
	}
}

/**
 * A tracker for this host, or null when liveness cannot be observed and
 * playtime is simply not recorded.
 */
export function createPlaytimeTracker(
	watcher: ProcessWatcher | null,
	onExit: PlaytimeCallback,
	options: PlaytimeTrackerOptions = {},
): PlaytimeTracker | null {
	if (!watcher) {
		log.playtime.debug("no process watcher available, playtime disabled")
		return null
	}
	return new PlaytimeTracker(watcher, onExit, options)
}
