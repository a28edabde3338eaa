import { describe, it, expect, vi, beforeEach, afterEach } from "vitest"
import { PlaytimeTracker, createPlaytimeTracker } from "../src/launch/playtime.js"
import { fakeWatcher } from "./helpers/index.js"

describe("PlaytimeTracker", () => {
	let now = 0

	beforeEach(() => {
		vi.useFakeTimers()
		now = 0
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	it("reports elapsed whole seconds once the process exits", async () => {
		const watcher = fakeWatcher()
		const onExit = vi.fn()
		const tracker = new PlaytimeTracker(watcher, onExit, { now: () => now })

		const done = tracker.track({ pid: 10, startedAt: 0 }, "key-a")
		expect(tracker.activeCount).toBe(1)

		now = 5000
		await vi.advanceTimersByTimeAsync(5000)
		expect(onExit).not.toHaveBeenCalled()

		now = 12400
		watcher.exit(10)
		await vi.advanceTimersByTimeAsync(5000)

		await expect(done).resolves.toBe(12)
		expect(onExit).toHaveBeenCalledTimes(1)
		expect(onExit).toHaveBeenCalledWith("key-a", 12)
		expect(tracker.activeCount).toBe(0)

		await vi.advanceTimersByTimeAsync(20000)
		expect(onExit).toHaveBeenCalledTimes(1)
	})

	it("tracks launches independently", async () => {
		const watcher = fakeWatcher()
		const onExit = vi.fn()
		const tracker = new PlaytimeTracker(watcher, onExit, { intervalMs: 1000, now: () => now })

		const first = tracker.track({ pid: 1, startedAt: 0 }, "first")
		const second = tracker.track({ pid: 2, startedAt: 1000 }, "second")
		expect(tracker.activeCount).toBe(2)

		now = 3000
		watcher.exit(1)
		await vi.advanceTimersByTimeAsync(1000)
		await expect(first).resolves.toBe(3)
		expect(tracker.activeCount).toBe(1)

		now = 7500
		watcher.exit(2)
		await vi.advanceTimersByTimeAsync(1000)
		await expect(second).resolves.toBe(7)

		expect(onExit.mock.calls).toEqual([
			["first", 3],
			["second", 7],
		])
	})

	it("rounds to the nearest second", async () => {
		const watcher = fakeWatcher()
		const onExit = vi.fn()
		const tracker = new PlaytimeTracker(watcher, onExit, { intervalMs: 100, now: () => now })

		const done = tracker.track({ pid: 3, startedAt: 0 }, "k")
		now = 2500
		watcher.exit(3)
		await vi.advanceTimersByTimeAsync(100)
		await expect(done).resolves.toBe(3)
	})

	it("still settles when the exit callback fails", async () => {
		const watcher = fakeWatcher()
		const onExit = vi.fn(() => {
			throw new Error("disk full")
		})
		const tracker = new PlaytimeTracker(watcher, onExit, { intervalMs: 100, now: () => now })

		const done = tracker.track({ pid: 4, startedAt: 0 }, "k")
		now = 1000
		watcher.exit(4)
		await vi.advanceTimersByTimeAsync(100)
		await expect(done).resolves.toBe(1)
		expect(onExit).toHaveBeenCalledTimes(1)
	})
})

describe("createPlaytimeTracker", () => {
	it("returns null without a watcher", () => {
		expect(createPlaytimeTracker(null, () => {})).toBeNull()
	})

	it("builds a tracker with a watcher", () => {
		expect(createPlaytimeTracker(fakeWatcher(), () => {})).toBeInstanceOf(PlaytimeTracker)
	})
})
