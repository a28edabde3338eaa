import { describe, it, expect } from "vitest"
import { formatBytes, formatPlaytime } from "../../src/format.js"

describe("formatBytes", () => {
	it("formats with two decimals", () => {
		expect(formatBytes(0)).toBe("0 B")
		expect(formatBytes(512)).toBe("512.00 B")
		expect(formatBytes(1536)).toBe("1.50 KB")
		expect(formatBytes(2097152)).toBe("2.00 MB")
	})

	it("stops at terabytes", () => {
		expect(formatBytes(1024 ** 5)).toBe("1024.00 TB")
	})
})

describe("formatPlaytime", () => {
	it("reports never played for zero", () => {
		expect(formatPlaytime(0)).toBe("Never played")
	})

	it("formats H:MM:SS", () => {
		expect(formatPlaytime(3725)).toBe("1:02:05")
		expect(formatPlaytime(59.6)).toBe("0:00:59")
		expect(formatPlaytime(36000)).toBe("10:00:00")
	})
})
