import { describe, it, expect } from "vitest"
import { cleanTitle } from "../../src/title.js"

describe("cleanTitle", () => {
	it("strips the extension of files", () => {
		expect(cleanTitle("Mario.sfc")).toBe("Mario")
	})

	it("removes bracketed and parenthesized groups", () => {
		expect(cleanTitle("Super_Mario_World (USA) [!].sfc")).toBe("Super Mario World")
	})

	it("turns dots and underscores into spaces", () => {
		expect(cleanTitle("Final.Fantasy.VII.cue")).toBe("Final Fantasy VII")
	})

	it("drops the .xiso marker", () => {
		expect(cleanTitle("Halo.xiso.iso")).toBe("Halo")
	})

	it("keeps directory names whole", () => {
		expect(cleanTitle("Demon's Souls [BLUS30443]", { isFile: false })).toBe("Demon's Souls")
		expect(cleanTitle("Game.v1.2", { isFile: false })).toBe("Game v1 2")
	})

	it("falls back to the stem when nothing is left", () => {
		expect(cleanTitle("(Beta).gba")).toBe("(Beta)")
	})
})
