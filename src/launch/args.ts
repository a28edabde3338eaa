/**
 * Emulator argument templates
 *
 * A template such as `-f %ROM%` is split into words the way a POSIX shell
 * would (quotes group, backslashes escape) and the ROM path is dropped into
 * the placeholder's position as a single argument. Nothing is ever handed
 * to a real shell.
 */

import { normalize } from "node:path"

export const ROM_PLACEHOLDER = "%ROM%"

export interface SplitOptions {
	/**
	 * Treat backslash as an escape character. Off for Windows-style
	 * templates, where it is a path separator.
	 */
	escapes?: boolean
}

export class ShellSyntaxError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "ShellSyntaxError"
	}
}

const DOUBLE_QUOTE_ESCAPABLE = new Set(["\\", '"', "$", "`", "\n"])

/**
 * Split a string into words using shell quoting rules.
 *
 * @example
 * splitShellWords(`-f "my file.iso" --flag='a b'`) // ["-f", "my file.iso", "--flag=a b"]
 */
export function splitShellWords(
	input: string,
	options: SplitOptions = {},
): string[] {
	const escapes = options.escapes ?? true
	const words: string[] = []
	let word = ""
	// A quoted empty string ("") still produces a word
	let inWord = false
	let quote: "'" | '"' | null = null

	for (let i = 0; i < input.length; i++) {
		const ch = input.charAt(i)

		if (quote === "'") {
			if (ch === "'") quote = null
			else word += ch
			continue
		}

		if (quote === '"') {
			if (ch === '"') {
				quote = null
			} else if (escapes && ch === "\\" && DOUBLE_QUOTE_ESCAPABLE.has(input.charAt(i + 1))) {
				word += input.charAt(i + 1)
				i++
			} else {
				word += ch
			}
			continue
		}

		if (/\s/.test(ch)) {
			if (inWord) {
				words.push(word)
				word = ""
				inWord = false
			}
			continue
		}

		inWord = true
		if (ch === "'" || ch === '"') {
			quote = ch
		} else if (escapes && ch === "\\") {
			if (i + 1 >= input.length) {
				throw new ShellSyntaxError("No escaped character")
			}
			word += input.charAt(i + 1)
			i++
		} else {
			word += ch
		}
	}

	if (quote !== null) {
		throw new ShellSyntaxError("No closing quotation")
	}
	if (inWord) words.push(word)
	return words
}

/**
 * Build the argv for starting an emulator on `targetPath`.
 *
 * - template with %ROM%: words of the template, placeholder replaced by the path
 * - template without %ROM%: words of the template, then the path
 * - empty template: just the path
 */
export function buildLaunchCommand(
	executablePath: string,
	argsTemplate: string,
	targetPath: string,
	options: SplitOptions = {},
): string[] {
	const executable = normalize(executablePath)
	const target = normalize(targetPath)
	const template = argsTemplate.trim()

	if (!template) return [executable, target]

	const words = splitShellWords(template, options)
	if (template.includes(ROM_PLACEHOLDER)) {
		return [executable, ...words.map(word => word.replaceAll(ROM_PLACEHOLDER, target))]
	}
	return [executable, ...words, target]
}
