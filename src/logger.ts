/**
 * pino loggers for romdeck
 *
 * Structured logs only: anything meant for the person at the terminal goes
 * through ui.ts. Levels in use:
 * - error: playtime could not be recorded
 * - warn: unreadable root, rejected cache, launch not resolved
 * - info: scan finished, process started, session ended
 * - debug: per-item decisions (--verbose)
 */

import { mkdirSync } from "node:fs"
import { dirname, join } from "node:path"
import pino from "pino"

const level =
	process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Pretty output on an interactive terminal, JSON lines anywhere else
const pretty = process.stdout.isTTY && !process.env["CI"]

const bare = { pid: undefined, hostname: undefined }

export interface LogFileOptions {
	/** Exact file to write; wins over `dir` */
	logFilePath?: string
	/** Folder for a per-run file, e.g. <home>/logs */
	dir: string
}

let logFilePath: string | null = null

function consoleLogger() {
	if (!pretty) return pino({ level, base: bare })
	return pino({
		level,
		transport: {
			target: "pino-pretty",
			options: {
				colorize: true,
				translateTime: "HH:MM:ss",
				ignore: "pid,hostname",
				messageFormat: "{module}: {msg}",
			},
		},
	})
}

function runLogName(): string {
	const stamp = new Date().toISOString().replace(/[:.]/g, "-")
	return `romdeck-${stamp}-${process.pid}.log`
}

/** Root logger; module code goes through `log.<module>` */
export let logger = consoleLogger()

/**
 * Send every following log line to a file so the scan progress bar has
 * the terminal to itself. Returns the file in use.
 */
export function logToFile(options: LogFileOptions): string {
	const path = options.logFilePath ?? logFilePath ?? join(options.dir, runLogName())
	if (path === logFilePath) return path

	mkdirSync(dirname(path), { recursive: true })
	// Synchronous writes: the CLI may exit right after spawning a game
	const destination = pino.destination({ dest: path, sync: true })
	logger = pino({ level: process.env["LOG_LEVEL_FILE"] ?? "debug", base: bare }, destination)
	logFilePath = path
	return path
}

export function createLogger(module: string) {
	return logger.child({ module })
}

/** Flush pending writes before the process exits */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Getters, so a switch to the log file reaches every module
export const log = {
	get scan() {
		return createLogger("scan")
	},
	get catalog() {
		return createLogger("catalog")
	},
	get launch() {
		return createLogger("launch")
	},
	get playtime() {
		return createLogger("playtime")
	},
	get config() {
		return createLogger("config")
	},
	get emulators() {
		return createLogger("emulators")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
