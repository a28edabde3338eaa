/**
 * Human-readable sizes and durations for CLI output
 */

export function formatBytes(bytes: number): string {
	if (bytes <= 0) return "0 B"
	const k = 1024
	const sizes = ["B", "KB", "MB", "GB", "TB"]
	const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1)
	return `${(bytes / Math.pow(k, i)).toFixed(2)} ${sizes[i]}`
}

/** "Never played" for zero, else H:MM:SS */
export function formatPlaytime(seconds: number): string {
	const total = Math.floor(seconds)
	if (total <= 0) return "Never played"
	const h = Math.floor(total / 3600)
	const m = Math.floor((total % 3600) / 60)
	const s = total % 60
	return `${h}:${String(m).padStart(2, "0")}:${String(s).padStart(2, "0")}`
}
