/**
 * Leveled logger threaded through constructors and contexts.
 *
 * Writes tagged lines to stderr so stdout stays free for callers that
 * embed the core in a protocol process.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent"

export interface Logger {
	debug(message: string, meta?: Record<string, unknown>): void
	info(message: string, meta?: Record<string, unknown>): void
	warn(message: string, meta?: Record<string, unknown>): void
	error(message: string, meta?: Record<string, unknown>): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

export function parseLogLevel(value: string | undefined): LogLevel {
	switch ((value ?? "").toLowerCase()) {
		case "debug":
			return "debug"
		case "warn":
		case "warning":
			return "warn"
		case "error":
			return "error"
		case "silent":
		case "off":
			return "silent"
		default:
			return "info"
	}
}

export function createLogger(level: LogLevel = "info", scope?: string): Logger {
	const threshold = LEVEL_ORDER[level]
	const prefix = scope ? ` [${scope}]` : ""

	const write = (lvl: Exclude<LogLevel, "silent">, message: string, meta?: Record<string, unknown>) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		const tag = `[${lvl.toUpperCase()}]${prefix}`
		if (meta && Object.keys(meta).length > 0) {
			console.error(tag, message, JSON.stringify(meta))
		} else {
			console.error(tag, message)
		}
	}

	return {
		debug: (message, meta) => write("debug", message, meta),
		info: (message, meta) => write("info", message, meta),
		warn: (message, meta) => write("warn", message, meta),
		error: (message, meta) => write("error", message, meta),
	}
}

/** Logger that drops everything (tests, embedding callers with their own logging). */
export const silentLogger: Logger = createLogger("silent")
