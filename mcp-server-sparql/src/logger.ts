/**
 * Leveled logger that writes to stderr (stdout is reserved for MCP protocol).
 */

export type LogLevel = "debug" | "info" | "warn" | "error"

export type LogFn = (message: string, meta?: Record<string, unknown>) => void

export interface Logger {
	debug: LogFn
	info: LogFn
	warn: LogFn
	error: LogFn
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function createLogger(level: LogLevel = "info", sink: (line: string) => void = (line) => console.error(line)): Logger {
	const threshold = LEVEL_ORDER[level]

	const emit = (lvl: LogLevel): LogFn => (message, meta) => {
		if (LEVEL_ORDER[lvl] < threshold) return
		const tag = `[${lvl.toUpperCase()}]`
		sink(meta && Object.keys(meta).length > 0 ? `${tag} ${message} ${JSON.stringify(meta)}` : `${tag} ${message}`)
	}

	return {
		debug: emit("debug"),
		info: emit("info"),
		warn: emit("warn"),
		error: emit("error"),
	}
}

/** Logger that drops everything (tests). */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}
