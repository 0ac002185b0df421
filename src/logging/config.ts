/**
 * Logger configuration: option types, defaults, and the rules that turn
 * caller-supplied options into a resolved configuration.
 */

import type { LogLevel as EngineLevel } from "@logtape/logtape";

/** Levels a caller can configure as the lowest level written. */
export type LevelName = "DEBUG" | "INFO" | "WARN" | "ERROR";

/** Record encodings. */
export type Encoding = "json" | "console";

/** Levels a record can be written at. */
export type RecordLevel = "debug" | "info" | "warn" | "error" | "panic" | "fatal";

/** File written when file output is requested without a path. */
export const DEFAULT_LOG_FILE = "out.log";

/** Lowest level used when the configured one is not recognised. */
export const DEFAULT_LEVEL: LevelName = "DEBUG";

/** LogTape category every facade record is written under. */
export const LOGGER_CATEGORY = "fieldlog";

/**
 * Options accepted by `initialize`.
 *
 * @example
 * ```typescript
 * // console, human-readable
 * { level: "debug" }
 * // console, JSON
 * { level: "debug", encoding: "json" }
 * // JSON file
 * { saveToFile: true, filePath: "logs/app.log", level: "info" }
 * ```
 */
export interface LoggerOptions {
	/** Write to a file instead of standard output. */
	saveToFile?: boolean;
	/** Log file path. Only read when `saveToFile` is set; empty means `out.log`. */
	filePath?: string;
	/** DEBUG, INFO, WARN or ERROR, in any case. Anything else means DEBUG. */
	level?: string;
	/** "json" for JSON lines on the console. Ignored for file output. */
	encoding?: string;
}

export interface ResolvedLoggerConfig {
	saveToFile: boolean;
	/** Set only in file mode. */
	filePath: string | undefined;
	level: LevelName;
	encoding: Encoding;
	/** Sink target: "stdout" or the log file path. */
	output: string;
	/** "custom" is `YYYY-MM-DD HH:MM:SS.mmm`, "iso8601" is ISO-8601. */
	timestamp: "custom" | "iso8601";
}

const LEVEL_NAMES: readonly LevelName[] = ["DEBUG", "INFO", "WARN", "ERROR"];

function isLevelName(value: string): value is LevelName {
	return LEVEL_NAMES.some((name) => name === value);
}

/**
 * Match a level string case-insensitively. Unknown input is DEBUG, never an
 * error.
 */
export function resolveLevel(level: string | undefined): LevelName {
	const upper = (level ?? "").toUpperCase();
	return isLevelName(upper) ? upper : DEFAULT_LEVEL;
}

/**
 * File output is always JSON. Console output is JSON only when asked for
 * with exactly "json".
 */
export function resolveEncoding(
	saveToFile: boolean,
	encoding: string | undefined,
): Encoding {
	if (saveToFile) return "json";
	return encoding === "json" ? "json" : "console";
}

export function resolveLoggerConfig(
	options: LoggerOptions = {},
): ResolvedLoggerConfig {
	const saveToFile = options.saveToFile ?? false;
	const filePath = saveToFile ? options.filePath || DEFAULT_LOG_FILE : undefined;

	return {
		saveToFile,
		filePath,
		level: resolveLevel(options.level),
		encoding: resolveEncoding(saveToFile, options.encoding),
		output: filePath ?? "stdout",
		timestamp: saveToFile ? "iso8601" : "custom",
	};
}

const LOWEST_ENGINE_LEVEL: Record<LevelName, EngineLevel> = {
	DEBUG: "debug",
	INFO: "info",
	WARN: "warning",
	ERROR: "error",
};

/** Lowest LogTape level that passes for a configured level. */
export function toEngineLevel(level: LevelName): EngineLevel {
	return LOWEST_ENGINE_LEVEL[level];
}

const ENGINE_LEVEL_NAMES: Record<EngineLevel, RecordLevel> = {
	trace: "debug",
	debug: "debug",
	info: "info",
	warning: "warn",
	error: "error",
	fatal: "fatal",
};

/** Level name as written in a record. */
export function recordLevelName(level: EngineLevel): RecordLevel {
	return ENGINE_LEVEL_NAMES[level];
}
