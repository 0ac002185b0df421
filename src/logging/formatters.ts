/**
 * LogTape text formatters for the two record encodings.
 *
 * Both formatters read the reserved `level`, `caller` and `stacktrace`
 * properties that `LoggerHandle` sets on every record. Time fields arrive as
 * `Date`s and are written in the sink's timestamp format.
 */

import type { LogRecord, TextFormatter } from "@logtape/logtape";
import { formatIsoTimestamp, formatLogTimestamp } from "../formatters/time.ts";
import { type Encoding, type RecordLevel, recordLevelName } from "./config.ts";

/** Property key carrying the level a handle wrote the record at. */
export const LEVEL_KEY = "level";

/** Property key carrying the caller location. */
export const CALLER_KEY = "caller";

/** Property key carrying the stack of error and more severe records. */
export const STACKTRACE_KEY = "stacktrace";

/** Keys a field can never overwrite. */
export const RESERVED_KEYS: ReadonlySet<string> = new Set([
	LEVEL_KEY,
	"ts",
	CALLER_KEY,
	"msg",
	STACKTRACE_KEY,
]);

export type TimestampFormatter = (timestamp: number) => string;

export const TIMESTAMP_FORMATTERS = {
	custom: formatLogTimestamp,
	iso8601: formatIsoTimestamp,
} satisfies Record<string, TimestampFormatter>;

function jsonReplacer(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value;
}

/**
 * Render a LogTape message array. Interpolated strings appear as-is; other
 * values as JSON.
 */
export function renderMessage(message: readonly unknown[]): string {
	let text = "";
	for (let i = 0; i < message.length; i++) {
		const part = message[i];
		if (i % 2 === 0 || typeof part === "string") {
			text += String(part);
		} else {
			text += JSON.stringify(part, jsonReplacer) ?? String(part);
		}
	}
	return text;
}

interface RecordParts {
	level: RecordLevel;
	caller: string;
	stacktrace: string | undefined;
	fields: Record<string, unknown>;
}

// Panic records reach LogTape at fatal level; the handle tags them.
function levelOf(record: LogRecord): RecordLevel {
	const level = recordLevelName(record.level);
	return level === "fatal" && record.properties[LEVEL_KEY] === "panic"
		? "panic"
		: level;
}

function splitRecord(
	record: LogRecord,
	timestamp: TimestampFormatter,
): RecordParts {
	const fields: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(record.properties)) {
		if (RESERVED_KEYS.has(key) || value === undefined) continue;
		fields[key] = value instanceof Date ? formatTime(value, timestamp) : value;
	}
	const caller = record.properties[CALLER_KEY];
	const stacktrace = record.properties[STACKTRACE_KEY];
	return {
		level: levelOf(record),
		caller: typeof caller === "string" ? caller : "unknown",
		stacktrace: typeof stacktrace === "string" ? stacktrace : undefined,
		fields,
	};
}

function formatTime(value: Date, timestamp: TimestampFormatter): string {
	const time = value.getTime();
	return Number.isNaN(time) ? "Invalid Date" : timestamp(time);
}

/**
 * JSON lines: `{"level","ts","caller","msg",...fields,"stacktrace"}`.
 *
 * A record whose fields cannot be serialized is written without them and
 * flagged with `serializationError`.
 */
export function getJsonFormatter(
	timestamp: TimestampFormatter = formatIsoTimestamp,
): TextFormatter {
	return (record: LogRecord): string => {
		const { level, caller, stacktrace, fields } = splitRecord(record, timestamp);
		const head = {
			level,
			ts: timestamp(record.timestamp),
			caller,
			msg: renderMessage(record.message),
		};
		const tail = stacktrace === undefined ? {} : { stacktrace };
		try {
			return `${JSON.stringify({ ...head, ...fields, ...tail }, jsonReplacer)}\n`;
		} catch {
			return `${JSON.stringify({ ...head, serializationError: true, ...tail })}\n`;
		}
	};
}

/**
 * Tab-separated console line: `ts  level  caller  msg  {fields}`.
 * The fields column is left out when there are none. A stack trace follows
 * on the next lines.
 */
export function getConsoleFormatter(
	timestamp: TimestampFormatter = formatLogTimestamp,
): TextFormatter {
	return (record: LogRecord): string => {
		const { level, caller, stacktrace, fields } = splitRecord(record, timestamp);
		const columns = [
			timestamp(record.timestamp),
			level,
			caller,
			renderMessage(record.message),
		];
		if (Object.keys(fields).length > 0) {
			let encoded: string;
			try {
				encoded = JSON.stringify(fields, jsonReplacer);
			} catch {
				encoded = '{"serializationError":true}';
			}
			columns.push(encoded);
		}
		const line = columns.join("\t");
		return stacktrace === undefined ? `${line}\n` : `${line}\n${stacktrace}\n`;
	};
}

export function getFormatter(
	encoding: Encoding,
	timestamp: TimestampFormatter,
): TextFormatter {
	return encoding === "json"
		? getJsonFormatter(timestamp)
		: getConsoleFormatter(timestamp);
}
