/**
 * Timestamp formatting for log records.
 *
 * @module formatters/time
 * @example
 * ```ts
 * import { formatLogTimestamp, formatIsoTimestamp } from "fieldlog/formatters";
 *
 * formatLogTimestamp(new Date(2024, 11, 10, 14, 30, 5, 7)); // "2024-12-10 14:30:05.007"
 * formatIsoTimestamp(Date.UTC(2024, 11, 10, 14, 30, 5, 7)); // "2024-12-10T14:30:05.007Z"
 * ```
 */

function pad(value: number, width = 2): string {
	return value.toString().padStart(width, "0");
}

/**
 * Format a timestamp as local `YYYY-MM-DD HH:MM:SS.mmm`.
 *
 * This is the console sink's timestamp, whichever encoding it uses.
 */
export function formatLogTimestamp(date: Date | number): string {
	const d = typeof date === "number" ? new Date(date) : date;
	const day = `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
	const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
	return `${day} ${time}.${pad(d.getMilliseconds(), 3)}`;
}

/**
 * Format a timestamp as ISO-8601 in UTC, as written by the file sink.
 */
export function formatIsoTimestamp(date: Date | number): string {
	const d = typeof date === "number" ? new Date(date) : date;
	return d.toISOString();
}

/**
 * Convert a millisecond duration to fractional seconds.
 *
 * @example
 * ```ts
 * millisecondsToSeconds(1500); // 1.5
 * ```
 */
export function millisecondsToSeconds(ms: number): number {
	return ms / 1000;
}
