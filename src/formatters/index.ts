/**
 * Formatting helpers shared by the log formatters.
 *
 * @module formatters
 */

export {
	formatIsoTimestamp,
	formatLogTimestamp,
	millisecondsToSeconds,
} from "./time.ts";
