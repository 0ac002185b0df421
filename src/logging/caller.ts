/**
 * Source location of a log call, read from the V8 stack.
 */

/** Written when the requested frame does not exist. */
export const UNKNOWN_CALLER = "unknown";

const FRAME_PREFIX = "    at ";
const LOCATION_PATTERN = /^(.*):(\d+):\d+$/;

/**
 * Shorten a frame location to `<parent-dir>/<file>:<line>`.
 *
 * @example
 * ```typescript
 * shortCaller("/srv/app/src/http/server.ts", 42); // "http/server.ts:42"
 * shortCaller("file:///srv/app/main.ts", 3); // "app/main.ts:3"
 * ```
 */
export function shortCaller(file: string, line: number): string {
	const path = file.replace(/^file:\/\//, "").replace(/\\/g, "/");
	const segments = path.split("/").filter(Boolean);
	return `${segments.slice(-2).join("/")}:${line}`;
}

/**
 * Parse one `    at ...` stack line into a short caller, or undefined for
 * frames without a file location (native code, `eval`).
 */
export function parseFrame(frame: string): string | undefined {
	let location = frame.trim().replace(/^at\s+/, "").replace(/^async\s+/, "");
	const open = location.lastIndexOf(" (");
	if (open !== -1 && location.endsWith(")")) {
		location = location.slice(open + 2, -1);
	}
	const match = LOCATION_PATTERN.exec(location);
	if (!match?.[1] || !match[2]) return undefined;
	return shortCaller(match[1], Number(match[2]));
}

function readFrames(limit: number): string[] {
	const previous = Error.stackTraceLimit;
	Error.stackTraceLimit = limit;
	const stack = new Error().stack ?? "";
	Error.stackTraceLimit = previous;
	return stack.split("\n").filter((line) => line.startsWith(FRAME_PREFIX));
}

// readFrames, the capture function and its caller sit above the first
// reported frame.
const OWN_FRAMES = 3;

/** Most frames written in a stack trace. */
export const MAX_STACK_FRAMES = 32;

/**
 * Report the location `skip` frames above the caller of the function that
 * calls this one. With `skip` 0, that is the line that invoked the function
 * calling `captureCaller`.
 */
export function captureCaller(skip: number): string {
	const depth = Math.max(0, skip) + OWN_FRAMES;
	const frame = readFrames(depth + 1)[depth];
	return (frame && parseFrame(frame)) || UNKNOWN_CALLER;
}

/**
 * The stack from the frame `captureCaller(skip)` reports, one
 * `function (file:line:column)` entry per line.
 */
export function captureStack(skip: number): string {
	const depth = Math.max(0, skip) + OWN_FRAMES;
	return readFrames(depth + MAX_STACK_FRAMES)
		.slice(depth)
		.map((frame) => frame.trim().replace(/^at\s+/, ""))
		.join("\n");
}
