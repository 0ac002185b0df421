/**
 * fieldlog/logging
 *
 * Process-wide structured logging on top of LogTape:
 * - Leveled calls with typed fields (`info("msg", field.int("n", 1))`)
 * - Console (human-readable or JSON) or JSON file output
 * - B3 trace-correlation fields from a request context
 * - Caller locations that survive wrapper functions
 *
 * @example
 * ```typescript
 * import { field, info, initLogger, withContext } from "fieldlog/logging";
 *
 * initLogger({ level: "info", encoding: "json" });
 * info("listening", field.int("port", 8080));
 *
 * withContext(new Map([["X-B3-TraceId", traceId]])).warn("slow upstream");
 * ```
 *
 * @packageDocumentation
 */

export {
	captureCaller,
	captureStack,
	MAX_STACK_FRAMES,
	parseFrame,
	shortCaller,
	UNKNOWN_CALLER,
} from "./caller.ts";
export {
	DEFAULT_LEVEL,
	DEFAULT_LOG_FILE,
	type Encoding,
	type LevelName,
	LOGGER_CATEGORY,
	type LoggerOptions,
	type RecordLevel,
	type ResolvedLoggerConfig,
	resolveEncoding,
	resolveLevel,
	resolveLoggerConfig,
} from "./config.ts";
export {
	debug,
	debugf,
	error,
	errorf,
	fatal,
	fatalf,
	getDefaultFacade,
	getLogger,
	info,
	infof,
	initLogger,
	panic,
	panicf,
	setDefaultFacade,
	warn,
	warnf,
	withContext,
	withCurrentContext,
	withFields,
} from "./default.ts";
export { loadLoggerOptionsFromEnv } from "./env.ts";
export { LogFacade, type LogFacadeOptions } from "./facade.ts";
export {
	type AnyValue,
	ERROR_KEY,
	type Field,
	type FieldType,
	type FieldValue,
	field,
	type Serializable,
	type Stringer,
	type StructuredValue,
	toStructured,
} from "./fields.ts";
export {
	getConsoleFormatter,
	getJsonFormatter,
	renderMessage,
} from "./formatters.ts";
export { type HandleHost, LoggerHandle } from "./handle.ts";
export { createSink, type Writer } from "./sinks.ts";
export {
	CONTEXT_FIELD,
	extractTraceContext,
	getRequestContext,
	type RequestContext,
	requestContextFrom,
	runWithRequestContext,
	TRACE_CONTEXT_KEYS,
	type TraceContext,
	type TraceContextKey,
} from "./trace-context.ts";
