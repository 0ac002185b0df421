/**
 * LogFacade: owns the process-wide LogTape configuration and hands out
 * logger handles.
 *
 * LogTape keeps one configuration per process, so the facade that
 * initialized last decides where every record goes.
 */

import { configureSync, getLogger, resetSync } from "@logtape/logtape";
import { ConfigError } from "../errors/logger-errors.ts";
import { toError } from "../errors/structured-error.ts";
import {
	LOGGER_CATEGORY,
	type LoggerOptions,
	type ResolvedLoggerConfig,
	resolveLoggerConfig,
	toEngineLevel,
} from "./config.ts";
import { type Field, field } from "./fields.ts";
import { type HandleHost, LoggerHandle } from "./handle.ts";
import { createSink, stdoutWriter, type Writer } from "./sinks.ts";
import {
	CONTEXT_FIELD,
	extractTraceContext,
	getRequestContext,
	type RequestContext,
} from "./trace-context.ts";

export interface LogFacadeOptions {
	/** Console sink output. Defaults to standard output. */
	writer?: Writer;
	/** Where lazy-initialization failures are reported. Defaults to standard error. */
	errorWriter?: Writer;
	/** Process terminator used by `abort`. Defaults to `process.exit`. */
	exit?: (code: number) => void;
	/** Options for the lazy default initialization. Console, debug when omitted. */
	defaults?: LoggerOptions;
}

let activeFacade: LogFacade | undefined;

export class LogFacade implements HandleHost {
	private readonly writer: Writer;
	private readonly errorWriter: Writer;
	private readonly exit: (code: number) => void;
	private readonly defaults: LoggerOptions;
	private handle: LoggerHandle | undefined;
	private resolved: ResolvedLoggerConfig | undefined;

	constructor(options: LogFacadeOptions = {}) {
		this.writer = options.writer ?? stdoutWriter;
		this.errorWriter =
			options.errorWriter ??
			((chunk) => {
				process.stderr.write(chunk);
			});
		this.exit = options.exit ?? ((code) => process.exit(code));
		this.defaults = options.defaults ?? { saveToFile: false, level: "debug" };
	}

	/** The configuration in effect, or undefined before initialization. */
	get config(): ResolvedLoggerConfig | undefined {
		return this.resolved;
	}

	get initialized(): boolean {
		return this.handle !== undefined;
	}

	/**
	 * Replace the logging configuration and write one record summarising it.
	 *
	 * @throws {ConfigError} when the sink cannot be built or LogTape rejects
	 * the configuration; no logger remains initialized afterwards
	 */
	initialize(options: LoggerOptions = {}): ResolvedLoggerConfig {
		return this.build(options).config;
	}

	/**
	 * The current logger, initializing the defaults first if needed.
	 *
	 * If the default initialization fails the error goes to standard error and
	 * the process exits with code 1.
	 */
	getLogger(callerSkip = 0): LoggerHandle {
		return this.ensure().withCallerSkip(callerSkip);
	}

	/**
	 * A logger carrying the B3 trace keys found in `ctx` as a single
	 * `context` field. Without any of them, the plain logger.
	 */
	withContext(ctx?: RequestContext | null): LoggerHandle {
		const handle = this.ensure();
		const trace = extractTraceContext(ctx);
		return trace ? handle.with(field.any(CONTEXT_FIELD, trace)) : handle;
	}

	/** `withContext` over the context of the enclosing `runWithRequestContext`. */
	withCurrentContext(): LoggerHandle {
		return this.withContext(getRequestContext());
	}

	with(...fields: Field[]): LoggerHandle {
		return this.ensure().with(...fields);
	}

	/**
	 * Flush and dispose LogTape's sinks and forget the logger. The next
	 * logging call initializes the defaults again.
	 *
	 * Another facade's initialization does the same to this one, without
	 * touching the sinks it now owns.
	 */
	close(): void {
		this.detach();
		if (activeFacade === this) {
			activeFacade = undefined;
			resetSync();
		}
	}

	/**
	 * Flush the sinks, then end the process with `code`.
	 */
	abort(code: number): void {
		this.close();
		this.exit(code);
	}

	private detach(): void {
		this.handle = undefined;
		this.resolved = undefined;
	}

	private ensure(): LoggerHandle {
		if (this.handle) return this.handle;
		try {
			return this.build(this.defaults).handle;
		} catch (error: unknown) {
			this.errorWriter(
				`fieldlog: default logger initialization failed: ${toError(error).message}\n`,
			);
			this.exit(1);
			throw error;
		}
	}

	private build(options: LoggerOptions): {
		handle: LoggerHandle;
		config: ResolvedLoggerConfig;
	} {
		this.close();
		const config = resolveLoggerConfig(options);
		const sink = createSink(config, this.writer);

		// LogTape holds one configuration; the facade that owned it loses its
		// handle and rebuilds on next use.
		if (activeFacade && activeFacade !== this) activeFacade.detach();
		activeFacade = undefined;

		try {
			configureSync({
				reset: true,
				sinks: { main: sink },
				loggers: [
					{
						category: [LOGGER_CATEGORY],
						sinks: ["main"],
						lowestLevel: toEngineLevel(config.level),
					},
					{
						category: ["logtape", "meta"],
						sinks: ["main"],
						lowestLevel: "error",
					},
				],
			});
		} catch (error: unknown) {
			throw new ConfigError(
				"Failed to configure the logging engine",
				"LOGGER_BUILD_FAILED",
				{ output: config.output },
				toError(error),
			);
		}

		activeFacade = this;
		const handle = new LoggerHandle(getLogger([LOGGER_CATEGORY]), this);
		this.handle = handle;
		this.resolved = config;

		const path = config.filePath ? `, filePath=${config.filePath}` : "";
		handle.info(
			`initialize logger finish, base config is saveToFile=${config.saveToFile}${path}, level=${config.level}, encoding=${config.encoding}`,
		);

		return { handle, config };
	}
}
