/**
 * Leveled logger view over a LogTape logger.
 */

import { format } from "node:util";
import type { Logger as EngineLogger } from "@logtape/logtape";
import { PanicError } from "../errors/logger-errors.ts";
import { captureCaller, captureStack } from "./caller.ts";
import type { RecordLevel } from "./config.ts";
import { type Field, fieldsToProperties } from "./fields.ts";
import { CALLER_KEY, LEVEL_KEY, STACKTRACE_KEY } from "./formatters.ts";

const STACKTRACE_LEVELS: ReadonlySet<RecordLevel> = new Set([
	"error",
	"panic",
	"fatal",
]);

/**
 * What a handle needs from the facade that built it.
 */
export interface HandleHost {
	/** Flush the sinks and end the process with `code`. */
	abort(code: number): void;
}

/**
 * A logger bound to the facade's configuration, a caller skip, and zero or
 * more pre-bound fields. Handles are immutable; `with` and `withCallerSkip`
 * return new ones.
 */
export class LoggerHandle {
	constructor(
		private readonly logger: EngineLogger,
		private readonly host: HandleHost,
		/** Extra stack frames to skip when reporting the caller. */
		readonly callerSkip = 0,
		/** Fields attached to every record from this handle. */
		readonly fields: readonly Field[] = [],
	) {}

	debug(message: string, ...fields: Field[]): void {
		this.emit("debug", message, fields);
	}

	info(message: string, ...fields: Field[]): void {
		this.emit("info", message, fields);
	}

	warn(message: string, ...fields: Field[]): void {
		this.emit("warn", message, fields);
	}

	error(message: string, ...fields: Field[]): void {
		this.emit("error", message, fields);
	}

	/**
	 * Write the record, then throw a PanicError carrying the message and all
	 * fields.
	 */
	panic(message: string, ...fields: Field[]): never {
		this.emit("panic", message, fields);
		throw new PanicError(
			message,
			fieldsToProperties([...this.fields, ...fields]),
		);
	}

	/**
	 * Write the record, then abort the process with exit code 1.
	 */
	fatal(message: string, ...fields: Field[]): void {
		this.emit("fatal", message, fields);
		this.host.abort(1);
	}

	debugf(template: string, ...args: unknown[]): void {
		this.emit("debug", format(template, ...args), []);
	}

	infof(template: string, ...args: unknown[]): void {
		this.emit("info", format(template, ...args), []);
	}

	warnf(template: string, ...args: unknown[]): void {
		this.emit("warn", format(template, ...args), []);
	}

	errorf(template: string, ...args: unknown[]): void {
		this.emit("error", format(template, ...args), []);
	}

	panicf(template: string, ...args: unknown[]): never {
		const message = format(template, ...args);
		this.emit("panic", message, []);
		throw new PanicError(message, fieldsToProperties(this.fields));
	}

	fatalf(template: string, ...args: unknown[]): void {
		this.emit("fatal", format(template, ...args), []);
		this.host.abort(1);
	}

	/**
	 * A handle that attaches `fields` to every record, after any already
	 * bound.
	 */
	with(...fields: Field[]): LoggerHandle {
		if (fields.length === 0) return this;
		return new LoggerHandle(
			this.logger.with(fieldsToProperties(fields)),
			this.host,
			this.callerSkip,
			[...this.fields, ...fields],
		);
	}

	/**
	 * A handle reporting callers `skip` frames further up, for wrapper
	 * functions that should attribute records to their own callers.
	 */
	withCallerSkip(skip: number): LoggerHandle {
		if (skip === 0) return this;
		return new LoggerHandle(
			this.logger,
			this.host,
			this.callerSkip + skip,
			this.fields,
		);
	}

	// Every public method calls this directly, so the user's frame sits two
	// above it. Reserved properties come last so no field can replace them.
	private emit(level: RecordLevel, message: string, fields: Field[]): void {
		const skip = 1 + this.callerSkip;
		const logger = this.logger.with({
			...fieldsToProperties(fields),
			[LEVEL_KEY]: level,
			[CALLER_KEY]: captureCaller(skip),
			[STACKTRACE_KEY]: STACKTRACE_LEVELS.has(level)
				? captureStack(skip)
				: undefined,
		});

		switch (level) {
			case "debug":
				logger.debug`${message}`;
				break;
			case "info":
				logger.info`${message}`;
				break;
			case "warn":
				logger.warning`${message}`;
				break;
			case "error":
				logger.error`${message}`;
				break;
			case "panic":
			case "fatal":
				logger.fatal`${message}`;
				break;
		}
	}
}
