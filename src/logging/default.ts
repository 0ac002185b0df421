/**
 * Module-level logging bound to a process-wide default facade.
 *
 * Nothing needs to be initialized before the first call: the default facade
 * configures console output at debug level on first use. Call `initLogger`
 * at startup to choose otherwise, or `setDefaultFacade` to install a facade
 * built elsewhere.
 */

import type { LoggerOptions, ResolvedLoggerConfig } from "./config.ts";
import { LogFacade } from "./facade.ts";
import type { Field } from "./fields.ts";
import type { LoggerHandle } from "./handle.ts";
import type { RequestContext } from "./trace-context.ts";

let defaultFacade = new LogFacade();

export function getDefaultFacade(): LogFacade {
	return defaultFacade;
}

/**
 * Install `facade` as the process default and return the one it replaces.
 */
export function setDefaultFacade(facade: LogFacade): LogFacade {
	const previous = defaultFacade;
	defaultFacade = facade;
	return previous;
}

/**
 * Configure the default facade.
 *
 * @example
 * ```typescript
 * initLogger({ level: "debug" }); // console, human-readable
 * initLogger({ level: "debug", encoding: "json" }); // console, JSON
 * initLogger({ saveToFile: true, filePath: "out.log", level: "info" }); // JSON file
 * ```
 *
 * @throws {ConfigError} when the logger cannot be built
 */
export function initLogger(options?: LoggerOptions): ResolvedLoggerConfig {
	return defaultFacade.initialize(options);
}

/**
 * The default logger. Pass the number of wrapper frames between the log call
 * and the code that should be reported as its caller.
 */
export function getLogger(callerSkip = 0): LoggerHandle {
	return defaultFacade.getLogger(callerSkip);
}

export function withContext(ctx?: RequestContext | null): LoggerHandle {
	return defaultFacade.withContext(ctx);
}

export function withCurrentContext(): LoggerHandle {
	return defaultFacade.withCurrentContext();
}

export function withFields(...fields: Field[]): LoggerHandle {
	return defaultFacade.with(...fields);
}

// Each wrapper below calls its handle method directly and skips exactly its
// own frame.

export function debug(message: string, ...fields: Field[]): void {
	defaultFacade.getLogger(1).debug(message, ...fields);
}

export function info(message: string, ...fields: Field[]): void {
	defaultFacade.getLogger(1).info(message, ...fields);
}

export function warn(message: string, ...fields: Field[]): void {
	defaultFacade.getLogger(1).warn(message, ...fields);
}

export function error(message: string, ...fields: Field[]): void {
	defaultFacade.getLogger(1).error(message, ...fields);
}

export function panic(message: string, ...fields: Field[]): never {
	return defaultFacade.getLogger(1).panic(message, ...fields);
}

export function fatal(message: string, ...fields: Field[]): void {
	defaultFacade.getLogger(1).fatal(message, ...fields);
}

export function debugf(template: string, ...args: unknown[]): void {
	defaultFacade.getLogger(1).debugf(template, ...args);
}

export function infof(template: string, ...args: unknown[]): void {
	defaultFacade.getLogger(1).infof(template, ...args);
}

export function warnf(template: string, ...args: unknown[]): void {
	defaultFacade.getLogger(1).warnf(template, ...args);
}

export function errorf(template: string, ...args: unknown[]): void {
	defaultFacade.getLogger(1).errorf(template, ...args);
}

export function panicf(template: string, ...args: unknown[]): never {
	return defaultFacade.getLogger(1).panicf(template, ...args);
}

export function fatalf(template: string, ...args: unknown[]): void {
	defaultFacade.getLogger(1).fatalf(template, ...args);
}
