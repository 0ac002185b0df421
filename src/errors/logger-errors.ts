/**
 * Errors raised by the logging facade.
 *
 * @module errors/logger-errors
 */

import { StructuredError } from './structured-error.ts'

export type ConfigErrorCode = 'LOGGER_CONFIG_INVALID' | 'LOGGER_BUILD_FAILED'

/**
 * The logger could not be built from the supplied options: the log file could
 * not be opened, the engine rejected its configuration, or environment input
 * was malformed.
 */
export class ConfigError extends StructuredError {
	declare readonly code: ConfigErrorCode

	constructor(
		message: string,
		code: ConfigErrorCode,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, 'CONFIGURATION', code, false, context, cause)
		this.name = 'ConfigError'
	}
}

/**
 * Thrown by panic-level calls once the record has been written.
 *
 * Callers that log at panic level accept a non-local exit; nothing in the
 * facade catches it.
 */
export class PanicError extends StructuredError {
	constructor(message: string, fields: Record<string, unknown> = {}) {
		super(message, 'INTERNAL', 'LOGGER_PANIC', false, fields)
		this.name = 'PanicError'
	}
}
