/**
 * Structured error base class.
 *
 * Every error the logging facade raises carries a category, a
 * machine-readable code, a recoverability hint and context metadata, so a
 * host application can log or rethrow it without string matching.
 *
 * @module errors/structured-error
 */

import {
	type Serializable,
	type StructuredValue,
	toStructured,
} from '../logging/fields.ts'

/**
 * Error categories used across the package.
 */
export type ErrorCategory =
	| 'CONFIGURATION' // Logger options could not be turned into a working engine
	| 'VALIDATION' // Input (environment, options) failed validation
	| 'INTERNAL' // Deliberate non-local exit, e.g. a panic-level record
	| 'UNKNOWN'

/**
 * Structured error with categorization, recoverability, and context.
 *
 * Passed to `field.any`, it is written with its category, code and context
 * rather than just its message.
 *
 * @example
 * ```typescript
 * class SinkError extends StructuredError {
 *   constructor(message: string, path: string) {
 *     super(message, "CONFIGURATION", "SINK_UNAVAILABLE", false, { path });
 *     this.name = "SinkError";
 *   }
 * }
 * ```
 */
export class StructuredError extends Error implements Serializable {
	public readonly category: ErrorCategory

	/** Machine-readable code, e.g. "LOGGER_BUILD_FAILED". */
	public readonly code: string

	/** Whether retrying the failed operation can succeed. */
	public readonly recoverable: boolean

	public readonly context: Record<string, unknown>

	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		Error.captureStackTrace(this, new.target)
	}

	/**
	 * Record form. The stack is left out; error-level records carry their
	 * own `stacktrace`.
	 */
	toStructured(): StructuredValue {
		const out: Record<string, StructuredValue> = {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: toStructured(this.context),
		}
		if (this.cause) out.cause = toStructured(this.cause)
		return out
	}

	toJSON(): StructuredValue {
		return this.toStructured()
	}
}

/**
 * Normalise a thrown value into an Error, for use as a `cause`.
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value))
}
