/**
 * Error handling utilities and base classes.
 *
 * @module errors
 */

export {
	ConfigError,
	type ConfigErrorCode,
	PanicError,
} from './logger-errors.ts'
export {
	type ErrorCategory,
	StructuredError,
	toError,
} from './structured-error.ts'
