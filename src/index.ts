/**
 * fieldlog
 *
 * Structured logging facade with typed fields and B3 trace correlation.
 *
 * Subpath exports are available too:
 *   import { field, info } from "fieldlog/logging";
 *   import { ConfigError } from "fieldlog/errors";
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0'

export * from './errors/index.ts'
export * from './logging/index.ts'
