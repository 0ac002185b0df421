/**
 * Typed field constructors.
 *
 * A field is resolved to a JSON-compatible value when it is built, so the
 * formatters never inspect caller objects at write time. Time fields are the
 * exception: they hold a copy of the `Date`.
 *
 * @example
 * ```typescript
 * import { field, info } from "fieldlog/logging";
 *
 * info("request served",
 *   field.string("method", "GET"),
 *   field.int("status", 200),
 *   field.duration("elapsed", 12.5),
 *   field.any("user", { id: 7, roles: ["admin"] }),
 * );
 * ```
 */

import { formatIsoTimestamp, millisecondsToSeconds } from "../formatters/time.ts";

/** JSON-compatible value carried by a field. */
export type StructuredValue =
	| null
	| boolean
	| number
	| string
	| readonly StructuredValue[]
	| { readonly [key: string]: StructuredValue };

/** A type that knows its own structured form. */
export interface Serializable {
	toStructured(): StructuredValue;
}

/** Anything with a meaningful `toString()`. */
export interface Stringer {
	toString(): string;
}

/**
 * Values accepted by `field.any`. Anything else an object can be is read
 * through its own enumerable properties.
 */
export type AnyValue =
	| StructuredValue
	| Serializable
	| Date
	| Error
	| bigint
	| undefined
	| ReadonlyMap<unknown, unknown>
	| ReadonlySet<unknown>
	| readonly unknown[]
	| object;

export type FieldType =
	| "int"
	| "int64"
	| "uint"
	| "uint64"
	| "uintptr"
	| "float64"
	| "bool"
	| "string"
	| "stringer"
	| "time"
	| "duration"
	| "error"
	| "any"
	| "skip";

/**
 * What a field carries. Time fields keep their `Date` until a formatter
 * writes it in the sink's timestamp format.
 */
export type FieldValue = StructuredValue | Date;

export interface Field {
	readonly key: string;
	readonly type: FieldType;
	readonly value: FieldValue;
}

/** Key used by `field.err`. */
export const ERROR_KEY = "error";

function makeField(key: string, type: FieldType, value: FieldValue): Field {
	return Object.freeze({ key, type, value });
}

function integer(value: number | bigint): number | string {
	if (typeof value === "number") return value;
	return value >= BigInt(Number.MIN_SAFE_INTEGER) &&
		value <= BigInt(Number.MAX_SAFE_INTEGER)
		? Number(value)
		: value.toString();
}

function float(value: number): number | string {
	if (Number.isNaN(value)) return "NaN";
	if (value === Number.POSITIVE_INFINITY) return "+Inf";
	if (value === Number.NEGATIVE_INFINITY) return "-Inf";
	return value;
}

function isoTime(value: Date): string {
	return Number.isNaN(value.getTime()) ? "Invalid Date" : formatIsoTimestamp(value);
}

function isSerializable(value: object): value is Serializable {
	return "toStructured" in value && typeof value.toStructured === "function";
}

/**
 * Resolve an arbitrary value to its structured form.
 *
 * Functions, symbols and `undefined` are dropped from objects and become
 * `null` inside arrays. A repeated reference on the current path becomes
 * "[Circular]".
 */
export function toStructured(
	value: unknown,
	seen: WeakSet<object> = new WeakSet(),
): StructuredValue {
	if (typeof value === "string" || typeof value === "boolean") return value;
	if (typeof value === "number") return float(value);
	if (typeof value === "bigint") return integer(value);
	if (value === null || typeof value !== "object") return null;

	if (value instanceof Date) return isoTime(value);
	if (seen.has(value)) return "[Circular]";
	seen.add(value);
	try {
		if (isSerializable(value)) return value.toStructured();
		if (value instanceof Error) {
			const out: Record<string, StructuredValue> = {
				name: value.name,
				message: value.message,
			};
			if (value.cause !== undefined) out.cause = toStructured(value.cause, seen);
			return out;
		}
		if (Array.isArray(value) || value instanceof Set) {
			return Array.from(value, (item: unknown) => toStructured(item, seen));
		}
		if (value instanceof Map) {
			const out: Record<string, StructuredValue> = {};
			for (const [key, item] of value) {
				if (isDropped(item)) continue;
				out[String(key)] = toStructured(item, seen);
			}
			return out;
		}
		const out: Record<string, StructuredValue> = {};
		for (const [key, item] of Object.entries(value)) {
			if (isDropped(item)) continue;
			out[key] = toStructured(item, seen);
		}
		return out;
	} finally {
		seen.delete(value);
	}
}

function isDropped(value: unknown): boolean {
	return (
		value === undefined ||
		typeof value === "function" ||
		typeof value === "symbol"
	);
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export const field = {
	int: (key: string, value: number): Field => makeField(key, "int", value),

	int64: (key: string, value: number | bigint): Field =>
		makeField(key, "int64", integer(value)),

	uint: (key: string, value: number): Field => makeField(key, "uint", value),

	uint64: (key: string, value: number | bigint): Field =>
		makeField(key, "uint64", integer(value)),

	uintptr: (key: string, value: number | bigint): Field =>
		makeField(key, "uintptr", integer(value)),

	float64: (key: string, value: number): Field =>
		makeField(key, "float64", float(value)),

	bool: (key: string, value: boolean): Field => makeField(key, "bool", value),

	string: (key: string, value: string): Field =>
		makeField(key, "string", value),

	stringer: (key: string, value: Stringer): Field =>
		makeField(key, "stringer", value.toString()),

	/** Written in the sink's timestamp format; an invalid date as "Invalid Date". */
	time: (key: string, value: Date): Field =>
		makeField(key, "time", new Date(value.getTime())),

	/** `value` is in milliseconds; written as fractional seconds. */
	duration: (key: string, value: number): Field =>
		makeField(key, "duration", millisecondsToSeconds(value)),

	/** Keyed "error". A null or undefined error yields a field that is never written. */
	err: (error: unknown): Field =>
		error === null || error === undefined
			? makeField("", "skip", null)
			: makeField(ERROR_KEY, "error", errorMessage(error)),

	any: (key: string, value: AnyValue): Field =>
		makeField(key, "any", toStructured(value)),
} as const;

/**
 * Collapse fields into a property bag; later keys win, skip fields vanish.
 */
export function fieldsToProperties(
	fields: readonly Field[],
): Record<string, FieldValue> {
	const properties: Record<string, FieldValue> = {};
	for (const f of fields) {
		if (f.type === "skip") continue;
		properties[f.key] = f.value;
	}
	return properties;
}
