/**
 * B3 trace-correlation fields read from a request-scoped context.
 *
 * The facade only reads these keys; populating them is the job of whatever
 * transport or middleware owns the request.
 *
 * ## Usage
 *
 * ```typescript
 * import { runWithRequestContext, withCurrentContext } from "fieldlog/logging";
 *
 * server.on("request", (req, res) => {
 *   const ctx = new Map([
 *     ["X-B3-TraceId", req.headers["x-b3-traceid"]],
 *     ["X-B3-SpanId", req.headers["x-b3-spanid"]],
 *   ]);
 *   runWithRequestContext(ctx, () => handle(req, res));
 * });
 *
 * // anywhere below handle():
 * withCurrentContext().info("cache miss");
 * ```
 *
 * @module logging/trace-context
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { type StructuredValue, toStructured } from "./fields.ts";

/**
 * Anything values can be looked up in by string key: a `Map`, fetch
 * `Headers`, `URLSearchParams`, or a custom request object.
 * `null` and `undefined` results count as absent.
 */
export interface RequestContext {
	get(key: string): unknown;
}

/** Trace identifier of the whole request chain. */
export const TRACE_ID_KEY = "X-B3-TraceId";
/** Identifier of the current unit of work. */
export const SPAN_ID_KEY = "X-B3-SpanId";
/** Span the current one belongs to; empty on the root span. */
export const PARENT_SPAN_ID_KEY = "X-B3-ParentSpanId";
export const SPAN_NAME_KEY = "X-Span-Name";

/** Keys read by `extractTraceContext`, in output order. */
export const TRACE_CONTEXT_KEYS = [
	TRACE_ID_KEY,
	SPAN_ID_KEY,
	PARENT_SPAN_ID_KEY,
	SPAN_NAME_KEY,
] as const;

export type TraceContextKey = (typeof TRACE_CONTEXT_KEYS)[number];

export type TraceContext = Partial<Record<TraceContextKey, StructuredValue>>;

/** Field name the trace mapping is bound under. */
export const CONTEXT_FIELD = "context";

// A context whose lookup throws is treated as not having the key.
function lookup(ctx: RequestContext, key: string): unknown {
	try {
		return ctx.get(key);
	} catch {
		return undefined;
	}
}

/**
 * Collect the B3 keys present in `ctx`.
 *
 * Never throws; returns undefined when there is no context or none of the
 * keys are set.
 */
export function extractTraceContext(
	ctx: RequestContext | null | undefined,
): TraceContext | undefined {
	if (!ctx) return undefined;

	const found: TraceContext = {};
	let count = 0;
	for (const key of TRACE_CONTEXT_KEYS) {
		const value = lookup(ctx, key);
		if (value === undefined || value === null) continue;
		found[key] = toStructured(value);
		count++;
	}
	return count > 0 ? found : undefined;
}

/**
 * Wrap a plain object as a RequestContext.
 */
export function requestContextFrom(
	values: Readonly<Record<string, unknown>>,
): RequestContext {
	return new Map(Object.entries(values));
}

const storage = new AsyncLocalStorage<RequestContext>();

/**
 * Run `fn` with `ctx` as the current request context, across async
 * boundaries.
 */
export function runWithRequestContext<T>(ctx: RequestContext, fn: () => T): T {
	return storage.run(ctx, fn);
}

/**
 * The request context of the enclosing `runWithRequestContext`, if any.
 */
export function getRequestContext(): RequestContext | undefined {
	return storage.getStore();
}
