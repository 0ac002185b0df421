import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { ConfigError, PanicError } from "../errors/logger-errors.ts";
import { formatLogTimestamp } from "../formatters/time.ts";
import { parseFrame } from "./caller.ts";
import { LogFacade, type LogFacadeOptions } from "./facade.ts";
import { field } from "./fields.ts";
import { runWithRequestContext } from "./trace-context.ts";

const INIT_CONSOLE_DEBUG =
	"initialize logger finish, base config is saveToFile=false, level=DEBUG, encoding=console";
const INIT_JSON_DEBUG =
	"initialize logger finish, base config is saveToFile=false, level=DEBUG, encoding=json";

function parseRecord(line: string): Record<string, unknown> {
	const parsed: Record<string, unknown> = JSON.parse(line);
	return parsed;
}

function createCapture(options: LogFacadeOptions = {}) {
	const lines: string[] = [];
	const events: string[] = [];
	const exit = vi.fn((code: number) => {
		events.push(`exit:${code}`);
	});
	const facade = new LogFacade({
		writer: (chunk) => {
			lines.push(chunk);
			events.push("write");
		},
		exit,
		...options,
	});
	const records = (): Record<string, unknown>[] => lines.map(parseRecord);
	return { facade, lines, events, exit, records };
}

describe("LogFacade", () => {
	let capture: ReturnType<typeof createCapture>;

	beforeEach(() => {
		capture = createCapture();
	});

	afterEach(() => {
		capture.facade.close();
	});

	describe("initialize", () => {
		test("writes one console summary line through the new logger", () => {
			const config = capture.facade.initialize({ level: "debug" });

			expect(config.encoding).toBe("console");
			expect(capture.lines).toHaveLength(1);
			const columns = capture.lines[0]?.trimEnd().split("\t") ?? [];
			expect(columns).toHaveLength(4);
			expect(columns[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}$/);
			expect(columns[1]).toBe("info");
			expect(columns[2]).toMatch(/^logging\/facade\.ts:\d+$/);
			expect(columns[3]).toBe(INIT_CONSOLE_DEBUG);
		});

		test("json encoding on the console keeps the custom timestamp", () => {
			capture.facade.initialize({ encoding: "json" });

			const [summary] = capture.records();
			expect(summary?.msg).toBe(INIT_JSON_DEBUG);
			expect(summary?.level).toBe("info");
			expect(summary?.ts).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}$/);
		});

		test("an unknown level falls back to debug", () => {
			const config = capture.facade.initialize({ level: "loud", encoding: "json" });
			capture.facade.getLogger().debug("visible");

			expect(config.level).toBe("DEBUG");
			expect(capture.records().map((r) => r.msg)).toEqual([INIT_JSON_DEBUG, "visible"]);
		});

		test("drops records below the configured level", () => {
			capture.facade.initialize({ level: "WaRn", encoding: "json" });
			const log = capture.facade.getLogger();
			log.debug("hidden");
			log.info("hidden");
			log.warn("shown warn");
			log.error("shown error");

			expect(capture.records().map((r) => [r.level, r.msg])).toEqual([
				["warn", "shown warn"],
				["error", "shown error"],
			]);
		});

		test("re-initialization replaces the configuration", () => {
			capture.facade.initialize({ encoding: "json" });
			capture.facade.initialize({ level: "warn", encoding: "console" });
			capture.facade.getLogger().warn("after");

			expect(capture.facade.config?.encoding).toBe("console");
			expect(capture.lines).toHaveLength(2);
			expect(capture.lines[1]?.split("\t")[3]).toBe("after\n");
		});

		test("a facade initialized later takes over the engine", () => {
			const other = createCapture();
			capture.facade.initialize({ encoding: "json" });
			other.facade.initialize({ encoding: "json" });

			expect(capture.facade.initialized).toBe(false);
			expect(capture.facade.config).toBeUndefined();
			expect(other.facade.initialized).toBe(true);

			other.facade.close();
			capture.facade.getLogger().info("after takeover");

			expect(other.lines).toHaveLength(1);
			expect(capture.lines).toHaveLength(3);
			expect(capture.lines[1]?.split("\t")[3]).toBe(`${INIT_CONSOLE_DEBUG}\n`);
			expect(capture.lines[2]?.split("\t")[3]).toBe("after takeover\n");
		});
	});

	describe("file output", () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), "fieldlog-"));
		});

		afterEach(() => {
			if (existsSync(dir)) rmSync(dir, { recursive: true, force: true });
		});

		test("writes JSON with ISO timestamps regardless of encoding", () => {
			const filePath = join(dir, "app.log");
			const config = capture.facade.initialize({
				saveToFile: true,
				filePath,
				level: "info",
				encoding: "console",
			});
			const at = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6));
			capture.facade.getLogger().info("to file", field.string("k", "v"), field.time("at", at));
			capture.facade.close();

			expect(config.encoding).toBe("json");
			expect(capture.lines).toHaveLength(0);
			const records = readFileSync(filePath, "utf8")
				.trim()
				.split("\n")
				.map(parseRecord);
			expect(records).toHaveLength(2);
			expect(records[0]?.msg).toBe(
				`initialize logger finish, base config is saveToFile=true, filePath=${filePath}, level=INFO, encoding=json`,
			);
			expect(records[1]).toMatchObject({
				level: "info",
				msg: "to file",
				k: "v",
				at: "2024-01-02T03:04:05.006Z",
			});
			expect(records[1]?.ts).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
		});

		test("each record reaches the file as it is written", () => {
			const filePath = join(dir, "live.log");
			capture.facade.initialize({ saveToFile: true, filePath });
			capture.facade.getLogger().info("written now", field.string("pad", "x".repeat(300)));

			const lines = readFileSync(filePath, "utf8").trim().split("\n");
			expect(lines).toHaveLength(2);
			expect(parseRecord(lines[1] ?? "").msg).toBe("written now");
		});

		test("fails with ConfigError when the file cannot be opened", () => {
			const filePath = join(dir, "missing", "app.log");
			let caught: unknown;
			try {
				capture.facade.initialize({ saveToFile: true, filePath });
			} catch (error) {
				caught = error;
			}

			expect(caught).toBeInstanceOf(ConfigError);
			if (!(caught instanceof ConfigError)) return;
			expect(caught.code).toBe("LOGGER_BUILD_FAILED");
			expect(caught.context).toEqual({ filePath });
			expect(caught.cause).toBeInstanceOf(Error);
			expect(capture.facade.initialized).toBe(false);
		});
	});

	describe("lazy initialization", () => {
		test("first use initializes console debug output", () => {
			expect(capture.facade.initialized).toBe(false);
			capture.facade.getLogger().debug("first");

			expect(capture.facade.config).toMatchObject({
				saveToFile: false,
				level: "DEBUG",
				encoding: "console",
			});
			expect(capture.lines).toHaveLength(2);
			expect(capture.lines[0]?.split("\t")[3]).toBe(`${INIT_CONSOLE_DEBUG}\n`);
			expect(capture.lines[1]?.split("\t")[3]).toBe("first\n");
		});

		test("getLogger never touches an existing configuration", () => {
			capture.facade.initialize({ level: "error" });
			capture.facade.getLogger();
			capture.facade.getLogger(3);

			expect(capture.facade.config?.level).toBe("ERROR");
			expect(capture.lines).toHaveLength(0);
		});

		test("a failing default reports the error and exits", () => {
			const errors: string[] = [];
			const failing = createCapture({
				defaults: { saveToFile: true, filePath: join(tmpdir(), "fieldlog-none", "x", "a.log") },
				errorWriter: (chunk) => {
					errors.push(chunk);
				},
			});

			expect(() => failing.facade.getLogger()).toThrow(ConfigError);
			expect(failing.exit).toHaveBeenCalledWith(1);
			expect(errors).toHaveLength(1);
			expect(errors[0]).toMatch(/^fieldlog: default logger initialization failed: Cannot open log file /);
		});
	});

	describe("records", () => {
		beforeEach(() => {
			capture.facade.initialize({ encoding: "json" });
			capture.lines.length = 0;
		});

		test("reports the calling line as caller", () => {
			capture.facade.getLogger().info("here");

			expect(capture.records()[0]?.caller).toMatch(/^logging\/facade\.test\.ts:\d+$/);
		});

		test("carries every typed field in JSON", () => {
			const at = new Date(Date.UTC(2024, 1, 3, 4, 5, 6, 7));
			capture.facade.getLogger().info(
				"typed",
				field.int("int", 1),
				field.int64("int64", 9007199254740993n),
				field.uint("uint", 2),
				field.uint64("uint64", 3n),
				field.uintptr("uintptr", 4),
				field.float64("float64", 1.25),
				field.bool("bool", true),
				field.string("string", "s"),
				field.stringer("stringer", { toString: () => "str" }),
				field.time("time", at),
				field.duration("duration", 2500),
				field.err(new Error("boom")),
				field.any("any", { nested: [1, { deep: true }] }),
			);

			expect(capture.records()[0]).toMatchObject({
				level: "info",
				msg: "typed",
				int: 1,
				int64: "9007199254740993",
				uint: 2,
				uint64: 3,
				uintptr: 4,
				float64: 1.25,
				bool: true,
				string: "s",
				stringer: "str",
				time: formatLogTimestamp(at),
				duration: 2.5,
				error: "boom",
				any: { nested: [1, { deep: true }] },
			});
		});

		test("error and more severe records carry the stack from the caller", () => {
			const log = capture.facade.getLogger();
			log.warn("no stack");
			log.error("with stack");

			const [plain, failed] = capture.records();
			expect(plain).not.toHaveProperty("stacktrace");
			const [firstFrame] = String(failed?.stacktrace).split("\n");
			expect(parseFrame(firstFrame ?? "")).toBe(failed?.caller);
			expect(Object.keys(failed ?? {}).at(-1)).toBe("stacktrace");
		});

		test("fields cannot replace the level or the stack", () => {
			const log = capture.facade.with(field.string("level", "panic"));
			log.info("plain", field.string("stacktrace", "fake"));

			expect(capture.records()).toEqual([
				expect.objectContaining({ level: "info", msg: "plain" }),
			]);
			expect(capture.records()[0]).not.toHaveProperty("stacktrace");
		});

		test("a nil error field is left out", () => {
			capture.facade.getLogger().warn("no error", field.err(undefined));

			expect(capture.records()[0]).not.toHaveProperty("error");
		});

		test("fields cannot spoof the message", () => {
			capture.facade.getLogger().info("real", field.string("msg", "fake"));

			expect(capture.records()[0]?.msg).toBe("real");
		});

		test("braces in messages are written literally", () => {
			capture.facade.getLogger().info("payload {id} }}", field.int("id", 1));

			expect(capture.records()[0]?.msg).toBe("payload {id} }}");
		});

		test("formatted variants interpolate and attach no fields", () => {
			const log = capture.facade.getLogger();
			log.infof("%s=%d", "retries", 3);
			log.warnf("%j", { a: 1 });

			expect(capture.records()).toEqual([
				expect.objectContaining({ level: "info", msg: "retries=3" }),
				expect.objectContaining({ level: "warn", msg: '{"a":1}' }),
			]);
			expect(Object.keys(capture.records()[0] ?? {})).toEqual(["level", "ts", "caller", "msg"]);
		});

		test("with binds fields to every record", () => {
			const log = capture.facade.with(field.string("svc", "api"));
			log.info("one", field.int("n", 1));
			log.with(field.bool("retry", true)).error("two");

			expect(capture.records()).toEqual([
				expect.objectContaining({ msg: "one", svc: "api", n: 1 }),
				expect.objectContaining({ msg: "two", svc: "api", retry: true }),
			]);
		});
	});

	describe("withContext", () => {
		beforeEach(() => {
			capture.facade.initialize({ encoding: "json" });
			capture.lines.length = 0;
		});

		test("binds only the trace keys found", () => {
			const ctx = new Map([["X-B3-TraceId", "t1"]]);
			capture.facade.withContext(ctx).info("traced");

			expect(capture.records()[0]?.context).toEqual({ "X-B3-TraceId": "t1" });
		});

		test("binds all four keys in fixed order", () => {
			const ctx = new Map([
				["X-Span-Name", "logger test"],
				["X-B3-ParentSpanId", "1a2b3c"],
				["X-B3-SpanId", "abcdef"],
				["X-B3-TraceId", "123456"],
			]);
			capture.facade.withContext(ctx).debug("traced", field.any("object", [{ name: "Ana" }]));

			const [record] = capture.records();
			expect(JSON.stringify(record?.context)).toBe(
				'{"X-B3-TraceId":"123456","X-B3-SpanId":"abcdef","X-B3-ParentSpanId":"1a2b3c","X-Span-Name":"logger test"}',
			);
			expect(record?.object).toEqual([{ name: "Ana" }]);
		});

		test("adds no context field without a context", () => {
			capture.facade.withContext().info("plain");
			capture.facade.withContext(null).info("plain");

			for (const record of capture.records()) {
				expect(record).not.toHaveProperty("context");
			}
		});

		test("adds no context field when no trace key is present", () => {
			capture.facade.withContext(new Map([["X-Request-Id", "r1"]])).info("plain");

			expect(capture.records()[0]).not.toHaveProperty("context");
		});

		test("a context whose lookup throws gives the plain logger", () => {
			const ctx = {
				get(): unknown {
					throw new Error("lookup failed");
				},
			};
			capture.facade.withContext(ctx).info("plain");

			expect(capture.records()[0]).not.toHaveProperty("context");
		});

		test("reports the caller of the returned handle", () => {
			capture.facade.withContext(new Map([["X-B3-TraceId", "t1"]])).info("traced");

			expect(capture.records()[0]?.caller).toMatch(/^logging\/facade\.test\.ts:\d+$/);
		});

		test("withCurrentContext reads the propagated request context", async () => {
			const ctx = new Map([["X-B3-SpanId", "s9"]]);
			await runWithRequestContext(ctx, async () => {
				await Promise.resolve();
				capture.facade.withCurrentContext().info("inside");
			});
			capture.facade.withCurrentContext().info("outside");

			const [inside, outside] = capture.records();
			expect(inside?.context).toEqual({ "X-B3-SpanId": "s9" });
			expect(outside).not.toHaveProperty("context");
		});
	});

	describe("panic and fatal", () => {
		beforeEach(() => {
			capture.facade.initialize({ level: "error", encoding: "json" });
			capture.events.length = 0;
		});

		test("panic writes the record then throws PanicError", () => {
			const log = capture.facade.with(field.string("svc", "api"));
			let caught: unknown;
			try {
				log.panic("invariant broken", field.int("n", 1));
			} catch (error) {
				caught = error;
			}

			expect(caught).toBeInstanceOf(PanicError);
			if (!(caught instanceof PanicError)) return;
			expect(caught.message).toBe("invariant broken");
			expect(caught.context).toEqual({ svc: "api", n: 1 });
			expect(capture.records()).toEqual([
				expect.objectContaining({ level: "panic", msg: "invariant broken", svc: "api", n: 1 }),
			]);
			expect(capture.exit).not.toHaveBeenCalled();
		});

		test("panicf formats the message", () => {
			expect(() => capture.facade.getLogger().panicf("bad %s", "state")).toThrow("bad state");
		});

		test("fatal writes the record before exiting with code 1", () => {
			capture.facade.getLogger().fatal("cannot continue", field.string("reason", "disk"));

			expect(capture.events).toEqual(["write", "exit:1"]);
			expect(capture.records()[0]).toMatchObject({
				level: "fatal",
				msg: "cannot continue",
				reason: "disk",
			});
			expect(capture.facade.initialized).toBe(false);
		});

		test("fatalf writes then exits", () => {
			capture.facade.getLogger().fatalf("exit code %d", 2);

			expect(capture.events).toEqual(["write", "exit:1"]);
			expect(capture.records()[0]?.msg).toBe("exit code 2");
		});

		test("abort exits with the given code", () => {
			capture.facade.abort(3);

			expect(capture.exit).toHaveBeenCalledWith(3);
			expect(capture.facade.initialized).toBe(false);
		});
	});
});
