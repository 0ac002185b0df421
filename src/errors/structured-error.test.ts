import { describe, expect, test } from "vitest";
import {
	type ErrorCategory,
	StructuredError,
	toError,
} from "./structured-error.ts";

describe("StructuredError", () => {
	test("creates error with all properties", () => {
		const error = new StructuredError(
			"Bad level",
			"VALIDATION",
			"BAD_LEVEL",
			true,
			{ level: "loud" },
		);

		expect(error).toBeInstanceOf(Error);
		expect(error.message).toBe("Bad level");
		expect(error.category).toBe("VALIDATION");
		expect(error.code).toBe("BAD_LEVEL");
		expect(error.recoverable).toBe(true);
		expect(error.context).toEqual({ level: "loud" });
		expect(error.name).toBe("StructuredError");
		expect(error.stack).toBeDefined();
	});

	test("defaults to an empty context and no cause", () => {
		const error = new StructuredError("Minimal", "INTERNAL", "MINIMAL", false);

		expect(error.context).toEqual({});
		expect(error.cause).toBeUndefined();
	});

	test("structured form carries metadata and cause, without the stack", () => {
		const cause = new Error("EACCES");
		const error = new StructuredError(
			"Sink unavailable",
			"CONFIGURATION",
			"SINK",
			false,
			{ path: "/var/log/app.log", at: new Date(Date.UTC(2024, 0, 2)) },
			cause,
		);

		expect(error.toStructured()).toEqual({
			name: "StructuredError",
			message: "Sink unavailable",
			category: "CONFIGURATION",
			code: "SINK",
			recoverable: false,
			context: { path: "/var/log/app.log", at: "2024-01-02T00:00:00.000Z" },
			cause: { name: "Error", message: "EACCES" },
		});
		expect(JSON.parse(JSON.stringify(error))).toEqual(error.toStructured());
	});

	test("supports all error categories", () => {
		const categories: ErrorCategory[] = [
			"CONFIGURATION",
			"VALIDATION",
			"INTERNAL",
			"UNKNOWN",
		];

		for (const category of categories) {
			expect(new StructuredError("c", category, "C", false).category).toBe(category);
		}
	});

	test("stack trace starts at the subclass constructor's caller", () => {
		class SinkError extends StructuredError {
			constructor() {
				super("Sink", "CONFIGURATION", "SINK", false);
				this.name = "SinkError";
			}
		}

		const error = new SinkError();

		expect(error).toBeInstanceOf(StructuredError);
		expect(error.name).toBe("SinkError");
		expect(error.stack?.split("\n")[1]).not.toContain("new SinkError");
	});
});

describe("toError", () => {
	test("keeps errors and wraps everything else", () => {
		const error = new Error("kept");
		expect(toError(error)).toBe(error);
		expect(toError("text").message).toBe("text");
		expect(toError(42).message).toBe("42");
	});
});
