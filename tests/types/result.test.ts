import { describe, expect, test } from "vitest";
import { err, ok, unwrap, unwrapErr } from "../../src/types/result.ts";

describe("Result", () => {
	test("ok carries data", () => {
		const result = ok(42);
		expect(result.ok).toBe(true);
		expect(unwrap(result)).toBe(42);
	});

	test("err carries the error", () => {
		const failure = new Error("boom");
		const result = err(failure);
		expect(result.ok).toBe(false);
		expect(unwrapErr(result)).toBe(failure);
		expect(() => unwrap(result)).toThrow("boom");
	});

	test("unwrapErr throws on success", () => {
		expect(() => unwrapErr(ok("fine"))).toThrow("unwrapErr");
	});
});
