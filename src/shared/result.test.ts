import { describe, expect, it } from "vitest";
import { TransportError } from "./errors.js";
import { err, isErr, isOk, ok, unwrap } from "./result.js";

describe("Result", () => {
	it("unwraps values and throws errors", () => {
		expect(unwrap(ok("plan-1"))).toBe("plan-1");
		const error = new TransportError("socket closed");
		expect(() => unwrap(err(error))).toThrow(error);
		expect(() => unwrap(err("plain"))).toThrow("plain");
	});

	it("narrows with the guards", () => {
		const r = ok(10);
		expect(isOk(r)).toBe(true);
		expect(isErr(r)).toBe(false);
		expect(isErr(err(new Error("boom")))).toBe(true);
	});
});
