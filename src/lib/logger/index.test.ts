import { describe, expect, it } from "vitest";
import { createLogger, silentLogger } from "./index.js";

function capture(): { lines: () => Record<string, unknown>[]; write(msg: string): void } {
	const chunks: string[] = [];
	return {
		write(msg: string) {
			chunks.push(msg);
		},
		lines: () =>
			chunks
				.join("")
				.split("\n")
				.filter((l) => l.length > 0)
				.map((l): Record<string, unknown> => JSON.parse(l)),
	};
}

describe("createLogger", () => {
	it("writes structured lines with message and fields", () => {
		const sink = capture();
		const logger = createLogger({ level: "info", destination: sink });
		logger.warn({ side: "bid", index: 3 }, "level dropped");

		const [line] = sink.lines();
		expect(line?.["msg"]).toBe("level dropped");
		expect(line?.["side"]).toBe("bid");
		expect(line?.["index"]).toBe(3);
		expect(line?.["level"]).toBe(40);
	});

	it("filters below the configured level", () => {
		const sink = capture();
		const logger = createLogger({ level: "warn", destination: sink });
		logger.info("hidden");
		logger.debug({ a: 1 }, "hidden too");
		logger.error("shown");
		expect(sink.lines().map((l) => l["msg"])).toEqual(["shown"]);
	});

	it("carries child bindings", () => {
		const sink = capture();
		const logger = createLogger({ level: "info", destination: sink, base: { service: "ladderbot" } });
		logger.child({ account: "acct-1" }).child({ symbol: "BTC-PERP" }).info("started");

		const [line] = sink.lines();
		expect(line?.["service"]).toBe("ladderbot");
		expect(line?.["account"]).toBe("acct-1");
		expect(line?.["symbol"]).toBe("BTC-PERP");
	});

	it("redacts opaque credentials", () => {
		const sink = capture();
		const logger = createLogger({ level: "info", destination: sink });
		logger.info({ credentials: { __opaque: true, key: "test-secret" } }, "adapter ready");

		const [line] = sink.lines();
		expect(line?.["credentials"]).toBe("[REDACTED]");
		expect(JSON.stringify(line)).not.toContain("test-secret");
	});

	it("censors configured paths", () => {
		const sink = capture();
		const logger = createLogger({ level: "info", redactPaths: ["token"], destination: sink });
		logger.info({ token: "test-token", venue: "paper" }, "connect");

		const [line] = sink.lines();
		expect(line?.["token"]).toBe("[REDACTED]");
		expect(line?.["venue"]).toBe("paper");
	});

	it("silentLogger writes nothing and still supports children", () => {
		const logger = silentLogger();
		expect(() => logger.child({ a: 1 }).error("nothing")).not.toThrow();
	});
});
