import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createLogger, isLogLevel, silentLogger } from "../src/lib/log";

describe("createLogger", () => {
	const spies = {
		log: vi.spyOn(console, "log"),
		warn: vi.spyOn(console, "warn"),
		error: vi.spyOn(console, "error"),
	};

	beforeEach(() => {
		spies.log.mockImplementation(() => {});
		spies.warn.mockImplementation(() => {});
		spies.error.mockImplementation(() => {});
	});

	afterEach(() => {
		vi.clearAllMocks();
	});

	afterAll(() => {
		vi.restoreAllMocks();
	});

	function lastLine(spy: typeof spies.log) {
		return JSON.parse(String(spy.mock.calls[spy.mock.calls.length - 1][0]));
	}

	it("writes one JSON line with level, event and timestamp", () => {
		createLogger().info("crawl_start", { url: "https://github.test" });

		const line = lastLine(spies.log);
		expect(line).toMatchObject({ level: "info", event: "crawl_start", url: "https://github.test" });
		expect(Number.isNaN(Date.parse(line.timestamp))).toBe(false);
	});

	it("merges base fields into every line", () => {
		createLogger({ base: { service: "svc" } }).warn("trending_structure_not_found");
		expect(lastLine(spies.warn)).toMatchObject({ service: "svc", level: "warn" });
	});

	it("returns an error sink that records the error message", () => {
		createLogger().error("crawl_failure", { url: "u" })(new Error("boom"));
		expect(lastLine(spies.error)).toMatchObject({
			level: "error",
			event: "crawl_failure",
			url: "u",
			error: "boom",
		});
	});

	it("stringifies non-Error values passed to the error sink", () => {
		createLogger().error("odd_failure")("plain string");
		expect(lastLine(spies.error).error).toBe("plain string");
	});

	it("drops lines below the configured level", () => {
		const logger = createLogger({ level: "warn" });
		logger.debug("a");
		logger.info("b");
		logger.warn("c");

		expect(spies.log).not.toHaveBeenCalled();
		expect(spies.warn).toHaveBeenCalledTimes(1);
	});

	it("emits debug lines when enabled", () => {
		createLogger({ level: "debug" }).debug("fetch_pacing_delay", { delayMs: 10 });
		expect(lastLine(spies.log)).toMatchObject({ level: "debug", delayMs: 10 });
	});

	it("child loggers add their fields to every line, error lines included", () => {
		const parent = createLogger({ base: { service: "svc" } });
		const child = parent.child({ requestId: "abcd1234" });

		child.info("request_completed", { status: 200 });
		expect(lastLine(spies.log)).toMatchObject({
			service: "svc",
			requestId: "abcd1234",
			event: "request_completed",
			status: 200,
		});

		child.error("unhandled_request_error")(new Error("boom"));
		expect(lastLine(spies.error)).toMatchObject({ requestId: "abcd1234", error: "boom" });

		parent.info("app_context_ready");
		expect(lastLine(spies.log).requestId).toBeUndefined();
	});

	it("child loggers keep the parent's level", () => {
		createLogger({ level: "warn" }).child({ requestId: "r" }).info("dropped");
		expect(spies.log).not.toHaveBeenCalled();
	});

	it("silentLogger writes nothing", () => {
		silentLogger.info("x");
		silentLogger.error("y")(new Error("z"));
		silentLogger.child({ requestId: "r" }).info("x");
		expect(spies.log).not.toHaveBeenCalled();
		expect(spies.error).not.toHaveBeenCalled();
	});
});

describe("isLogLevel", () => {
	it("accepts known levels only", () => {
		expect(isLogLevel("warn")).toBe(true);
		expect(isLogLevel("verbose")).toBe(false);
	});
});
