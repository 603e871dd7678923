import { describe, expect, it } from "vitest";
import { DEFAULT_CRAWLER_CONFIG, loadConfig } from "../src/lib/config";

describe("loadConfig", () => {
	it("uses defaults when nothing is set", () => {
		const config = loadConfig({});
		expect(config).toEqual({
			appName: "GitHub Trending API",
			appVersion: "1.0.0",
			environment: "production",
			logLevel: "info",
			crawler: {
				baseUrl: "https://github.com",
				trendingUrl: "https://github.com/trending",
				requestTimeoutMs: 30_000,
				maxAttempts: 3,
				retryBaseDelayMs: 5_000,
				minDelayMs: 3_000,
				maxDelayMs: 8_000,
			},
		});
	});

	it("reads overrides from the environment", () => {
		const config = loadConfig({
			GITHUB_BASE_URL: "https://github.example/",
			REQUEST_TIMEOUT_MS: "5000",
			MAX_RETRIES: "5",
			RETRY_BASE_DELAY_MS: "250",
			MIN_DELAY_MS: "100",
			MAX_DELAY_MS: "400",
			LOG_LEVEL: "DEBUG",
		});

		expect(config.logLevel).toBe("debug");
		expect(config.crawler).toEqual({
			baseUrl: "https://github.example",
			trendingUrl: "https://github.example/trending",
			requestTimeoutMs: 5_000,
			maxAttempts: 5,
			retryBaseDelayMs: 250,
			minDelayMs: 100,
			maxDelayMs: 400,
		});
	});

	it("falls back to defaults for unparseable values", () => {
		const config = loadConfig({
			MAX_RETRIES: "many",
			REQUEST_TIMEOUT_MS: "",
			GITHUB_TRENDING_URL: "not a url",
			LOG_LEVEL: "verbose",
		});

		expect(config.crawler.maxAttempts).toBe(DEFAULT_CRAWLER_CONFIG.maxAttempts);
		expect(config.crawler.requestTimeoutMs).toBe(DEFAULT_CRAWLER_CONFIG.requestTimeoutMs);
		expect(config.crawler.trendingUrl).toBe("https://github.com/trending");
		expect(config.logLevel).toBe("info");
	});

	it("clamps attempts to at least one and delays to non-negative", () => {
		const config = loadConfig({ MAX_RETRIES: "0", RETRY_BASE_DELAY_MS: "-20" });
		expect(config.crawler.maxAttempts).toBe(1);
		expect(config.crawler.retryBaseDelayMs).toBe(0);
	});

	it("swaps an inverted pacing interval", () => {
		const config = loadConfig({ MIN_DELAY_MS: "900", MAX_DELAY_MS: "300" });
		expect(config.crawler.minDelayMs).toBe(300);
		expect(config.crawler.maxDelayMs).toBe(900);
	});

	it("returns a frozen value", () => {
		const config = loadConfig({});
		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.crawler)).toBe(true);
	});
});
