import { type LogLevel, isLogLevel } from "./log";

export interface CrawlerConfig {
	/** Origin relative repo and avatar links are resolved against. */
	baseUrl: string;
	trendingUrl: string;
	requestTimeoutMs: number;
	/** Total attempts per page fetch, including the first. */
	maxAttempts: number;
	retryBaseDelayMs: number;
	minDelayMs: number;
	maxDelayMs: number;
}

export interface AppConfig {
	appName: string;
	appVersion: string;
	environment: string;
	logLevel: LogLevel;
	crawler: CrawlerConfig;
}

export const DEFAULT_CRAWLER_CONFIG: Readonly<CrawlerConfig> = Object.freeze({
	baseUrl: "https://github.com",
	trendingUrl: "https://github.com/trending",
	requestTimeoutMs: 30_000,
	maxAttempts: 3,
	retryBaseDelayMs: 5_000,
	minDelayMs: 3_000,
	maxDelayMs: 8_000,
});

/** Environment variables read by `loadConfig`. All optional. */
export interface ConfigEnv {
	APP_NAME?: string;
	APP_VERSION?: string;
	APP_ENV?: string;
	LOG_LEVEL?: string;
	GITHUB_BASE_URL?: string;
	GITHUB_TRENDING_URL?: string;
	REQUEST_TIMEOUT_MS?: string;
	MAX_RETRIES?: string;
	RETRY_BASE_DELAY_MS?: string;
	MIN_DELAY_MS?: string;
	MAX_DELAY_MS?: string;
	[key: string]: string | undefined;
}

/** Non-negative integer from an env string, or `fallback` when unset or unparseable. */
function readMs(raw: string | undefined, fallback: number): number {
	if (raw === undefined || raw.trim() === "") return fallback;
	const parsed = Number(raw);
	if (!Number.isFinite(parsed)) return fallback;
	return Math.max(0, Math.floor(parsed));
}

function readUrl(raw: string | undefined, fallback: string): string {
	const value = raw?.trim();
	if (!value) return fallback;
	try {
		return new URL(value).href.replace(/\/+$/, "");
	} catch {
		return fallback;
	}
}

/**
 * Build the app configuration from environment variables.
 * Missing or invalid values fall back to defaults rather than failing startup.
 * The result is frozen: create it once and pass it down.
 */
export function loadConfig(env: ConfigEnv): Readonly<AppConfig> {
	const defaults = DEFAULT_CRAWLER_CONFIG;

	let minDelayMs = readMs(env.MIN_DELAY_MS, defaults.minDelayMs);
	let maxDelayMs = readMs(env.MAX_DELAY_MS, defaults.maxDelayMs);
	if (minDelayMs > maxDelayMs) [minDelayMs, maxDelayMs] = [maxDelayMs, minDelayMs];

	const baseUrl = readUrl(env.GITHUB_BASE_URL, defaults.baseUrl);
	const logLevel = env.LOG_LEVEL?.trim().toLowerCase() ?? "";

	const crawler: CrawlerConfig = Object.freeze({
		baseUrl,
		trendingUrl: readUrl(env.GITHUB_TRENDING_URL, `${baseUrl}/trending`),
		requestTimeoutMs: readMs(env.REQUEST_TIMEOUT_MS, defaults.requestTimeoutMs) || defaults.requestTimeoutMs,
		maxAttempts: Math.max(1, readMs(env.MAX_RETRIES, defaults.maxAttempts)),
		retryBaseDelayMs: readMs(env.RETRY_BASE_DELAY_MS, defaults.retryBaseDelayMs),
		minDelayMs,
		maxDelayMs,
	});

	return Object.freeze({
		appName: env.APP_NAME?.trim() || "GitHub Trending API",
		appVersion: env.APP_VERSION?.trim() || "1.0.0",
		environment: env.APP_ENV?.trim() || "production",
		logLevel: isLogLevel(logLevel) ? logLevel : "info",
		crawler,
	});
}
