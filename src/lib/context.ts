import { type AppConfig, type ConfigEnv, loadConfig } from "./config";
import { type TrendingCrawler, createTrendingCrawler } from "./crawler";
import { type Logger, createLogger } from "./log";

/** Process-wide services, created once at startup and handed to each request via `locals`. */
export interface AppContext {
	config: Readonly<AppConfig>;
	logger: Logger;
	crawler: TrendingCrawler;
	/** Epoch ms when the context was built; used for uptime. */
	startedAt: number;
}

export function createAppContext(env: ConfigEnv): AppContext {
	const config = loadConfig(env);
	const logger = createLogger({
		level: config.logLevel,
		base: { service: config.appName, version: config.appVersion },
	});
	const crawler = createTrendingCrawler(config.crawler, { logger });

	logger.info("app_context_ready", {
		environment: config.environment,
		trendingUrl: config.crawler.trendingUrl,
		maxAttempts: config.crawler.maxAttempts,
	});

	return { config, logger, crawler, startedAt: Date.now() };
}

let shared: AppContext | null = null;

/** Lazily builds the shared context from `process.env` on first use. */
export function getAppContext(): AppContext {
	shared ??= createAppContext(process.env);
	return shared;
}
