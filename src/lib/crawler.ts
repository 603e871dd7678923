import type { CrawlerConfig } from "./config";
import { SUPPORTED_LANGUAGES } from "./languages";
import { type Logger, silentLogger } from "./log";
import { CrawlError, RetryExhaustedError, describeError } from "./scraper/errors";
import { USER_AGENTS, fetchPage, probeUrl } from "./scraper/fetcher";
import { type SkippedEntry, parseTrendingPage } from "./scraper/parser";
import { type CrawlPolicy, defaultPolicy } from "./scraper/policy";
import { type AttemptFailure, fetchWithRetry } from "./scraper/retry";
import {
	MAX_LIMIT,
	MIN_LIMIT,
	TIME_RANGES,
	type TimeRange,
	type TrendingRecord,
	isTimeRange,
} from "./trending";

export interface TrendingQuery {
	language?: string | null;
	since: TimeRange;
	limit: number;
}

export type CrawlResult =
	| {
			ok: true;
			url: string;
			records: TrendingRecord[];
			/** True when the page loaded but no trending list was recognized in it. */
			degraded: boolean;
			skipped: SkippedEntry[];
	  }
	| { ok: false; url: string | null; error: CrawlError };

export interface ProbeResult {
	reachable: boolean;
	detail: string | null;
	status?: number;
	latencyMs: number;
}

export interface TrendingCrawler {
	fetch(query: TrendingQuery): Promise<CrawlResult>;
	probe(): Promise<ProbeResult>;
	supportedLanguages(): string[];
}

export interface CrawlerDeps {
	logger?: Logger;
	policy?: CrawlPolicy;
	fetchImpl?: typeof fetch;
	userAgents?: readonly string[];
	now?: () => Date;
	onAttemptFailed?: (failure: AttemptFailure) => void;
}

/**
 * Trending page address for a language filter and range, e.g.
 * `https://github.com/trending/go?since=weekly`.
 */
export function buildTrendingUrl(
	trendingUrl: string,
	language: string | null | undefined,
	since: TimeRange,
): string {
	let url = trendingUrl.replace(/\/+$/, "");
	const slug = language?.trim().toLowerCase().replace(/\s+/g, "-");
	if (slug) {
		url = `${url}/${encodeURIComponent(slug)}`;
	}
	return `${url}?since=${since}`;
}

function validateQuery(query: TrendingQuery): CrawlError | null {
	if (!isTimeRange(query.since)) {
		return new CrawlError(
			"invalid_request",
			`Invalid time range "${query.since}". Expected one of: ${TIME_RANGES.join(", ")}.`,
		);
	}
	if (!Number.isInteger(query.limit) || query.limit < MIN_LIMIT || query.limit > MAX_LIMIT) {
		return new CrawlError(
			"invalid_request",
			`Invalid limit ${query.limit}. Expected an integer between ${MIN_LIMIT} and ${MAX_LIMIT}.`,
		);
	}
	return null;
}

/**
 * Composes URL building, retrying fetch and extraction into one call per request.
 * The config is read, never mutated; calls share no other state.
 */
export function createTrendingCrawler(
	config: Readonly<CrawlerConfig>,
	deps: CrawlerDeps = {},
): TrendingCrawler {
	const logger = deps.logger ?? silentLogger;
	const policy = deps.policy ?? defaultPolicy;
	const userAgents = deps.userAgents ?? USER_AGENTS;
	const now = deps.now ?? (() => new Date());

	const requestOptions = {
		timeoutMs: config.requestTimeoutMs,
		userAgents,
		policy,
		fetchImpl: deps.fetchImpl,
		logger,
	};

	async function fetchTrending(query: TrendingQuery): Promise<CrawlResult> {
		const invalid = validateQuery(query);
		if (invalid) return { ok: false, url: null, error: invalid };

		const url = buildTrendingUrl(config.trendingUrl, query.language, query.since);
		const start = Date.now();
		logger.info("crawl_start", { url, language: query.language ?? null, since: query.since });

		let html: string;
		try {
			html = await fetchWithRetry(
				url,
				(target) =>
					fetchPage(target, {
						...requestOptions,
						minDelayMs: config.minDelayMs,
						maxDelayMs: config.maxDelayMs,
					}),
				{
					maxAttempts: config.maxAttempts,
					baseDelayMs: config.retryBaseDelayMs,
					policy,
					logger,
					onAttemptFailed: deps.onAttemptFailed,
				},
			);
		} catch (error) {
			const detail =
				error instanceof RetryExhaustedError ? error.lastError.message : describeError(error);
			logger.error("crawl_failure", { url, durationMs: Date.now() - start })(error);
			return {
				ok: false,
				url,
				error: new CrawlError("fetch_failed", "Failed to fetch trending data", detail),
			};
		}

		const outcome = parseTrendingPage(html, { baseUrl: config.baseUrl, now: now() });

		if (!outcome.structureFound) {
			logger.warn("trending_structure_not_found", {
				url,
				bytes: html.length,
				reason: "no repository rows found; the page structure may have changed",
			});
		}

		for (const entry of outcome.skipped) {
			logger.warn("trending_entry_skipped", { url, index: entry.index, reason: entry.reason });
		}

		const records =
			outcome.records.length > query.limit
				? outcome.records.slice(0, query.limit)
				: outcome.records;

		logger.info("crawl_success", {
			url,
			parsed: outcome.records.length,
			returned: records.length,
			skipped: outcome.skipped.length,
			durationMs: Date.now() - start,
		});

		return {
			ok: true,
			url,
			records,
			degraded: !outcome.structureFound,
			skipped: outcome.skipped,
		};
	}

	async function probe(): Promise<ProbeResult> {
		const start = Date.now();
		try {
			const { status, latencyMs } = await probeUrl(config.baseUrl, requestOptions);
			const reachable = status === 200;
			return {
				reachable,
				detail: reachable ? null : `HTTP ${status}`,
				status,
				latencyMs,
			};
		} catch (error) {
			logger.warn("probe_failed", { url: config.baseUrl, error: describeError(error) });
			return { reachable: false, detail: describeError(error), latencyMs: Date.now() - start };
		}
	}

	return {
		fetch: fetchTrending,
		probe,
		supportedLanguages: () => [...SUPPORTED_LANGUAGES],
	};
}
