import type { CrawlResult, TrendingQuery } from "./crawler";
import {
	DEFAULT_LIMIT,
	MAX_LIMIT,
	MIN_LIMIT,
	TIME_RANGES,
	type TimeRange,
	type TrendingRepositoryJson,
	isTimeRange,
	toRepositoryJson,
} from "./trending";

export function jsonResponse(
	body: unknown,
	status = 200,
	headers: Record<string, string> = {},
): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json", ...headers },
	});
}

export type ErrorCode =
	| "VALIDATION_ERROR"
	| "CRAWL_ERROR"
	| "LANGUAGE_ERROR"
	| "INTERNAL_ERROR";

export interface ErrorResponse {
	success: false;
	error: ErrorCode;
	message: string;
	detail: string | null;
	timestamp: string;
}

export function errorResponse(
	status: number,
	error: ErrorCode,
	message: string,
	detail: string | null = null,
): Response {
	const body: ErrorResponse = {
		success: false,
		error,
		message,
		detail,
		timestamp: new Date().toISOString(),
	};
	return jsonResponse(body, status, { "Cache-Control": "no-store" });
}

export interface TrendingResponse {
	success: true;
	repositories: TrendingRepositoryJson[];
	total_count: number;
	language: string | null;
	since: TimeRange;
	/** True when the upstream page had no recognizable trending list. */
	degraded: boolean;
	crawled_at: string;
}

/** Raw, unvalidated trending parameters from a query string, path or JSON body. */
export interface TrendingParamsInput {
	language?: unknown;
	since?: unknown;
	limit?: unknown;
}

export type ParamsResult = { ok: true; query: TrendingQuery } | { ok: false; message: string };

/**
 * Validate trending request parameters.
 * `since` defaults to "daily" and `limit` to 25; an empty language means "all languages".
 */
export function parseTrendingParams(input: TrendingParamsInput): ParamsResult {
	let language: string | null = null;
	if (input.language !== undefined && input.language !== null) {
		if (typeof input.language !== "string") {
			return { ok: false, message: "language must be a string." };
		}
		language = input.language.trim() || null;
	}

	let since: TimeRange = "daily";
	if (input.since !== undefined && input.since !== null && input.since !== "") {
		if (typeof input.since !== "string" || !isTimeRange(input.since)) {
			return {
				ok: false,
				message: `Invalid since value. Expected one of: ${TIME_RANGES.join(", ")}.`,
			};
		}
		since = input.since;
	}

	let limit = DEFAULT_LIMIT;
	if (input.limit !== undefined && input.limit !== null && input.limit !== "") {
		const parsed =
			typeof input.limit === "number"
				? input.limit
				: typeof input.limit === "string" && /^\s*\d+\s*$/.test(input.limit)
					? Number(input.limit)
					: Number.NaN;
		if (!Number.isInteger(parsed) || parsed < MIN_LIMIT || parsed > MAX_LIMIT) {
			return {
				ok: false,
				message: `Invalid limit. Expected an integer between ${MIN_LIMIT} and ${MAX_LIMIT}.`,
			};
		}
		limit = parsed;
	}

	return { ok: true, query: { language, since, limit } };
}

/** Same parameters read from URL search params. */
export function paramsFromSearch(search: URLSearchParams): TrendingParamsInput {
	return {
		language: search.get("language") ?? undefined,
		since: search.get("since") ?? undefined,
		limit: search.get("limit") ?? undefined,
	};
}

/** Maps a crawl result onto the HTTP envelope: 200 with records, 400 or 502 on failure. */
export function crawlResultResponse(query: TrendingQuery, result: CrawlResult): Response {
	if (!result.ok) {
		if (result.error.kind === "invalid_request") {
			return errorResponse(400, "VALIDATION_ERROR", result.error.message, result.error.detail);
		}
		return errorResponse(502, "CRAWL_ERROR", result.error.message, result.error.detail);
	}

	const body: TrendingResponse = {
		success: true,
		repositories: result.records.map(toRepositoryJson),
		total_count: result.records.length,
		language: query.language ?? null,
		since: query.since,
		degraded: result.degraded,
		crawled_at: new Date().toISOString(),
	};
	return jsonResponse(body, 200, { "Cache-Control": "no-store" });
}
