import type { APIRoute } from "astro";
import {
	crawlResultResponse,
	errorResponse,
	paramsFromSearch,
	parseTrendingParams,
} from "../../../lib/http";

export const prerender = false;

export const GET: APIRoute = async ({ url, locals }) => {
	const params = parseTrendingParams(paramsFromSearch(url.searchParams));
	if (!params.ok) {
		return errorResponse(400, "VALIDATION_ERROR", params.message);
	}

	const result = await locals.app.crawler.fetch(params.query);
	return crawlResultResponse(params.query, result);
};

/** Manual refresh: same as GET, with the parameters in a JSON body. */
export const POST: APIRoute = async ({ request, locals }) => {
	let body: unknown;
	try {
		body = await request.json();
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return errorResponse(400, "VALIDATION_ERROR", "Request body must be valid JSON.", message);
	}

	if (typeof body !== "object" || body === null || Array.isArray(body)) {
		return errorResponse(400, "VALIDATION_ERROR", "Request body must be a JSON object.");
	}

	const params = parseTrendingParams({
		language: "language" in body ? body.language : undefined,
		since: "since" in body ? body.since : undefined,
		limit: "limit" in body ? body.limit : undefined,
	});
	if (!params.ok) {
		return errorResponse(400, "VALIDATION_ERROR", params.message);
	}

	locals.app.logger.info("trending_refresh_requested", {
		language: params.query.language ?? null,
		since: params.query.since,
		limit: params.query.limit,
	});

	const result = await locals.app.crawler.fetch(params.query);
	return crawlResultResponse(params.query, result);
};
