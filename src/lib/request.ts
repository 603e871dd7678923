/** Methods the API answers cross-origin. */
export const CORS_ALLOWED_METHODS = "GET, POST, OPTIONS";

/** How long browsers may cache a preflight answer, in seconds. */
export const CORS_MAX_AGE_SECONDS = 600;

/** Short id tying a response to its log lines. */
export function createRequestId(): string {
	return crypto.randomUUID().slice(0, 8);
}

/** A CORS preflight: `OPTIONS` carrying `Access-Control-Request-Method`. */
export function isPreflight(request: Request): boolean {
	return request.method === "OPTIONS" && request.headers.has("Access-Control-Request-Method");
}

/** Empty 204 answering a preflight. Any origin, and whatever headers were asked for. */
export function preflightResponse(request: Request): Response {
	return new Response(null, {
		status: 204,
		headers: {
			"Access-Control-Allow-Origin": "*",
			"Access-Control-Allow-Methods": CORS_ALLOWED_METHODS,
			"Access-Control-Allow-Headers": request.headers.get("Access-Control-Request-Headers") ?? "*",
			"Access-Control-Max-Age": String(CORS_MAX_AGE_SECONDS),
		},
	});
}

export interface ResponseMeta {
	requestId: string;
	durationMs: number;
}

/**
 * Copy of `response` with the CORS, request id and timing headers set.
 * Copying keeps this working on responses whose headers are immutable.
 */
export function withRequestHeaders(response: Response, meta: ResponseMeta): Response {
	const decorated = new Response(response.body, response);
	decorated.headers.set("Access-Control-Allow-Origin", "*");
	decorated.headers.set("Access-Control-Expose-Headers", "X-Request-ID, X-Process-Time");
	decorated.headers.set("X-Request-ID", meta.requestId);
	decorated.headers.set("X-Process-Time", String(meta.durationMs / 1000));
	return decorated;
}
