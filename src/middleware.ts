import { defineMiddleware } from "astro:middleware";
import { getAppContext } from "./lib/context";
import { errorResponse } from "./lib/http";
import {
	createRequestId,
	isPreflight,
	preflightResponse,
	withRequestHeaders,
} from "./lib/request";

/**
 * Attaches the shared app context to `locals`, answers CORS preflights, logs
 * every request under its own id, and acts as the error boundary: unhandled
 * errors become a JSON 500 instead of a raw stack.
 */
export const onRequest = defineMiddleware(async (context, next) => {
	const app = getAppContext();
	context.locals.app = app;

	const requestId = createRequestId();
	const logger = app.logger.child({ requestId });
	const start = performance.now();

	let response: Response;
	if (isPreflight(context.request)) {
		response = preflightResponse(context.request);
	} else {
		try {
			response = await next();
		} catch (error) {
			logger.error("unhandled_request_error", {
				method: context.request.method,
				path: context.url.pathname,
			})(error);
			response = errorResponse(500, "INTERNAL_ERROR", "Internal server error");
		}
	}

	const durationMs = Math.round(performance.now() - start);
	logger.info("request_completed", {
		method: context.request.method,
		path: context.url.pathname,
		status: response.status,
		durationMs,
	});

	return withRequestHeaders(response, { requestId, durationMs });
});
