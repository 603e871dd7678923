import type { APIRoute } from "astro";
import { jsonResponse } from "../../../../lib/http";

export const prerender = false;

export const GET: APIRoute = async ({ locals }) => {
	const languages = locals.app.crawler.supportedLanguages();
	locals.app.logger.debug("supported_languages", { count: languages.length });

	return jsonResponse(languages, 200, {
		"Cache-Control": "public, max-age=86400, s-maxage=86400",
	});
};
