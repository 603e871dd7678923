import type { APIRoute } from "astro";
import { jsonResponse } from "../lib/http";

export const prerender = false;

export const GET: APIRoute = ({ locals }) => {
	const { config } = locals.app;

	return jsonResponse({
		name: config.appName,
		version: config.appVersion,
		environment: config.environment,
		endpoints: {
			trending: "/api/trending",
			trending_by_language: "/api/trending/{language}",
			refresh: "POST /api/trending",
			supported_languages: "/api/trending/languages/supported",
			health: "/health",
		},
	});
};
