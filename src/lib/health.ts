import type { AppContext } from "./context";
import { jsonResponse } from "./http";

export interface HealthResponse {
	status: "healthy" | "unhealthy";
	timestamp: string;
	version: string;
	/** Seconds since the app context was created. */
	uptime: number;
	github_accessible: boolean;
	detail: string | null;
	latency_ms: number;
}

/**
 * Probe GitHub once (no retry) and report. Responds 503 when GitHub is unreachable
 * so load balancers can act on the status code alone.
 */
export async function healthResponse(app: AppContext): Promise<Response> {
	const probe = await app.crawler.probe();

	const body: HealthResponse = {
		status: probe.reachable ? "healthy" : "unhealthy",
		timestamp: new Date().toISOString(),
		version: app.config.appVersion,
		uptime: Math.round((Date.now() - app.startedAt) / 1000),
		github_accessible: probe.reachable,
		detail: probe.detail,
		latency_ms: probe.latencyMs,
	};

	if (!probe.reachable) {
		app.logger.warn("health_check_unhealthy", { detail: probe.detail });
	}

	return jsonResponse(body, probe.reachable ? 200 : 503, { "Cache-Control": "no-store" });
}
