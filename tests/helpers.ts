import { vi } from "vitest";
import type { CrawlerConfig } from "../src/lib/config";
import type { CrawlPolicy } from "../src/lib/scraper/policy";

/** Deterministic policy: no real waiting, fixed delay, jitter and user agent choice. */
export function fixedPolicy(
	options: { pacingMs?: number; jitter?: number | (() => number); userAgentIndex?: number } = {},
) {
	const jitter = options.jitter ?? 1;
	const policy = {
		pacingDelayMs: vi.fn((_min: number, _max: number) => options.pacingMs ?? 0),
		pickUserAgent: vi.fn((pool: readonly string[]) => pool[options.userAgentIndex ?? 0] ?? ""),
		jitter: vi.fn(() => (typeof jitter === "function" ? jitter() : jitter)),
		sleep: vi.fn(async (_ms: number) => {}),
	} satisfies CrawlPolicy;
	return policy;
}

export const TEST_CRAWLER_CONFIG: CrawlerConfig = {
	baseUrl: "https://github.test",
	trendingUrl: "https://github.test/trending",
	requestTimeoutMs: 1_000,
	maxAttempts: 3,
	retryBaseDelayMs: 100,
	minDelayMs: 10,
	maxDelayMs: 20,
};

export function htmlResponse(body: string, status = 200): Response {
	return new Response(body, { status, headers: { "Content-Type": "text/html" } });
}

/** A trending page with `count` well-formed entries named owner-N/repo-N. */
export function buildTrendingHtml(count: number): string {
	const rows = Array.from(
		{ length: count },
		(_, i) => `
		<article class="Box-row">
			<h2 class="h3 lh-condensed"><a href="/owner-${i + 1}/repo-${i + 1}">owner-${i + 1} / repo-${i + 1}</a></h2>
			<a href="/owner-${i + 1}/repo-${i + 1}/stargazers" class="Link--muted">${(i + 1) * 100}</a>
			<span class="d-inline-block float-sm-right">${i + 1} stars today</span>
		</article>`,
	);
	return `<html><body><div class="Box">${rows.join("")}</div></body></html>`;
}
