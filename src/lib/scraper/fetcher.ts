import { type Logger, silentLogger } from "../log";
import { FetchError, describeError } from "./errors";
import { type CrawlPolicy, defaultPolicy } from "./policy";

export const USER_AGENTS: readonly string[] = [
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
	"Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
	"Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0",
	"Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36",
];

const BROWSER_HEADERS: Readonly<Record<string, string>> = {
	Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
	"Accept-Language": "en-US,en;q=0.9",
	"Accept-Encoding": "gzip, deflate, br",
	Connection: "keep-alive",
	"Upgrade-Insecure-Requests": "1",
	"Sec-Fetch-Dest": "document",
	"Sec-Fetch-Mode": "navigate",
	"Sec-Fetch-Site": "none",
	"Cache-Control": "max-age=0",
};

export interface RequestOptions {
	timeoutMs: number;
	userAgents?: readonly string[];
	policy?: CrawlPolicy;
	fetchImpl?: typeof fetch;
	logger?: Logger;
}

export interface FetchPageOptions extends RequestOptions {
	minDelayMs: number;
	maxDelayMs: number;
}

export function buildRequestHeaders(userAgent: string): Record<string, string> {
	return { ...BROWSER_HEADERS, "User-Agent": userAgent };
}

/**
 * Runs one GET with a random user agent and browser-like headers, then hands
 * the response to `consume` while the timeout is still armed.
 * Transport failures and timeouts become FetchErrors; status handling is left to `consume`.
 */
async function request<T>(
	url: string,
	options: RequestOptions,
	consume: (response: Response) => Promise<T>,
): Promise<T> {
	const policy = options.policy ?? defaultPolicy;
	const fetchImpl = options.fetchImpl ?? fetch;
	const userAgent = policy.pickUserAgent(options.userAgents ?? USER_AGENTS);

	const controller = new AbortController();
	const timeout = setTimeout(() => controller.abort(), options.timeoutMs);

	try {
		const response = await fetchImpl(url, {
			signal: controller.signal,
			headers: buildRequestHeaders(userAgent),
		});
		return await consume(response);
	} catch (error) {
		if (error instanceof FetchError) throw error;
		if (error instanceof DOMException && error.name === "AbortError") {
			throw new FetchError(
				"timeout",
				url,
				`Request to ${url} timed out after ${options.timeoutMs / 1000} seconds`,
				{ cause: error },
			);
		}
		throw new FetchError("network", url, `Request to ${url} failed: ${describeError(error)}`, {
			cause: error,
		});
	} finally {
		clearTimeout(timeout);
	}
}

/**
 * Fetches a page's HTML after a randomized pacing delay.
 * Rejects with a FetchError on any non-200 response, timeout or transport failure.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<string> {
	const policy = options.policy ?? defaultPolicy;
	const logger = options.logger ?? silentLogger;

	const delayMs = Math.round(policy.pacingDelayMs(options.minDelayMs, options.maxDelayMs));
	logger.debug("fetch_pacing_delay", { url, delayMs });
	await policy.sleep(delayMs);

	return request(url, options, async (response) => {
		if (response.status !== 200) {
			throw new FetchError(
				"http_status",
				url,
				`HTTP ${response.status} ${response.statusText}`.trim(),
				{ status: response.status },
			);
		}
		const html = await response.text();
		logger.debug("fetch_page_ok", { url, bytes: html.length });
		return html;
	});
}

export interface ProbeResponse {
	status: number;
	latencyMs: number;
}

/**
 * Single unpaced GET used for connectivity checks. The body is discarded.
 * Rejects with a FetchError only on timeout or transport failure.
 */
export async function probeUrl(url: string, options: RequestOptions): Promise<ProbeResponse> {
	const start = Date.now();
	return request(url, options, async (response) => {
		await response.body?.cancel();
		return { status: response.status, latencyMs: Date.now() - start };
	});
}
