/**
 * Source of every random or time-based decision the scraper makes.
 * Swap in a deterministic policy for tests.
 */
export interface CrawlPolicy {
	/** Pre-request pacing delay in ms, within [minMs, maxMs]. */
	pacingDelayMs(minMs: number, maxMs: number): number;
	pickUserAgent(pool: readonly string[]): string;
	/** Backoff multiplier, within [0.5, 1.5]. */
	jitter(): number;
	sleep(ms: number): Promise<void>;
}

export const JITTER_MIN = 0.5;
export const JITTER_MAX = 1.5;

export function sleep(ms: number): Promise<void> {
	if (ms <= 0) return Promise.resolve();
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export const defaultPolicy: CrawlPolicy = {
	pacingDelayMs(minMs, maxMs) {
		return minMs + Math.random() * (maxMs - minMs);
	},
	pickUserAgent(pool) {
		const index = Math.floor(Math.random() * pool.length);
		return pool[Math.min(index, pool.length - 1)] ?? "";
	},
	jitter() {
		return JITTER_MIN + Math.random() * (JITTER_MAX - JITTER_MIN);
	},
	sleep,
};
