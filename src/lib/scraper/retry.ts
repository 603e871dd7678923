import { type Logger, silentLogger } from "../log";
import { type FetchError, RetryExhaustedError, toFetchError } from "./errors";
import { type CrawlPolicy, defaultPolicy } from "./policy";

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface AttemptFailure {
	/** 1-based attempt number that failed. */
	attempt: number;
	maxAttempts: number;
	error: FetchError;
	/** Backoff before the next attempt; null when no retry follows. */
	delayMs: number | null;
}

export interface RetryOptions {
	maxAttempts?: number;
	baseDelayMs: number;
	policy?: CrawlPolicy;
	logger?: Logger;
	onAttemptFailed?: (failure: AttemptFailure) => void;
}

/** Backoff before retry number `attemptIndex + 1`: base × 2^attemptIndex × jitter. */
export function backoffDelayMs(baseDelayMs: number, attemptIndex: number, jitter: number): number {
	return baseDelayMs * 2 ** attemptIndex * jitter;
}

/**
 * Runs `attempt` until it resolves or `maxAttempts` calls have failed.
 *
 * Flow:
 * 1. Call `attempt`; on success return its value.
 * 2. On failure before the last attempt, sleep for the jittered exponential backoff and loop.
 * 3. On failure at the last attempt, reject with RetryExhaustedError wrapping the latest error.
 */
export async function runWithRetry<T>(
	url: string,
	attempt: () => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
	const policy = options.policy ?? defaultPolicy;
	const logger = options.logger ?? silentLogger;

	for (let index = 0; ; index++) {
		try {
			return await attempt();
		} catch (thrown) {
			const error = toFetchError(thrown, url);
			const isLast = index >= maxAttempts - 1;
			const delayMs = isLast
				? null
				: Math.round(backoffDelayMs(options.baseDelayMs, index, policy.jitter()));

			options.onAttemptFailed?.({ attempt: index + 1, maxAttempts, error, delayMs });

			if (delayMs === null) {
				logger.error("fetch_retries_exhausted", {
					url,
					attempts: maxAttempts,
					errorKind: error.kind,
					status: error.status,
				})(error);
				throw new RetryExhaustedError(maxAttempts, error);
			}

			logger.warn("fetch_attempt_failed", {
				url,
				attempt: index + 1,
				maxAttempts,
				delayMs,
				errorKind: error.kind,
				status: error.status,
				error: error.message,
			});
			await policy.sleep(delayMs);
		}
	}
}

/** Retry-aware page fetch: wraps a single-shot fetcher with bounded backoff. */
export function fetchWithRetry(
	url: string,
	fetchOnce: (url: string) => Promise<string>,
	options: RetryOptions,
): Promise<string> {
	return runWithRetry(url, () => fetchOnce(url), options);
}
