export type FetchErrorKind = "http_status" | "timeout" | "network";

/** A single failed page request. Transient: the orchestrator decides whether to retry. */
export class FetchError extends Error {
	readonly kind: FetchErrorKind;
	readonly url: string;
	readonly status?: number;

	constructor(
		kind: FetchErrorKind,
		url: string,
		message: string,
		options: { status?: number; cause?: unknown } = {},
	) {
		super(message, { cause: options.cause });
		this.name = "FetchError";
		this.kind = kind;
		this.url = url;
		this.status = options.status;
	}
}

/** Raised by `fetchWithRetry` once every attempt has failed. */
export class RetryExhaustedError extends Error {
	readonly attempts: number;
	readonly lastError: FetchError;

	constructor(attempts: number, lastError: FetchError) {
		super(`Giving up after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
		this.name = "RetryExhaustedError";
		this.attempts = attempts;
		this.lastError = lastError;
	}
}

export type CrawlErrorKind = "fetch_failed" | "invalid_request";

/** Failure surfaced to callers of the crawler facade. */
export class CrawlError extends Error {
	readonly kind: CrawlErrorKind;
	readonly detail: string | null;

	constructor(kind: CrawlErrorKind, message: string, detail: string | null = null) {
		super(message);
		this.name = "CrawlError";
		this.kind = kind;
		this.detail = detail;
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Normalizes anything thrown by a fetcher into a FetchError. */
export function toFetchError(error: unknown, url: string): FetchError {
	if (error instanceof FetchError) return error;
	return new FetchError("network", url, describeError(error), { cause: error });
}
