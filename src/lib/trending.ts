export const TIME_RANGES = ["daily", "weekly", "monthly"] as const;

export type TimeRange = (typeof TIME_RANGES)[number];

export function isTimeRange(value: string): value is TimeRange {
	return TIME_RANGES.some((range) => range === value);
}

export const MIN_LIMIT = 1;
export const MAX_LIMIT = 100;
export const DEFAULT_LIMIT = 25;

/** A user shown in a repo's "Built by" avatars. */
export interface Contributor {
	login: string;
	avatarUrl: string;
}

/** One normalized trending repository, as extracted from a trending page. */
export interface TrendingRecord {
	owner: string;
	name: string;
	/** `owner/name` */
	fullName: string;
	url: string;
	description: string | null;
	language: string | null;
	languageColor: string | null;
	totalStars: number;
	totalForks: number;
	/** Value of the "N stars today" counter. */
	starsToday: number;
	/**
	 * New stars attributed to the listing's window. Read from the same
	 * "stars today" counter whatever range was requested.
	 */
	periodStars: number;
	avatarUrl: string | null;
	builtBy: Contributor[];
	/** ISO timestamp of extraction, not parsed from the page. */
	observedAt: string;
}

/** JSON shape of a record at the HTTP boundary. */
export interface TrendingRepositoryJson {
	name: string;
	owner: string;
	repo_name: string;
	url: string;
	description: string | null;
	stars: number;
	forks: number;
	language: string | null;
	language_color: string | null;
	stars_today: number;
	period_stars: number;
	avatar_url: string | null;
	built_by: { login: string; avatar_url: string }[];
	crawled_at: string;
}

export function toRepositoryJson(record: TrendingRecord): TrendingRepositoryJson {
	return {
		name: record.fullName,
		owner: record.owner,
		repo_name: record.name,
		url: record.url,
		description: record.description,
		stars: record.totalStars,
		forks: record.totalForks,
		language: record.language,
		language_color: record.languageColor,
		stars_today: record.starsToday,
		period_stars: record.periodStars,
		avatar_url: record.avatarUrl,
		built_by: record.builtBy.map((c) => ({ login: c.login, avatar_url: c.avatarUrl })),
		crawled_at: record.observedAt,
	};
}
