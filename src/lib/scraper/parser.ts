import { type HTMLElement, parse } from "node-html-parser";
import type { Contributor, TrendingRecord } from "../trending";
import { describeError } from "./errors";
import { parseFormattedNumber } from "./numbers";

export interface ParseOptions {
	/** Base address relative links are resolved against. */
	baseUrl: string;
	/** Extraction time stamped on every record. */
	now?: Date;
}

/** An article that could not be turned into a record. */
export interface SkippedEntry {
	/** Position of the article in the page (0-based). */
	index: number;
	reason: string;
}

export interface ParseOutcome {
	records: TrendingRecord[];
	/**
	 * False when no `article.Box-row` was found at all: the page loaded but its
	 * markup no longer looks like a trending list.
	 */
	structureFound: boolean;
	skipped: SkippedEntry[];
}

type ArticleResult = { ok: true; record: TrendingRecord } | { ok: false; reason: string };

/**
 * Parses a GitHub trending page into records, in page order.
 * Articles that fail extraction are reported in `skipped`; the rest are still returned.
 */
export function parseTrendingPage(html: string, options: ParseOptions): ParseOutcome {
	const root = parse(html);
	const articles = root.querySelectorAll("article.Box-row");

	if (articles.length === 0) {
		return { records: [], structureFound: false, skipped: [] };
	}

	const observedAt = (options.now ?? new Date()).toISOString();
	const records: TrendingRecord[] = [];
	const skipped: SkippedEntry[] = [];

	articles.forEach((article, index) => {
		let result: ArticleResult;
		try {
			result = parseArticle(article, options.baseUrl, observedAt);
		} catch (error) {
			result = { ok: false, reason: describeError(error) };
		}

		if (result.ok) {
			records.push(result.record);
		} else {
			skipped.push({ index, reason: result.reason });
		}
	});

	return { records, structureFound: true, skipped };
}

function parseArticle(article: HTMLElement, baseUrl: string, observedAt: string): ArticleResult {
	const identity = parseIdentity(article, baseUrl);
	if (!identity.ok) return identity;

	const { language, languageColor } = parseLanguage(article);
	const { stars, forks } = parseCounters(article, baseUrl);
	const starsToday = parseStarsToday(article);

	return {
		ok: true,
		record: {
			owner: identity.owner,
			name: identity.name,
			fullName: `${identity.owner}/${identity.name}`,
			url: identity.url,
			description: parseDescription(article),
			language,
			languageColor,
			totalStars: stars,
			totalForks: forks,
			starsToday,
			periodStars: starsToday,
			avatarUrl: parseAvatarUrl(article, baseUrl),
			builtBy: parseBuiltBy(article, baseUrl),
			observedAt,
		},
	};
}

type IdentityResult =
	| { ok: true; owner: string; name: string; url: string }
	| { ok: false; reason: string };

/**
 * Reads owner and name from the heading link. The href has the format
 * "/owner/name"; anything that doesn't split into exactly two segments, or
 * points off the base host, is rejected.
 */
function parseIdentity(article: HTMLElement, baseUrl: string): IdentityResult {
	const link = article.querySelector("h2 a") ?? article.querySelector("h1 a");
	if (!link) return { ok: false, reason: "missing heading link" };

	const href = link.getAttribute("href")?.trim();
	if (!href) return { ok: false, reason: "heading link has no href" };

	const url = resolveUrl(href, baseUrl);
	if (!url) return { ok: false, reason: `unresolvable href: ${href}` };
	if (url.origin !== resolveUrl("/", baseUrl)?.origin) {
		return { ok: false, reason: `href points outside ${baseUrl}: ${href}` };
	}

	const parts = pathSegments(url);
	if (parts.length !== 2 || !parts[0] || !parts[1]) {
		return { ok: false, reason: `href is not an owner/name path: ${href}` };
	}

	return { ok: true, owner: parts[0], name: parts[1], url: url.href };
}

function parseDescription(article: HTMLElement): string | null {
	const desc = article.querySelector("p.col-9");
	if (!desc) return null;
	const text = desc.text.replace(/\s+/g, " ").trim();
	return text || null;
}

const COLOR_RE = /background-color:\s*([^;]+)/i;

/**
 * Language name plus the color of the dot drawn beside it, which shares the
 * tag's wrapper. Both null without a named language.
 */
function parseLanguage(article: HTMLElement): {
	language: string | null;
	languageColor: string | null;
} {
	const lang = article.querySelector('[itemprop="programmingLanguage"]');
	const language = lang?.text.trim();
	if (!lang || !language) return { language: null, languageColor: null };

	const dot = lang.parentNode?.querySelector("span.repo-language-color");
	const match = dot?.getAttribute("style")?.match(COLOR_RE);
	const languageColor = match?.[1]?.trim() || null;

	return { language, languageColor };
}

/** Total stars and forks, from the "/owner/name/stargazers" and "/owner/name/forks" links. */
function parseCounters(article: HTMLElement, baseUrl: string): { stars: number; forks: number } {
	let stars: number | null = null;
	let forks: number | null = null;

	for (const link of article.querySelectorAll("a[href]")) {
		const url = resolveUrl(link.getAttribute("href") ?? "", baseUrl);
		if (!url) continue;
		const parts = pathSegments(url);
		if (parts.length !== 3) continue;

		if (stars === null && parts[2] === "stargazers") {
			stars = parseFormattedNumber(link.text);
		} else if (forks === null && parts[2] === "forks") {
			forks = parseFormattedNumber(link.text);
		}
	}

	return { stars: stars ?? 0, forks: forks ?? 0 };
}

const STARS_TODAY_RE = /([\d.,]+\s*[km]?)\s+stars?\s+today/i;

/** Extracts the "N stars today" count from the float-right span. */
function parseStarsToday(article: HTMLElement): number {
	const span = article.querySelector("span.float-sm-right");
	if (!span) return 0;
	const match = span.text.replace(/\s+/g, " ").match(STARS_TODAY_RE);
	if (!match?.[1]) return 0;
	return parseFormattedNumber(match[1].replace(/\s+/g, ""));
}

function parseAvatarUrl(article: HTMLElement, baseUrl: string): string | null {
	const img = article.querySelector("img.avatar");
	const src = img?.getAttribute("src")?.trim();
	if (!src) return null;
	return resolveUrl(src, baseUrl)?.href ?? null;
}

/** Contributors linked from the "Built by" avatars, without duplicates. */
function parseBuiltBy(article: HTMLElement, baseUrl: string): Contributor[] {
	const seen = new Set<string>();
	const contributors: Contributor[] = [];

	for (const img of article.querySelectorAll("a img.avatar")) {
		const login = img.getAttribute("alt")?.trim().replace(/^@/, "");
		const src = img.getAttribute("src")?.trim();
		if (!login || !src || seen.has(login)) continue;

		const avatarUrl = resolveUrl(src, baseUrl)?.href;
		if (!avatarUrl) continue;

		seen.add(login);
		contributors.push({ login, avatarUrl });
	}

	return contributors;
}

function pathSegments(url: URL): string[] {
	return url.pathname.replace(/^\/+|\/+$/g, "").split("/");
}

function resolveUrl(href: string, baseUrl: string): URL | null {
	try {
		return new URL(href, baseUrl);
	} catch {
		return null;
	}
}
