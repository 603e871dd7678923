const UNIT_MULTIPLIERS: Record<string, number> = {
	k: 1_000,
	m: 1_000_000,
};

const NUMERIC_RE = /^\d+(?:\.\d+)?$|^\.\d+$/;

/**
 * Parses a formatted counter string into an integer.
 * Handles formats like "1,234", "51,595", "2.3k", "1.5M", plain "123".
 *
 * Fractions are truncated, not rounded ("2.3k" → 2300, "1.9" → 1).
 * Anything unparseable yields 0.
 */
export function parseFormattedNumber(raw: string): number {
	let text = raw.trim().replace(/,/g, "").toLowerCase();
	if (!text) return 0;

	let multiplier = 1;
	const unit = UNIT_MULTIPLIERS[text.slice(-1)];
	if (unit !== undefined) {
		multiplier = unit;
		text = text.slice(0, -1).trim();
	}

	if (!NUMERIC_RE.test(text)) return 0;

	// Scale on the decimal digits so "2.3k" doesn't become 2299 through float error.
	const [whole, fraction = ""] = text.split(".");
	const scale = String(multiplier).length - 1;
	const digits = `${whole}${fraction.padEnd(scale, "0").slice(0, scale)}`;
	const parsed = Number.parseInt(digits || "0", 10);
	return Number.isFinite(parsed) ? parsed : 0;
}
