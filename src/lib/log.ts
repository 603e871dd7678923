export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

export const LOG_LEVELS: readonly string[] = Object.keys(LEVEL_ORDER);

export function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.includes(value);
}

/**
 * Structured JSON logger. Each call writes one line:
 * `{ ...extra, level, event, timestamp }`.
 *
 * `error` is curried so it can be handed straight to `.catch()`.
 */
export interface Logger {
	debug(event: string, extra?: Record<string, unknown>): void;
	info(event: string, extra?: Record<string, unknown>): void;
	warn(event: string, extra?: Record<string, unknown>): void;
	error(event: string, extra?: Record<string, unknown>): (error: unknown) => void;
	/** Logger writing the same way, with `fields` added to every line. */
	child(fields: Record<string, unknown>): Logger;
}

export interface LoggerOptions {
	level?: LogLevel;
	/** Fields merged into every line (e.g. service name). */
	base?: Record<string, unknown>;
}

export function createLogger(options: LoggerOptions = {}): Logger {
	const threshold = LEVEL_ORDER[options.level ?? "info"];
	const base = options.base ?? {};

	const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

	const line = (level: LogLevel, event: string, extra?: Record<string, unknown>) =>
		JSON.stringify({
			...base,
			...extra,
			level,
			event,
			timestamp: new Date().toISOString(),
		});

	return {
		debug(event, extra) {
			if (enabled("debug")) console.log(line("debug", event, extra));
		},
		info(event, extra) {
			if (enabled("info")) console.log(line("info", event, extra));
		},
		/** Operational events that need attention but aren't exceptions. */
		warn(event, extra) {
			if (enabled("warn")) console.warn(line("warn", event, extra));
		},
		error(event, extra) {
			return (error: unknown) => {
				if (!enabled("error")) return;
				const message = error instanceof Error ? error.message : String(error);
				console.error(
					JSON.stringify({
						...base,
						...extra,
						level: "error",
						event,
						timestamp: new Date().toISOString(),
						error: message,
					}),
				);
			};
		},
		child(fields) {
			return createLogger({ level: options.level, base: { ...base, ...fields } });
		},
	};
}

const noop = () => {};

/** Logger that drops everything. */
export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: () => noop,
	child: () => silentLogger,
};
