import fs from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

const NODE_ENV = process.env.NODE_ENV;
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_JSON = process.env.LOG_JSON === "true";

const prettyEnabled = LOG_PRETTY || NODE_ENV === "development";
const jsonEnabled = LOG_JSON || !prettyEnabled;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const moduleFilter = (() => {
	const raw = process.env.LOG_MODULE;
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
})();

const minLevel = normalizeLevel(process.env.LOG_LEVEL);

const RECENT_LIMIT = 200;
const recent: BaseLogPayload[] = [];

/**
 * Where log lines go. `null` is the console; a path appends to that file,
 * which keeps a full-screen terminal free of log output.
 */
let logFile: string | null = process.env.LOG_FILE?.trim() || null;

export const setLogFile = (filePath: string | null): void => {
	logFile = filePath;
};

export const getLogFile = (): string | null => logFile;

/** Most recent entries at or above the configured level, oldest first. */
export const getRecentLogs = (limit = RECENT_LIMIT): BaseLogPayload[] =>
	recent.slice(Math.max(recent.length - limit, 0));

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

const writeLine = (line: string): void => {
	if (logFile) {
		fs.appendFileSync(logFile, `${line}\n`);
		return;
	}
	console.log(line);
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };

	recent.push(base);
	if (recent.length > RECENT_LIMIT) {
		recent.shift();
	}

	if (prettyEnabled && !logFile) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled || logFile) {
		try {
			writeLine(JSON.stringify(sanitize(base)));
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): Record<string, unknown> => {
	const seen = new WeakSet<object>();
	const clone: Record<string, unknown> = {};
	for (const [key, nested] of Object.entries(payload)) {
		clone[key] = sanitizeValue(nested, seen);
	}
	return clone;
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value instanceof Map) {
		return sanitizeValue(Object.fromEntries(value), seen);
	}
	if (value instanceof Set) {
		return sanitizeValue(Array.from(value), seen);
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);

	try {
		switch (event) {
			case "alert_triggered": {
				printAlertTriggered(rest);
				break;
			}
			case "render_stats": {
				printRenderStats(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const printAlertTriggered = (rest: Record<string, unknown>): void => {
	const { instrument, kind, threshold, value, ruleId } = rest;
	console.table([{ instrument, kind, threshold, value, ruleId }]);
};

const printRenderStats = (rest: Record<string, unknown>): void => {
	const { renders, skipped, skipRatio } = rest;
	const ratio =
		typeof skipRatio === "number" ? `${(skipRatio * 100).toFixed(1)}%` : "n/a";
	console.log(`renders=${String(renders)} skipped=${String(skipped)} skip=${ratio}`);
};
