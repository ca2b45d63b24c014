import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";

import { ConfigError, errorMessage } from "./errors";
import { isInstrumentId } from "./instrument";
import { timeframeToMs } from "./time";
import type { InstrumentId } from "./types";
import { isFiniteNumber, isRecord } from "./utils/guards";

export const APP_NAME = "tapewatch";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("tapewatch.config.meta");

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	isRecord(value) && typeof value.source === "string";

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const WORKSPACE_SENTINELS = ["package-lock.json", ".git"];

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	const start = process.cwd();
	let current = start;

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = start;
			return start;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");

export const getDefaultConfigDir = (): string =>
	readOptionalEnvVar("TAPEWATCH_CONFIG_DIR") ??
	path.join(findWorkspaceRoot(), "config");

const getEnvVar = (key: string, fallback?: string): string => {
	const value = process.env[key];
	if (value !== undefined && value !== "") {
		return value;
	}
	if (fallback !== undefined) {
		return fallback;
	}
	throw new ConfigError(`Missing required environment variable: ${key}`);
};

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(`${filePath} is not valid JSON: ${errorMessage(error)}`, {
			cause: error,
		});
	}
};

export interface EnvConfig {
	exchangeId: string;
	binanceApiKey: string;
	binanceApiSecret: string;
	profile: string;
	dataDir?: string;
}

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		exchangeId: getEnvVar("EXCHANGE_ID", "binance"),
		binanceApiKey: getEnvVar("BINANCE_API_KEY", ""),
		binanceApiSecret: getEnvVar("BINANCE_API_SECRET", ""),
		profile: getEnvVar("TAPEWATCH_PROFILE", "default"),
		dataDir: readOptionalEnvVar("TAPEWATCH_DATA_DIR"),
	};
};

/**
 * Credentials the portfolio pane needs. Market data works without them.
 */
export const missingCredentials = (env: EnvConfig): string[] => {
	const missing: string[] = [];
	if (!env.binanceApiKey) {
		missing.push("BINANCE_API_KEY");
	}
	if (!env.binanceApiSecret) {
		missing.push("BINANCE_API_SECRET");
	}
	return missing;
};

/**
 * Directory holding alert rules, the alert log and the workspace file.
 * `TAPEWATCH_DATA_DIR` wins; otherwise the platform's per-user data dir.
 */
export const resolveDataDir = (
	env: NodeJS.ProcessEnv = process.env,
	platform: NodeJS.Platform = process.platform,
	home: string = os.homedir()
): string => {
	const override = env.TAPEWATCH_DATA_DIR?.trim();
	if (override) {
		return path.resolve(override);
	}
	if (platform === "darwin") {
		return path.join(home, "Library", "Application Support", APP_NAME);
	}
	if (platform === "win32") {
		const appData = env.APPDATA?.trim();
		return path.join(appData || path.join(home, "AppData", "Roaming"), APP_NAME);
	}
	const xdg = env.XDG_DATA_HOME?.trim();
	return path.join(xdg || path.join(home, ".local", "share"), APP_NAME);
};

export interface RateLimitSettings {
	tokensPerSecond: number;
	maxBurst: number;
}

export interface RenderSettings {
	minIntervalMs: number;
	tickIntervalMs: number;
}

export interface AlertSettings {
	defaultCooldownSeconds: number;
}

export interface WorkspaceSettings {
	saveTimeoutMs: number;
}

export interface StreamSettings {
	maxReconnectAttempts: number;
	reconnectDelayMs: number;
}

export interface TerminalConfig {
	venue: string;
	instruments: InstrumentId[];
	indexes: InstrumentId[];
	chartTimeframe: string;
	rateLimit: RateLimitSettings;
	render: RenderSettings;
	alerts: AlertSettings;
	workspace: WorkspaceSettings;
	stream: StreamSettings;
}

export const DEFAULT_TERMINAL_CONFIG: TerminalConfig = {
	venue: "binance",
	instruments: ["BTC/USDT.BINANCE", "ETH/USDT.BINANCE"],
	indexes: ["BTC/USDT.BINANCE"],
	chartTimeframe: "1m",
	rateLimit: { tokensPerSecond: 10, maxBurst: 20 },
	render: { minIntervalMs: 16, tickIntervalMs: 33 },
	alerts: { defaultCooldownSeconds: 30 },
	workspace: { saveTimeoutMs: 1_500 },
	stream: { maxReconnectAttempts: 5, reconnectDelayMs: 1_000 },
};

const readSection = (
	raw: Record<string, unknown>,
	key: string,
	source: string
): Record<string, unknown> => {
	const value = raw[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigError(`${source}: "${key}" must be an object`);
	}
	return value;
};

const positiveNumber = (
	section: Record<string, unknown>,
	key: string,
	fallback: number,
	field: string
): number => {
	const value = section[key];
	if (value === undefined) {
		return fallback;
	}
	if (!isFiniteNumber(value) || value <= 0) {
		throw new ConfigError(`${field} must be a positive number`);
	}
	return value;
};

const nonNegativeInteger = (
	section: Record<string, unknown>,
	key: string,
	fallback: number,
	field: string
): number => {
	const value = section[key];
	if (value === undefined) {
		return fallback;
	}
	if (!Number.isInteger(value) || !isFiniteNumber(value) || value < 0) {
		throw new ConfigError(`${field} must be a non-negative integer`);
	}
	return value;
};

const instrumentList = (
	raw: Record<string, unknown>,
	key: string,
	fallback: InstrumentId[],
	field: string
): InstrumentId[] => {
	const value = raw[key];
	if (value === undefined) {
		return [...fallback];
	}
	if (!Array.isArray(value)) {
		throw new ConfigError(`${field} must be an array of instrument ids`);
	}
	const result: InstrumentId[] = [];
	for (const entry of value) {
		if (!isInstrumentId(entry)) {
			throw new ConfigError(
				`${field} contains an invalid instrument id: ${JSON.stringify(entry)}`
			);
		}
		if (!result.includes(entry)) {
			result.push(entry);
		}
	}
	return result;
};

export const parseTerminalConfig = (
	raw: unknown,
	source = "terminal config"
): TerminalConfig => {
	if (!isRecord(raw)) {
		throw new ConfigError(`${source} must be a JSON object`);
	}
	const defaults = DEFAULT_TERMINAL_CONFIG;

	const venue = raw.venue ?? defaults.venue;
	if (typeof venue !== "string" || !venue.trim()) {
		throw new ConfigError(`${source}: venue must be a non-empty string`);
	}

	const chartTimeframe = raw.chartTimeframe ?? defaults.chartTimeframe;
	if (typeof chartTimeframe !== "string") {
		throw new ConfigError(`${source}: chartTimeframe must be a string`);
	}
	try {
		timeframeToMs(chartTimeframe);
	} catch (error) {
		throw new ConfigError(`${source}: ${errorMessage(error)}`, { cause: error });
	}

	const rateLimit = readSection(raw, "rateLimit", source);
	const render = readSection(raw, "render", source);
	const alerts = readSection(raw, "alerts", source);
	const workspace = readSection(raw, "workspace", source);
	const stream = readSection(raw, "stream", source);

	return {
		venue: venue.trim().toLowerCase(),
		instruments: instrumentList(raw, "instruments", defaults.instruments, "instruments"),
		indexes: instrumentList(raw, "indexes", defaults.indexes, "indexes"),
		chartTimeframe,
		rateLimit: {
			tokensPerSecond: positiveNumber(
				rateLimit,
				"tokensPerSecond",
				defaults.rateLimit.tokensPerSecond,
				"rateLimit.tokensPerSecond"
			),
			maxBurst: positiveNumber(
				rateLimit,
				"maxBurst",
				defaults.rateLimit.maxBurst,
				"rateLimit.maxBurst"
			),
		},
		render: {
			minIntervalMs: positiveNumber(
				render,
				"minIntervalMs",
				defaults.render.minIntervalMs,
				"render.minIntervalMs"
			),
			tickIntervalMs: positiveNumber(
				render,
				"tickIntervalMs",
				defaults.render.tickIntervalMs,
				"render.tickIntervalMs"
			),
		},
		alerts: {
			defaultCooldownSeconds: nonNegativeInteger(
				alerts,
				"defaultCooldownSeconds",
				defaults.alerts.defaultCooldownSeconds,
				"alerts.defaultCooldownSeconds"
			),
		},
		workspace: {
			saveTimeoutMs: positiveNumber(
				workspace,
				"saveTimeoutMs",
				defaults.workspace.saveTimeoutMs,
				"workspace.saveTimeoutMs"
			),
		},
		stream: {
			maxReconnectAttempts: nonNegativeInteger(
				stream,
				"maxReconnectAttempts",
				defaults.stream.maxReconnectAttempts,
				"stream.maxReconnectAttempts"
			),
			reconnectDelayMs: positiveNumber(
				stream,
				"reconnectDelayMs",
				defaults.stream.reconnectDelayMs,
				"stream.reconnectDelayMs"
			),
		},
	};
};

export const loadTerminalConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): TerminalConfig => {
	const profileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const configPath = path.join(configDir, "terminal", profileName);
	if (!fs.existsSync(configPath)) {
		if (profile === "default") {
			return withConfigMetadata(
				structuredClone(DEFAULT_TERMINAL_CONFIG),
				{ source: "embedded", profile }
			);
		}
		throw new ConfigError(`Terminal profile not found: ${configPath}`);
	}
	return withConfigMetadata(
		parseTerminalConfig(readJsonFile(configPath), configPath),
		{ source: "file", path: configPath, profile }
	);
};

export interface TapewatchConfig {
	env: EnvConfig;
	terminal: TerminalConfig;
	dataDir: string;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
	/** Replaces the profile's instrument list (e.g. from --instruments) */
	instruments?: InstrumentId[];
}

export const loadTapewatchConfig = (
	options: ConfigLoadOptions = {}
): TapewatchConfig => {
	const env = loadEnvConfig(options.envPath);
	const profile = options.profile ?? env.profile;
	const loaded = loadTerminalConfig(options.configDir, profile);
	const meta = getConfigMetadata(loaded);
	const terminal = options.instruments?.length
		? withConfigMetadata(
				{ ...loaded, instruments: [...new Set(options.instruments)] },
				{ ...meta, source: "merged", profile }
			)
		: loaded;
	return {
		env,
		terminal,
		dataDir: resolveDataDir(),
	};
};
