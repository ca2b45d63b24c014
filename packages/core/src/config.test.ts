import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
	DEFAULT_TERMINAL_CONFIG,
	getConfigMetadata,
	loadTerminalConfig,
	missingCredentials,
	parseTerminalConfig,
	resolveDataDir,
} from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = path.join(
	path.dirname(fileURLToPath(import.meta.url)),
	"__tests__",
	"fixtures"
);

describe("loadTerminalConfig", () => {
	it("merges a profile over the defaults and dedupes instruments", () => {
		const config = loadTerminalConfig(FIXTURE_DIR, "hk-desk");
		expect(config.venue).toBe("binance");
		expect(config.instruments).toEqual(["700.HK", "AAPL.US"]);
		expect(config.indexes).toEqual(["HSI.HK"]);
		expect(config.chartTimeframe).toBe("5m");
		expect(config.rateLimit).toEqual({ tokensPerSecond: 5, maxBurst: 20 });
		expect(config.stream).toEqual({ maxReconnectAttempts: 0, reconnectDelayMs: 1_000 });
		expect(config.render).toEqual(DEFAULT_TERMINAL_CONFIG.render);
	});

	it("records where the profile came from", () => {
		const config = loadTerminalConfig(FIXTURE_DIR, "hk-desk");
		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			path: path.join(FIXTURE_DIR, "terminal", "hk-desk.json"),
			profile: "hk-desk",
		});
	});

	it("falls back to embedded defaults when the default profile is absent", () => {
		const config = loadTerminalConfig(path.join(FIXTURE_DIR, "missing"), "default");
		expect(config).toEqual(DEFAULT_TERMINAL_CONFIG);
		expect(getConfigMetadata(config)?.source).toBe("embedded");
	});

	it("throws when a named profile does not exist", () => {
		expect(() => loadTerminalConfig(FIXTURE_DIR, "nope")).toThrowError(
			/Terminal profile not found/
		);
	});

	it("rejects malformed instrument ids", () => {
		expect(() => loadTerminalConfig(FIXTURE_DIR, "bad-instrument")).toThrowError(
			/invalid instrument id: "not-an-instrument"/
		);
	});

	it("rejects non-positive rate settings", () => {
		expect(() => loadTerminalConfig(FIXTURE_DIR, "bad-rate")).toThrowError(
			"rateLimit.tokensPerSecond must be a positive number"
		);
	});

	it("wraps unparsable JSON in a ConfigError", () => {
		expect(() => loadTerminalConfig(FIXTURE_DIR, "truncated")).toThrowError(ConfigError);
	});
});

describe("parseTerminalConfig", () => {
	it("rejects an unknown chart timeframe", () => {
		expect(() => parseTerminalConfig({ chartTimeframe: "1y" }, "inline")).toThrowError(
			/^inline: Invalid timeframe format/
		);
	});

	it("rejects a section that is not an object", () => {
		expect(() => parseTerminalConfig({ render: 16 }, "inline")).toThrowError(
			'inline: "render" must be an object'
		);
	});
});

describe("resolveDataDir", () => {
	it("prefers the explicit override", () => {
		expect(resolveDataDir({ TAPEWATCH_DATA_DIR: "/srv/tapewatch" }, "linux", "/home/u")).toBe(
			"/srv/tapewatch"
		);
	});

	it("uses XDG_DATA_HOME on linux when set", () => {
		expect(resolveDataDir({ XDG_DATA_HOME: "/data" }, "linux", "/home/u")).toBe(
			"/data/tapewatch"
		);
	});

	it("falls back to ~/.local/share on linux", () => {
		expect(resolveDataDir({}, "linux", "/home/u")).toBe("/home/u/.local/share/tapewatch");
	});

	it("uses Application Support on macOS", () => {
		expect(resolveDataDir({}, "darwin", "/Users/u")).toBe(
			"/Users/u/Library/Application Support/tapewatch"
		);
	});
});

describe("missingCredentials", () => {
	it("lists the absent keys", () => {
		expect(
			missingCredentials({
				exchangeId: "binance",
				binanceApiKey: "test-key",
				binanceApiSecret: "",
				profile: "default",
			})
		).toEqual(["BINANCE_API_SECRET"]);
	});
});
