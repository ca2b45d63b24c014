import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ModuleLogger } from "@tapewatch/core";
import { defaultWorkspace, parseWorkspace, type WorkspaceSnapshot } from "./snapshot";
import { WorkspaceStore } from "./WorkspaceStore";

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const sample = (): WorkspaceSnapshot => ({
	...defaultWorkspace(),
	lastView: "watchlist_detail",
	watchlistGroupId: "crypto",
	watchlistSort: { field: "change", reverse: true },
	selectedInstrument: "ETH/USDT.BINANCE",
	detailInstrument: "ETH/USDT.BINANCE",
	chartPeriod: "1h",
	chartOffset: 12,
	logPanelVisible: true,
});

describe("WorkspaceStore", () => {
	let dir: string;
	let file: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "tapewatch-workspace-"));
		file = path.join(dir, "workspace.json");
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("returns defaults when nothing was saved", () => {
		const store = new WorkspaceStore({ filePath: file, logger: silentLogger() });
		expect(store.load()).toEqual({ snapshot: defaultWorkspace(), backupPath: null });
	});

	it("saves and restores the snapshot with a fresh savedAt", async () => {
		const store = new WorkspaceStore({
			filePath: file,
			now: () => 1_700_000_123_000,
			logger: silentLogger(),
		});

		await expect(store.save(sample())).resolves.toBe(true);
		expect(store.load()).toEqual({
			snapshot: { ...sample(), savedAt: 1_700_000_123_000 },
			backupPath: null,
		});
	});

	it("backs up an unparsable file and falls back to defaults", () => {
		fs.writeFileSync(file, '{"version": 1, "lastView": ');
		const logger = silentLogger();
		const store = new WorkspaceStore({ filePath: file, now: () => 1_700_000_000_000, logger });

		expect(store.load()).toEqual({
			snapshot: defaultWorkspace(),
			backupPath: `${file}.corrupt.1700000000.bak`,
		});
		expect(logger.warn).toHaveBeenCalledWith(
			"workspace_corrupt",
			expect.objectContaining({ filePath: file })
		);
	});

	it("treats a well-formed file with bad fields as corrupt", () => {
		fs.writeFileSync(file, JSON.stringify({ ...sample(), chartPeriod: "decade" }));
		const store = new WorkspaceStore({ filePath: file, now: () => 1_700_000_000_000, logger: silentLogger() });

		expect(store.load().backupPath).toBe(`${file}.corrupt.1700000000.bak`);
	});

	it("resolves false when the write fails", async () => {
		const blocker = path.join(dir, "blocker");
		fs.writeFileSync(blocker, "");
		const logger = silentLogger();
		const store = new WorkspaceStore({ filePath: path.join(blocker, "workspace.json"), logger });

		await expect(store.save(sample())).resolves.toBe(false);
		expect(logger.error).toHaveBeenCalledWith(
			"workspace_save_failed",
			expect.objectContaining({ filePath: path.join(blocker, "workspace.json") })
		);
	});
});

describe("parseWorkspace", () => {
	it("keeps a detail view without an instrument as stored", () => {
		const stored = { ...sample(), lastView: "detail", detailInstrument: null };
		expect(parseWorkspace(stored)).toEqual({ ok: true, snapshot: stored });
	});

	it("keeps the portfolio view as saved", () => {
		const result = parseWorkspace({ ...sample(), lastView: "portfolio", detailInstrument: null });
		expect(result).toMatchObject({ ok: true, snapshot: { lastView: "portfolio" } });
	});

	it("rejects other versions", () => {
		expect(parseWorkspace({ ...sample(), version: 2 })).toEqual({
			ok: false,
			reason: "unsupported workspace version: 2",
		});
	});
});
