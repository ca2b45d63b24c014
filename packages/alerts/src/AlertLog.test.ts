import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { ModuleLogger } from "@tapewatch/core";
import { AlertLog } from "./AlertLog";
import type { AlertEvent } from "./types";

const logger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

const event = (triggeredAt: number): AlertEvent => ({
	ruleId: "rule-1",
	instrument: "BTC/USDT.BINANCE",
	kind: "price_above",
	threshold: 65_000,
	value: 65_010.5,
	triggeredAt,
});

describe("AlertLog", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "tapewatch-alertlog-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("appends one line per event", () => {
		const file = path.join(dir, "history", "alerts.ndjson");
		const history = new AlertLog(file, logger());
		history.append(event(1));
		history.append(event(2));

		expect(fs.readFileSync(file, "utf-8").split("\n")).toHaveLength(3);
		expect(history.readAll()).toEqual([event(1), event(2)]);
		expect(history.tail(1)).toEqual([event(2)]);
	});

	it("skips lines it cannot read", () => {
		const file = path.join(dir, "alerts.ndjson");
		fs.writeFileSync(file, `${JSON.stringify(event(1))}\nnot json\n{"ruleId":"x"}\n`);
		const log = logger();

		expect(new AlertLog(file, log).readAll()).toEqual([event(1)]);
		expect(log.warn).toHaveBeenCalledWith("alert_log_lines_skipped", {
			filePath: file,
			skipped: 2,
		});
	});

	it("returns nothing when there is no history yet", () => {
		expect(new AlertLog(path.join(dir, "none.ndjson"), logger()).readAll()).toEqual([]);
	});
});
