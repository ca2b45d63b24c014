import fs from "node:fs";
import path from "node:path";
import {
	PersistenceError,
	createLogger,
	isFiniteNumber,
	isInstrumentId,
	isRecord,
	type ModuleLogger,
} from "@tapewatch/core";
import { isAlertKind, type AlertEvent } from "./types";

const toAlertEvent = (raw: unknown): AlertEvent | null => {
	if (!isRecord(raw)) {
		return null;
	}
	const { ruleId, instrument, kind, threshold, value, triggeredAt } = raw;
	if (
		typeof ruleId !== "string" ||
		!isInstrumentId(instrument) ||
		!isAlertKind(kind) ||
		!isFiniteNumber(threshold) ||
		!isFiniteNumber(value) ||
		!isFiniteNumber(triggeredAt)
	) {
		return null;
	}
	return { ruleId, instrument, kind, threshold, value, triggeredAt };
};

/** Append-only history of fired alerts, one JSON object per line. */
export class AlertLog {
	private readonly logger: ModuleLogger;

	constructor(
		readonly filePath: string,
		logger?: ModuleLogger
	) {
		this.logger = logger ?? createLogger("alert-log");
	}

	append(event: AlertEvent): void {
		try {
			fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
			fs.appendFileSync(this.filePath, `${JSON.stringify(event)}\n`, "utf-8");
		} catch (error) {
			throw new PersistenceError(this.filePath, error);
		}
	}

	/** Oldest first. Lines that do not parse are skipped. */
	readAll(): AlertEvent[] {
		if (!fs.existsSync(this.filePath)) {
			return [];
		}
		const events: AlertEvent[] = [];
		let skipped = 0;
		for (const line of fs.readFileSync(this.filePath, "utf-8").split("\n")) {
			if (!line.trim()) {
				continue;
			}
			let event: AlertEvent | null = null;
			try {
				event = toAlertEvent(JSON.parse(line));
			} catch {
				event = null;
			}
			if (event) {
				events.push(event);
			} else {
				skipped += 1;
			}
		}
		if (skipped > 0) {
			this.logger.warn("alert_log_lines_skipped", { filePath: this.filePath, skipped });
		}
		return events;
	}

	tail(limit: number): AlertEvent[] {
		const events = this.readAll();
		return events.slice(Math.max(events.length - limit, 0));
	}
}
