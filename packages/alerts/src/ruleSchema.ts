import {
	AlertRuleError,
	isFiniteNumber,
	isInstrumentId,
	isRecord,
	readBoolean,
	readNumber,
	readString,
} from "@tapewatch/core";
import { isAlertKind, type AlertRule } from "./types";

export const RULE_FILE_VERSION = 1;

export interface RuleFile {
	version: typeof RULE_FILE_VERSION;
	rules: AlertRule[];
}

export const isValidCooldown = (value: number): boolean =>
	Number.isInteger(value) && value >= 0;

const parseRule = (raw: unknown, index: number): AlertRule => {
	const where = `rules[${index}]`;
	if (!isRecord(raw)) {
		throw new AlertRuleError(`${where} must be an object`);
	}
	const id = readString(raw, "id");
	const instrument = raw.instrument;
	const kind = raw.kind;
	const threshold = readNumber(raw, "threshold");
	const enabled = readBoolean(raw, "enabled");
	const cooldownSeconds = readNumber(raw, "cooldownSeconds");
	const createdAt = readNumber(raw, "createdAt");
	const updatedAt = readNumber(raw, "updatedAt");
	const lastTriggeredAt = raw.lastTriggeredAt ?? null;

	if (!id) {
		throw new AlertRuleError(`${where}.id must be a non-empty string`);
	}
	if (!isInstrumentId(instrument)) {
		throw new AlertRuleError(`${where}.instrument is not a valid instrument id`);
	}
	if (!isAlertKind(kind)) {
		throw new AlertRuleError(`${where}.kind is not a known alert kind`);
	}
	if (threshold === undefined) {
		throw new AlertRuleError(`${where}.threshold must be a finite number`);
	}
	if (enabled === undefined) {
		throw new AlertRuleError(`${where}.enabled must be a boolean`);
	}
	if (cooldownSeconds === undefined || !isValidCooldown(cooldownSeconds)) {
		throw new AlertRuleError(`${where}.cooldownSeconds must be a non-negative integer`);
	}
	if (createdAt === undefined || updatedAt === undefined) {
		throw new AlertRuleError(`${where} is missing createdAt/updatedAt`);
	}
	if (lastTriggeredAt !== null && !isFiniteNumber(lastTriggeredAt)) {
		throw new AlertRuleError(`${where}.lastTriggeredAt must be a number or null`);
	}
	return {
		id,
		instrument,
		kind,
		threshold,
		enabled,
		cooldownSeconds,
		lastTriggeredAt,
		createdAt,
		updatedAt,
	};
};

/** Validates the persisted `{ version, rules }` document. Duplicate ids are rejected. */
export const parseRuleFile = (raw: unknown): AlertRule[] => {
	if (!isRecord(raw)) {
		throw new AlertRuleError("Rule file must be a JSON object");
	}
	if (raw.version !== RULE_FILE_VERSION) {
		throw new AlertRuleError(`Unsupported rule file version: ${String(raw.version)}`);
	}
	if (!Array.isArray(raw.rules)) {
		throw new AlertRuleError("Rule file is missing its rules array");
	}
	const rules = raw.rules.map((entry, index) => parseRule(entry, index));
	const seen = new Set<string>();
	for (const rule of rules) {
		if (seen.has(rule.id)) {
			throw new AlertRuleError(`Duplicate alert rule id: ${rule.id}`);
		}
		seen.add(rule.id);
	}
	return rules;
};
