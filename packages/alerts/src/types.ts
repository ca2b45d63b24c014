import type { InstrumentId } from "@tapewatch/core";

export const ALERT_KINDS = [
	"price_above",
	"price_below",
	"change_percent_above",
	"change_percent_below",
	"volume_above",
] as const;

export type AlertKind = (typeof ALERT_KINDS)[number];

export interface AlertRule {
	id: string;
	instrument: InstrumentId;
	kind: AlertKind;
	threshold: number;
	enabled: boolean;
	/** Minimum gap between two firings of this rule */
	cooldownSeconds: number;
	/** Epoch ms of the last firing, null if it never fired */
	lastTriggeredAt: number | null;
	createdAt: number;
	updatedAt: number;
}

export interface NewAlertRule {
	instrument: InstrumentId;
	kind: AlertKind;
	threshold: number;
	cooldownSeconds?: number;
	enabled?: boolean;
}

export interface AlertEvent {
	ruleId: string;
	instrument: InstrumentId;
	kind: AlertKind;
	threshold: number;
	/** Observed value that satisfied the rule */
	value: number;
	triggeredAt: number;
}

export const isAlertKind = (value: unknown): value is AlertKind =>
	typeof value === "string" && ALERT_KINDS.some((kind) => kind === value);
