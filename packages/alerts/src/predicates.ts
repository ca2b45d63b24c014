import type { Quote } from "@tapewatch/core";
import type { AlertKind, AlertRule } from "./types";

/**
 * Percent change against the previous close. The venue figure wins; without
 * one it is derived from prevClose, and is undefined when that is missing or
 * not positive.
 */
export const changePercentOf = (quote: Readonly<Quote>): number | undefined => {
	if (quote.changePercent !== undefined) {
		return quote.changePercent;
	}
	if (quote.prevClose === undefined || quote.prevClose <= 0) {
		return undefined;
	}
	return ((quote.lastPrice - quote.prevClose) / quote.prevClose) * 100;
};

export const observedValue = (
	kind: AlertKind,
	quote: Readonly<Quote>
): number | undefined => {
	switch (kind) {
		case "price_above":
		case "price_below":
			return quote.lastPrice;
		case "change_percent_above":
		case "change_percent_below":
			return changePercentOf(quote);
		case "volume_above":
			return quote.volume;
	}
};

const isAbove = (kind: AlertKind): boolean => kind.endsWith("_above");

export interface RuleEvaluation {
	satisfied: boolean;
	value: number | undefined;
}

export const evaluateRule = (
	rule: Pick<AlertRule, "kind" | "threshold">,
	quote: Readonly<Quote>
): RuleEvaluation => {
	const value = observedValue(rule.kind, quote);
	if (value === undefined) {
		return { satisfied: false, value };
	}
	const satisfied = isAbove(rule.kind) ? value >= rule.threshold : value <= rule.threshold;
	return { satisfied, value };
};
