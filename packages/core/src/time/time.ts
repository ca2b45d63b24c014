/**
 * Pure time utilities for deterministic timestamp handling
 * All functions operate on UTC epoch milliseconds only (no timezone conversion)
 */

import { DAY_MS, HOUR_MS, MINUTE_MS, SECOND_MS, WEEK_MS } from "./constants";

/** Calendar months are bucketed as 30 days; venues align them themselves. */
const MONTH_MS = 30 * DAY_MS;

const TIMEFRAME_PATTERN = /^(\d+)([mhdwM])$/;

/**
 * Parse timeframe string to milliseconds
 * @param timeframe - Format: "1m", "5m", "1h", "1d", "1w", "1M" (month)
 * @throws Error if timeframe format is invalid
 */
export const timeframeToMs = (timeframe: string): number => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d", "1w", "1M"`
		);
	}

	const n = parseInt(match[1], 10);
	const unit = match[2];

	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (unit) {
		case "m":
			return n * MINUTE_MS;
		case "h":
			return n * HOUR_MS;
		case "d":
			return n * DAY_MS;
		case "w":
			return n * WEEK_MS;
		case "M":
			return n * MONTH_MS;
		default:
			throw new Error(`Invalid timeframe unit: "${unit}" in "${timeframe}"`);
	}
};

/** Short relative age for "last updated" indicators: "just now", "12s ago", "3m ago", "2h ago". */
export const formatAge = (ageMs: number): string => {
	if (ageMs < SECOND_MS) {
		return "just now";
	}
	if (ageMs < MINUTE_MS) {
		return `${Math.floor(ageMs / SECOND_MS)}s ago`;
	}
	if (ageMs < HOUR_MS) {
		return `${Math.floor(ageMs / MINUTE_MS)}m ago`;
	}
	if (ageMs < DAY_MS) {
		return `${Math.floor(ageMs / HOUR_MS)}h ago`;
	}
	return `${Math.floor(ageMs / DAY_MS)}d ago`;
};

export const toUnixSeconds = (ms: number): number => Math.floor(ms / SECOND_MS);
