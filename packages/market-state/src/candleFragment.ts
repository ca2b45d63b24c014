import type { Candle } from "@tapewatch/core";

export interface CandleMergeResult {
	candles: Candle[];
	/** false when the candle belongs to a bucket older than the newest held */
	applied: boolean;
}

/**
 * Merge one candle into an ascending fragment.
 *
 * - Same bucket as the newest candle: replaced (last write wins)
 * - Newer bucket: appended, then the fragment is trimmed to `limit`
 * - Older bucket: rejected, the fragment is returned unchanged
 */
export const mergeCandle = (
	fragment: readonly Candle[],
	candle: Candle,
	limit: number
): CandleMergeResult => {
	const last = fragment[fragment.length - 1];
	if (last && candle.timestamp < last.timestamp) {
		return { candles: [...fragment], applied: false };
	}
	const next =
		last && last.timestamp === candle.timestamp
			? [...fragment.slice(0, -1), candle]
			: [...fragment, candle];
	return { candles: trimToLimit(next, limit), applied: true };
};

/**
 * Build a fragment from an unordered batch (REST backfill): sorted ascending,
 * deduplicated by timestamp with the later entry winning, trimmed to `limit`.
 */
export const mergeCandles = (
	existing: readonly Candle[],
	incoming: readonly Candle[],
	limit: number
): Candle[] => {
	const byTimestamp = new Map<number, Candle>();
	for (const candle of existing) {
		byTimestamp.set(candle.timestamp, candle);
	}
	for (const candle of incoming) {
		byTimestamp.set(candle.timestamp, candle);
	}
	const sorted = Array.from(byTimestamp.values()).sort(
		(a, b) => a.timestamp - b.timestamp
	);
	return trimToLimit(sorted, limit);
};

const trimToLimit = (candles: Candle[], limit: number): Candle[] => {
	const max = Math.max(limit, 1);
	return candles.length > max ? candles.slice(candles.length - max) : candles;
};
