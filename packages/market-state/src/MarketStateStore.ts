import {
	createLogger,
	errorMessage,
	type Candle,
	type ChangeNotification,
	type DepthBook,
	type InstrumentId,
	type MarketCategory,
	type MarketSnapshot,
	type ModuleLogger,
	type Quote,
	type TradeTick,
} from "@tapewatch/core";
import { mergeCandle, mergeCandles } from "./candleFragment";

export type ChangeListener = (change: ChangeNotification) => void;

/** Read side of the store, as handed to renderers and the alert engine. */
export interface MarketStateView {
	get(instrument: InstrumentId): MarketSnapshot | undefined;
	getMany(instruments: readonly InstrumentId[]): Map<InstrumentId, MarketSnapshot>;
	instruments(): InstrumentId[];
}

export interface MarketStateStoreOptions {
	/** Candles kept per instrument (default 240) */
	maxCandles?: number;
	/** Trade ticks kept per instrument (default 50) */
	maxTrades?: number;
	now?: () => number;
	logger?: ModuleLogger;
}

interface Entry {
	quote?: Readonly<Quote>;
	depth?: Readonly<DepthBook>;
	trades: readonly TradeTick[];
	candles: readonly Candle[];
	candleTimeframe?: string;
	updatedAt: number;
}

const freezeDepth = (depth: DepthBook): Readonly<DepthBook> =>
	Object.freeze({
		bids: Object.freeze(depth.bids.map((level) => Object.freeze({ ...level }))),
		asks: Object.freeze(depth.asks.map((level) => Object.freeze({ ...level }))),
		timestamp: depth.timestamp,
	});

const freezeList = <T extends object>(items: readonly T[]): readonly T[] =>
	Object.freeze(items.map((item) => Object.freeze({ ...item })));

/**
 * Latest known market state per instrument.
 *
 * Each update replaces one frozen sub-record (quote, depth, trades or
 * candles) in a single assignment, so a reader sees either the old record or
 * the new one. Updates older than what is held for that sub-record are
 * dropped. Every applied update is broadcast to subscribers synchronously.
 */
export class MarketStateStore implements MarketStateView {
	private readonly entries = new Map<InstrumentId, Entry>();
	private readonly listeners = new Set<ChangeListener>();
	private readonly maxCandles: number;
	private readonly maxTrades: number;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;

	constructor(options: MarketStateStoreOptions = {}) {
		this.maxCandles = Math.max(options.maxCandles ?? 240, 1);
		this.maxTrades = Math.max(options.maxTrades ?? 50, 1);
		this.now = options.now ?? (() => Date.now());
		this.logger = options.logger ?? createLogger("market-state");
	}

	get size(): number {
		return this.entries.size;
	}

	/** Registers an instrument with no data yet. No notification is emitted. */
	track(instrument: InstrumentId): void {
		this.upsert(instrument);
	}

	updateQuote(instrument: InstrumentId, quote: Quote): ChangeNotification | null {
		const entry = this.upsert(instrument);
		if (entry.quote && quote.timestamp < entry.quote.timestamp) {
			return this.dropStale(instrument, "quote", quote.timestamp, entry.quote.timestamp);
		}
		entry.quote = Object.freeze({ ...quote });
		return this.commit(instrument, entry, "quote");
	}

	updateDepth(instrument: InstrumentId, depth: DepthBook): ChangeNotification | null {
		const entry = this.upsert(instrument);
		if (entry.depth && depth.timestamp < entry.depth.timestamp) {
			return this.dropStale(instrument, "depth", depth.timestamp, entry.depth.timestamp);
		}
		entry.depth = freezeDepth(depth);
		return this.commit(instrument, entry, "depth");
	}

	/**
	 * Appends trade ticks in order. Ticks older than the newest one held are
	 * discarded; if nothing remains the update counts as stale.
	 */
	updateTrades(
		instrument: InstrumentId,
		trades: readonly TradeTick[]
	): ChangeNotification | null {
		const entry = this.upsert(instrument);
		const newest = entry.trades[entry.trades.length - 1]?.timestamp ?? -Infinity;
		const fresh = trades.filter((tick) => tick.timestamp >= newest);
		if (fresh.length === 0) {
			return this.dropStale(
				instrument,
				"trades",
				trades[trades.length - 1]?.timestamp ?? 0,
				newest
			);
		}
		const merged = [...entry.trades, ...fresh];
		entry.trades = freezeList(merged.slice(Math.max(merged.length - this.maxTrades, 0)));
		return this.commit(instrument, entry, "trades");
	}

	/**
	 * Merges one bar. A bar tagged with another interval than the fragment
	 * holds is dropped; an untagged fragment adopts the bar's interval.
	 */
	updateCandle(
		instrument: InstrumentId,
		candle: Candle,
		timeframe?: string
	): ChangeNotification | null {
		const entry = this.upsert(instrument);
		if (
			timeframe !== undefined &&
			entry.candleTimeframe !== undefined &&
			timeframe !== entry.candleTimeframe
		) {
			this.logger.debug("candle_timeframe_mismatch", {
				instrument,
				timeframe,
				heldTimeframe: entry.candleTimeframe,
			});
			return null;
		}
		const { candles, applied } = mergeCandle(entry.candles, candle, this.maxCandles);
		if (!applied) {
			return this.dropStale(
				instrument,
				"candle",
				candle.timestamp,
				entry.candles[entry.candles.length - 1]?.timestamp ?? 0
			);
		}
		entry.candles = freezeList(candles);
		entry.candleTimeframe = timeframe ?? entry.candleTimeframe;
		return this.commit(instrument, entry, "candle");
	}

	/**
	 * Replaces the candle fragment wholesale, e.g. after a chart period change
	 * or a REST backfill. Always applied; `timeframe` becomes the interval
	 * later pushed bars must match.
	 */
	replaceCandles(
		instrument: InstrumentId,
		candles: readonly Candle[],
		timeframe?: string
	): ChangeNotification {
		const entry = this.upsert(instrument);
		entry.candles = freezeList(mergeCandles([], candles, this.maxCandles));
		entry.candleTimeframe = timeframe;
		return this.commit(instrument, entry, "candle");
	}

	get(instrument: InstrumentId): MarketSnapshot | undefined {
		const entry = this.entries.get(instrument);
		return entry ? toSnapshot(instrument, entry) : undefined;
	}

	getMany(instruments: readonly InstrumentId[]): Map<InstrumentId, MarketSnapshot> {
		const result = new Map<InstrumentId, MarketSnapshot>();
		for (const instrument of instruments) {
			const entry = this.entries.get(instrument);
			if (entry) {
				result.set(instrument, toSnapshot(instrument, entry));
			}
		}
		return result;
	}

	has(instrument: InstrumentId): boolean {
		return this.entries.has(instrument);
	}

	instruments(): InstrumentId[] {
		return Array.from(this.entries.keys());
	}

	remove(instrument: InstrumentId): boolean {
		return this.entries.delete(instrument);
	}

	clear(): void {
		this.entries.clear();
	}

	subscribe(listener: ChangeListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private upsert(instrument: InstrumentId): Entry {
		let entry = this.entries.get(instrument);
		if (!entry) {
			entry = { trades: [], candles: [], updatedAt: 0 };
			this.entries.set(instrument, entry);
		}
		return entry;
	}

	private commit(
		instrument: InstrumentId,
		entry: Entry,
		category: MarketCategory
	): ChangeNotification {
		const at = this.now();
		entry.updatedAt = at;
		const change: ChangeNotification = { instrument, category, at };
		for (const listener of this.listeners) {
			try {
				listener(change);
			} catch (error) {
				this.logger.error("store_listener_failed", {
					instrument,
					category,
					message: errorMessage(error),
				});
			}
		}
		return change;
	}

	private dropStale(
		instrument: InstrumentId,
		category: MarketCategory,
		timestamp: number,
		heldTimestamp: number
	): null {
		this.logger.debug("stale_update_dropped", {
			instrument,
			category,
			timestamp,
			heldTimestamp,
		});
		return null;
	}
}

const toSnapshot = (instrument: InstrumentId, entry: Entry): MarketSnapshot => ({
	instrument,
	quote: entry.quote,
	depth: entry.depth,
	trades: entry.trades,
	candles: entry.candles,
	candleTimeframe: entry.candleTimeframe,
	updatedAt: entry.updatedAt,
});
