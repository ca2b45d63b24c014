import type {
	Candle,
	DepthBook,
	InstrumentId,
	MarketCategory,
	PortfolioSnapshot,
	Quote,
	TradeTick,
} from "../types";

export type SubscriptionTopic = MarketCategory;

export interface SubscribeOptions {
	/** Candle period for the "candle" topic (default chosen by the venue adapter) */
	candleTimeframe?: string;
}

/**
 * Request/response surface of a market-data venue.
 *
 * Implementations talk to the vendor directly; callers are expected to reach
 * them through the rate governor, never around it.
 */
export interface MarketApi {
	readonly venue: string;

	/**
	 * Start receiving push events for the given instruments and topics.
	 * Events arrive on the venue's PushStream, not through this call.
	 */
	subscribe(
		instruments: readonly InstrumentId[],
		topics: readonly SubscriptionTopic[],
		options?: SubscribeOptions
	): Promise<void>;

	unsubscribe(
		instruments: readonly InstrumentId[],
		topics: readonly SubscriptionTopic[],
		options?: SubscribeOptions
	): Promise<void>;

	/**
	 * Latest quote snapshot per instrument. Instruments the venue does not
	 * know are left out of the result.
	 */
	fetchQuotes(
		instruments: readonly InstrumentId[]
	): Promise<Map<InstrumentId, Quote>>;

	/**
	 * Historical candles in chronological order.
	 * @param timeframe - Venue timeframe string (e.g., "1m", "1d", "1M")
	 */
	fetchCandles(
		instrument: InstrumentId,
		timeframe: string,
		limit?: number
	): Promise<Candle[]>;

	fetchDepth(instrument: InstrumentId, limit?: number): Promise<DepthBook>;

	fetchTrades(instrument: InstrumentId, limit?: number): Promise<TradeTick[]>;

	/** Account holdings. Requires credentials; venues without them return no holdings. */
	fetchPortfolio(): Promise<PortfolioSnapshot>;
}

/**
 * Raw push frames from a venue. Iteration ends when `signal` aborts and
 * throws once the connection cannot be re-established.
 */
export interface PushStream {
	frames(signal: AbortSignal): AsyncIterable<string>;
}
