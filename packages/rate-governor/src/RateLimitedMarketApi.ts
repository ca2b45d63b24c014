import type {
	Candle,
	DepthBook,
	InstrumentId,
	MarketApi,
	PortfolioSnapshot,
	Quote,
	SubscribeOptions,
	SubscriptionTopic,
	TradeTick,
} from "@tapewatch/core";
import type { RateGovernor } from "./RateGovernor";

/**
 * MarketApi decorator that sends every call through the governor, so
 * subscriptions and queries share one token budget. A bound signal abandons
 * queued and in-flight calls once it aborts.
 */
export class RateLimitedMarketApi implements MarketApi {
	constructor(
		private readonly inner: MarketApi,
		private readonly governor: RateGovernor,
		private readonly signal?: AbortSignal
	) {}

	/** Same venue and budget, with every call bound to `signal`. */
	withSignal(signal: AbortSignal): RateLimitedMarketApi {
		return new RateLimitedMarketApi(this.inner, this.governor, signal);
	}

	get venue(): string {
		return this.inner.venue;
	}

	subscribe(
		instruments: readonly InstrumentId[],
		topics: readonly SubscriptionTopic[],
		options?: SubscribeOptions
	): Promise<void> {
		return this.governor.execute(
			`subscribe:${topics.join("+")}`,
			() => this.inner.subscribe(instruments, topics, options),
			this.signal
		);
	}

	unsubscribe(
		instruments: readonly InstrumentId[],
		topics: readonly SubscriptionTopic[],
		options?: SubscribeOptions
	): Promise<void> {
		return this.governor.execute(
			`unsubscribe:${topics.join("+")}`,
			() => this.inner.unsubscribe(instruments, topics, options),
			this.signal
		);
	}

	fetchQuotes(
		instruments: readonly InstrumentId[]
	): Promise<Map<InstrumentId, Quote>> {
		return this.governor.execute(
			"fetchQuotes",
			() => this.inner.fetchQuotes(instruments),
			this.signal
		);
	}

	fetchCandles(
		instrument: InstrumentId,
		timeframe: string,
		limit?: number
	): Promise<Candle[]> {
		return this.governor.execute(
			`fetchCandles:${instrument}:${timeframe}`,
			() => this.inner.fetchCandles(instrument, timeframe, limit),
			this.signal
		);
	}

	fetchDepth(instrument: InstrumentId, limit?: number): Promise<DepthBook> {
		return this.governor.execute(
			`fetchDepth:${instrument}`,
			() => this.inner.fetchDepth(instrument, limit),
			this.signal
		);
	}

	fetchTrades(instrument: InstrumentId, limit?: number): Promise<TradeTick[]> {
		return this.governor.execute(
			`fetchTrades:${instrument}`,
			() => this.inner.fetchTrades(instrument, limit),
			this.signal
		);
	}

	fetchPortfolio(): Promise<PortfolioSnapshot> {
		return this.governor.execute(
			"fetchPortfolio",
			() => this.inner.fetchPortfolio(),
			this.signal
		);
	}
}
