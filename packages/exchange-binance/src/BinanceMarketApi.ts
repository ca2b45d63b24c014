import ccxt, { DDoSProtection, RateLimitExceeded } from "ccxt";
import type { binance } from "ccxt";
import {
	createLogger,
	type Candle,
	type DepthBook,
	type InstrumentId,
	type MarketApi,
	type ModuleLogger,
	type PortfolioSnapshot,
	type Quote,
	type SubscribeOptions,
	type SubscriptionTopic,
	type TradeTick,
} from "@tapewatch/core";
import type { BinancePushStream } from "./BinancePushStream";
import {
	balanceToPortfolio,
	ohlcvToCandle,
	orderBookToDepth,
	tickerToQuote,
	tradeToTick,
} from "./mappers";
import { BinanceSymbolMap, streamNamesFor, toMarketSymbol } from "./symbols";

export interface BinanceMarketApiOptions {
	apiKey?: string;
	secret?: string;
	/** Push stream that subscribe/unsubscribe drive; without one they only register symbols */
	pushStream?: BinancePushStream;
	symbols?: BinanceSymbolMap;
	now?: () => number;
	logger?: ModuleLogger;
}

/** ccxt signals throttling with these two error classes. */
export const isBinanceRateLimited = (error: unknown): boolean =>
	error instanceof RateLimitExceeded || error instanceof DDoSProtection;

/**
 * Accepts a literal credential or a `${ENV_VAR}` reference. Blank values
 * resolve to undefined.
 */
export function resolveCredential(
	value?: string | null,
	env: NodeJS.ProcessEnv = process.env
): string | undefined {
	if (!value) {
		return undefined;
	}
	const trimmed = value.trim();
	const envMatch = trimmed.match(/^\$\{([^}]+)\}$/);
	if (envMatch) {
		const name = envMatch[1] ?? "";
		return env[name]?.trim() || undefined;
	}
	return trimmed || undefined;
}

/** Binance spot REST access through ccxt, plus push subscriptions over the combined stream. */
export class BinanceMarketApi implements MarketApi {
	readonly venue = "binance";
	readonly symbols: BinanceSymbolMap;
	private readonly client: binance;
	private readonly hasAuth: boolean;
	private readonly pushStream?: BinancePushStream;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;

	constructor(options: BinanceMarketApiOptions = {}) {
		const apiKey = resolveCredential(options.apiKey);
		const secret = resolveCredential(options.secret);
		this.hasAuth = Boolean(apiKey && secret);
		this.client = new ccxt.binance({
			apiKey,
			secret,
			enableRateLimit: true,
			options: {
				defaultType: "spot",
			},
		});
		this.pushStream = options.pushStream;
		this.symbols = options.symbols ?? new BinanceSymbolMap();
		this.now = options.now ?? (() => Date.now());
		this.logger = options.logger ?? createLogger("exchange-binance");
	}

	hasCredentials(): boolean {
		return this.hasAuth;
	}

	async subscribe(
		instruments: readonly InstrumentId[],
		topics: readonly SubscriptionTopic[],
		options: SubscribeOptions = {}
	): Promise<void> {
		this.symbols.register(instruments);
		const streams = instruments.flatMap((instrument) =>
			streamNamesFor(instrument, topics, options.candleTimeframe)
		);
		this.logger.debug("binance_subscribe", { streams });
		this.pushStream?.subscribe(streams);
	}

	async unsubscribe(
		instruments: readonly InstrumentId[],
		topics: readonly SubscriptionTopic[],
		options: SubscribeOptions = {}
	): Promise<void> {
		const streams = instruments.flatMap((instrument) =>
			streamNamesFor(instrument, topics, options.candleTimeframe)
		);
		this.logger.debug("binance_unsubscribe", { streams });
		this.pushStream?.unsubscribe(streams);
	}

	async fetchQuotes(
		instruments: readonly InstrumentId[]
	): Promise<Map<InstrumentId, Quote>> {
		const result = new Map<InstrumentId, Quote>();
		if (instruments.length === 0) {
			return result;
		}
		const bySymbol = new Map(
			instruments.map((instrument) => [toMarketSymbol(instrument), instrument])
		);
		const tickers = await this.client.fetchTickers(Array.from(bySymbol.keys()));
		const fetchedAt = this.now();
		for (const [symbol, instrument] of bySymbol) {
			const ticker = tickers[symbol];
			if (ticker) {
				result.set(instrument, tickerToQuote(ticker, fetchedAt));
			}
		}
		return result;
	}

	async fetchCandles(
		instrument: InstrumentId,
		timeframe: string,
		limit = 240
	): Promise<Candle[]> {
		const rows = await this.client.fetchOHLCV(
			toMarketSymbol(instrument),
			timeframe,
			undefined,
			limit
		);
		return rows.map(ohlcvToCandle);
	}

	async fetchDepth(instrument: InstrumentId, limit = 10): Promise<DepthBook> {
		const book = await this.client.fetchOrderBook(toMarketSymbol(instrument), limit);
		return orderBookToDepth(book, this.now());
	}

	async fetchTrades(instrument: InstrumentId, limit = 50): Promise<TradeTick[]> {
		const trades = await this.client.fetchTrades(toMarketSymbol(instrument), undefined, limit);
		return trades.map(tradeToTick);
	}

	async fetchPortfolio(): Promise<PortfolioSnapshot> {
		if (!this.hasAuth) {
			return { holdings: [], fetchedAt: this.now() };
		}
		const balance = await this.client.fetchBalance();
		return balanceToPortfolio(balance, this.now());
	}
}
