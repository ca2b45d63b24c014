import {
	isRecord,
	toInstrumentId,
	toNumber,
	type Candle,
	type DepthBook,
	type PortfolioHolding,
	type PortfolioSnapshot,
	type Quote,
	type TradeTick,
} from "@tapewatch/core";

export const BINANCE_MARKET = "BINANCE";
export const QUOTE_ASSET = "USDT";

/** The ccxt ticker fields a quote is built from. */
export interface TickerLike {
	timestamp?: number;
	last?: number;
	open?: number;
	high?: number;
	low?: number;
	previousClose?: number;
	change?: number;
	percentage?: number;
	baseVolume?: number;
	quoteVolume?: number;
}

export type OhlcvRow = ReadonlyArray<number | undefined>;

export interface OrderBookLike {
	bids: ReadonlyArray<ReadonlyArray<number | undefined>>;
	asks: ReadonlyArray<ReadonlyArray<number | undefined>>;
	timestamp?: number;
}

export interface TradeLike {
	price?: number;
	amount?: number;
	timestamp?: number;
	side?: string;
}

export const tickerToQuote = (ticker: TickerLike, fallbackTimestamp: number): Quote => ({
	lastPrice: Number(ticker.last ?? 0),
	open: Number(ticker.open ?? 0),
	high: Number(ticker.high ?? 0),
	low: Number(ticker.low ?? 0),
	prevClose: ticker.previousClose,
	change: ticker.change,
	changePercent: ticker.percentage,
	volume: Number(ticker.baseVolume ?? 0),
	turnover: Number(ticker.quoteVolume ?? 0),
	timestamp: Number(ticker.timestamp ?? fallbackTimestamp),
	tradeSession: "regular",
	tradeStatus: "normal",
});

export const ohlcvToCandle = ([timestamp, open, high, low, close, volume]: OhlcvRow): Candle => ({
	timestamp: Number(timestamp ?? 0),
	open: Number(open ?? 0),
	high: Number(high ?? 0),
	low: Number(low ?? 0),
	close: Number(close ?? 0),
	volume: Number(volume ?? 0),
});

export const orderBookToDepth = (book: OrderBookLike, fallbackTimestamp: number): DepthBook => {
	const toLevels = (side: OrderBookLike["bids"]) =>
		side.map(([price, amount], idx) => ({
			position: idx + 1,
			price: Number(price ?? 0),
			volume: Number(amount ?? 0),
			orderCount: 0,
		}));
	return {
		bids: toLevels(book.bids),
		asks: toLevels(book.asks),
		timestamp: Number(book.timestamp ?? fallbackTimestamp),
	};
};

export const tradeToTick = (trade: TradeLike): TradeTick => ({
	price: Number(trade.price ?? 0),
	volume: Number(trade.amount ?? 0),
	timestamp: Number(trade.timestamp ?? 0),
	direction: trade.side === "buy" ? "up" : trade.side === "sell" ? "down" : "neutral",
});

/**
 * Non-zero holdings from a ccxt balance structure. Assets other than the
 * quote asset are linked to their `<ASSET>/USDT` instrument.
 */
export const balanceToPortfolio = (balance: unknown, fetchedAt: number): PortfolioSnapshot => {
	const section = (key: string): Record<string, unknown> => {
		const value = isRecord(balance) ? balance[key] : undefined;
		return isRecord(value) ? value : {};
	};
	const total = section("total");
	const free = section("free");
	const used = section("used");

	const holdings: PortfolioHolding[] = [];
	for (const asset of Object.keys(total).sort()) {
		const amount = toNumber(total[asset]);
		if (amount <= 0) {
			continue;
		}
		holdings.push({
			asset,
			free: toNumber(free[asset]),
			used: toNumber(used[asset]),
			total: amount,
			instrument:
				asset === QUOTE_ASSET
					? undefined
					: toInstrumentId(`${asset}/${QUOTE_ASSET}`, BINANCE_MARKET),
		});
	}
	return { holdings, fetchedAt };
};
