/**
 * Exchange-qualified instrument identifier in the form `CODE.MARKET`
 * (e.g. "700.HK", "BTC/USDT.BINANCE"). Compared by exact string equality.
 */
export type InstrumentId = string;

export type MarketCategory = "quote" | "depth" | "trades" | "candle";

export type TradeSession = "pre" | "regular" | "post" | "overnight";

export type TradeStatus = "normal" | "halted" | "suspended" | "closed";

export interface Quote {
	lastPrice: number;
	open: number;
	high: number;
	low: number;
	prevClose?: number;
	change?: number;
	/** Percent change against the previous close, e.g. 1.25 for +1.25% */
	changePercent?: number;
	/** Cumulative traded volume for the session */
	volume: number;
	turnover: number;
	timestamp: number;
	tradeSession?: TradeSession;
	tradeStatus?: TradeStatus;
}

export interface DepthLevel {
	position: number;
	price: number;
	volume: number;
	orderCount: number;
}

export interface DepthBook {
	bids: readonly DepthLevel[];
	asks: readonly DepthLevel[];
	timestamp: number;
}

export type TradeDirection = "up" | "down" | "neutral";

export interface TradeTick {
	price: number;
	volume: number;
	timestamp: number;
	direction: TradeDirection;
}

export interface Candle {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Point-in-time view of one instrument. Sub-records are frozen and shared;
 * callers never receive a reference they can mutate.
 */
export interface MarketSnapshot {
	instrument: InstrumentId;
	quote?: Readonly<Quote>;
	depth?: Readonly<DepthBook>;
	trades: readonly TradeTick[];
	candles: readonly Candle[];
	/** Interval of `candles`, once known */
	candleTimeframe?: string;
	updatedAt: number;
}

export interface ChangeNotification {
	instrument: InstrumentId;
	category: MarketCategory;
	at: number;
}

export interface PortfolioHolding {
	asset: string;
	free: number;
	used: number;
	total: number;
	/** Tradable instrument for the asset when the venue lists one */
	instrument?: InstrumentId;
}

export interface PortfolioSnapshot {
	holdings: PortfolioHolding[];
	fetchedAt: number;
}
