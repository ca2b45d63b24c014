import {
	instrumentCode,
	type Candle,
	type DepthBook,
	type InstrumentId,
	type MarketSnapshot,
	type PortfolioSnapshot,
	type TradeTick,
} from "@tapewatch/core";

const PLACEHOLDER = "--";

export const formatPrice = (value: number | undefined): string => {
	if (value === undefined || !Number.isFinite(value)) {
		return PLACEHOLDER;
	}
	return Math.abs(value) >= 1 ? value.toFixed(2) : value.toPrecision(4);
};

export const formatPercent = (value: number | undefined): string => {
	if (value === undefined || !Number.isFinite(value)) {
		return PLACEHOLDER;
	}
	return `${value > 0 ? "+" : ""}${value.toFixed(2)}%`;
};

const VOLUME_UNITS: ReadonlyArray<[number, string]> = [
	[1e9, "B"],
	[1e6, "M"],
	[1e3, "K"],
];

export const formatVolume = (value: number | undefined): string => {
	if (value === undefined || !Number.isFinite(value)) {
		return PLACEHOLDER;
	}
	for (const [size, unit] of VOLUME_UNITS) {
		if (Math.abs(value) >= size) {
			return `${(value / size).toFixed(2)}${unit}`;
		}
	}
	return value.toFixed(value % 1 === 0 ? 0 : 2);
};

export const watchlistRow = (
	instrument: InstrumentId,
	snapshot: MarketSnapshot | undefined,
	selected: boolean
): string => {
	const quote = snapshot?.quote;
	return [
		selected ? ">" : " ",
		instrumentCode(instrument).padEnd(12),
		formatPrice(quote?.lastPrice).padStart(12),
		formatPercent(quote?.changePercent).padStart(9),
		formatVolume(quote?.volume).padStart(10),
	].join(" ");
};

export const quoteLines = (snapshot: MarketSnapshot | undefined): string[] => {
	const quote = snapshot?.quote;
	if (!quote) {
		return ["waiting for quote"];
	}
	return [
		`${formatPrice(quote.lastPrice)}  ${formatPercent(quote.changePercent)}`,
		`O ${formatPrice(quote.open)}  H ${formatPrice(quote.high)}  L ${formatPrice(quote.low)}  PC ${formatPrice(quote.prevClose)}`,
		`Vol ${formatVolume(quote.volume)}  Turnover ${formatVolume(quote.turnover)}`,
	];
};

/** Asks above bids, best prices adjacent, `levels` per side. */
export const depthLines = (depth: DepthBook | undefined, levels = 5): string[] => {
	if (!depth) {
		return ["no depth"];
	}
	const asks = depth.asks
		.slice(0, levels)
		.reverse()
		.map((level) => `ask ${formatPrice(level.price).padStart(12)} ${formatVolume(level.volume).padStart(10)}`);
	const bids = depth.bids
		.slice(0, levels)
		.map((level) => `bid ${formatPrice(level.price).padStart(12)} ${formatVolume(level.volume).padStart(10)}`);
	return [...asks, ...bids];
};

const DIRECTION_MARK: Record<TradeTick["direction"], string> = {
	up: "+",
	down: "-",
	neutral: " ",
};

/** Newest first. */
export const tradeLines = (trades: readonly TradeTick[], limit = 8): string[] =>
	trades
		.slice(-limit)
		.reverse()
		.map(
			(trade) =>
				`${new Date(trade.timestamp).toISOString().slice(11, 19)} ${DIRECTION_MARK[trade.direction]}${formatPrice(trade.price).padStart(12)} ${formatVolume(trade.volume).padStart(10)}`
		);

const SPARK = "▁▂▃▄▅▆▇█";

/**
 * One-line close-price sparkline over the last `width` candles, `offset`
 * candles back from the newest.
 */
export const sparkline = (candles: readonly Candle[], width: number, offset = 0): string => {
	const end = Math.max(candles.length - offset, 0);
	const window = candles.slice(Math.max(end - width, 0), end);
	if (window.length === 0) {
		return "";
	}
	const closes = window.map((candle) => candle.close);
	const min = Math.min(...closes);
	const span = Math.max(...closes) - min;
	return closes
		.map((close) => {
			const level = span === 0 ? 0 : Math.round(((close - min) / span) * (SPARK.length - 1));
			return SPARK[level] ?? SPARK[0];
		})
		.join("");
};

export const portfolioLines = (portfolio: PortfolioSnapshot | null): string[] => {
	if (!portfolio) {
		return ["portfolio unavailable (no credentials)"];
	}
	if (portfolio.holdings.length === 0) {
		return ["no holdings"];
	}
	return portfolio.holdings.map(
		(holding) =>
			`${holding.asset.padEnd(8)} ${formatVolume(holding.total).padStart(10)} free ${formatVolume(holding.free).padStart(10)} locked ${formatVolume(holding.used).padStart(10)}`
	);
};
