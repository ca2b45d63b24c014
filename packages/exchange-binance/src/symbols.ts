import {
	instrumentCode,
	type InstrumentId,
	type SubscriptionTopic,
} from "@tapewatch/core";

/** ccxt unified symbol, e.g. "BTC/USDT" for "BTC/USDT.BINANCE". */
export const toMarketSymbol = (instrument: InstrumentId): string =>
	instrumentCode(instrument);

/** Raw venue symbol as it appears in push payloads, e.g. "BTCUSDT". */
export const toVenueSymbol = (instrument: InstrumentId): string =>
	instrumentCode(instrument).replace(/[^A-Za-z0-9]/g, "").toUpperCase();

export const DEFAULT_CANDLE_TIMEFRAME = "1m";

/** Combined-stream names for one instrument, e.g. "btcusdt@ticker". */
export const streamNamesFor = (
	instrument: InstrumentId,
	topics: readonly SubscriptionTopic[],
	candleTimeframe = DEFAULT_CANDLE_TIMEFRAME
): string[] => {
	const symbol = toVenueSymbol(instrument).toLowerCase();
	return topics.map((topic) => {
		switch (topic) {
			case "quote":
				return `${symbol}@ticker`;
			case "depth":
				return `${symbol}@depth10@100ms`;
			case "trades":
				return `${symbol}@trade`;
			case "candle":
				return `${symbol}@kline_${candleTimeframe}`;
		}
	});
};

/**
 * Resolves raw venue symbols from push payloads back to the instrument ids
 * they were subscribed under.
 */
export class BinanceSymbolMap {
	private readonly byVenueSymbol = new Map<string, InstrumentId>();

	register(instruments: readonly InstrumentId[]): void {
		for (const instrument of instruments) {
			this.byVenueSymbol.set(toVenueSymbol(instrument), instrument);
		}
	}

	instrumentFor(venueSymbol: string): InstrumentId | undefined {
		return this.byVenueSymbol.get(venueSymbol.toUpperCase());
	}

	get size(): number {
		return this.byVenueSymbol.size;
	}
}
