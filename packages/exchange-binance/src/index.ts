export {
	BinanceMarketApi,
	isBinanceRateLimited,
	resolveCredential,
} from "./BinanceMarketApi";
export type { BinanceMarketApiOptions } from "./BinanceMarketApi";
export { BINANCE_STREAM_ENDPOINT, BinancePushStream } from "./BinancePushStream";
export type { BinancePushStreamOptions } from "./BinancePushStream";
export { createBinanceDecoder } from "./decoder";
export type { BinanceDecoderOptions } from "./decoder";
export {
	BINANCE_MARKET,
	balanceToPortfolio,
	ohlcvToCandle,
	orderBookToDepth,
	tickerToQuote,
	tradeToTick,
} from "./mappers";
export {
	BinanceSymbolMap,
	DEFAULT_CANDLE_TIMEFRAME,
	streamNamesFor,
	toMarketSymbol,
	toVenueSymbol,
} from "./symbols";
