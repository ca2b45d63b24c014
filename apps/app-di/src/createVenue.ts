import {
	ConfigError,
	type FrameDecoder,
	type TapewatchConfig,
} from "@tapewatch/core";
import {
	BinanceMarketApi,
	BinancePushStream,
	BinanceSymbolMap,
	createBinanceDecoder,
	isBinanceRateLimited,
} from "@tapewatch/exchange-binance";
import type { RateLimitClassifier } from "@tapewatch/rate-governor";

/** Unthrottled venue collaborators; callers wrap `api` in a governor. */
export interface VenueBindings {
	venue: string;
	api: BinanceMarketApi;
	stream: BinancePushStream;
	decode: FrameDecoder;
	rateLimitClassifiers: RateLimitClassifier[];
}

const isBinanceVenue = (venue: string): boolean =>
	venue.toLowerCase().includes("binance");

export const createVenue = (config: TapewatchConfig): VenueBindings => {
	const { terminal, env } = config;
	if (!isBinanceVenue(terminal.venue)) {
		throw new ConfigError(`Unsupported venue: ${terminal.venue}`);
	}
	const symbols = new BinanceSymbolMap();
	symbols.register([...terminal.instruments, ...terminal.indexes]);
	const stream = new BinancePushStream({
		maxReconnectAttempts: terminal.stream.maxReconnectAttempts,
		reconnectDelayMs: terminal.stream.reconnectDelayMs,
	});
	const api = new BinanceMarketApi({
		apiKey: env.binanceApiKey,
		secret: env.binanceApiSecret,
		pushStream: stream,
		symbols,
	});
	return {
		venue: "binance",
		api,
		stream,
		decode: createBinanceDecoder(symbols),
		rateLimitClassifiers: [isBinanceRateLimited],
	};
};
