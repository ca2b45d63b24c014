import type {
	FrameDecoder,
	PushStream,
	TapewatchConfig,
} from "@tapewatch/core";
import { RateGovernor, RateLimitedMarketApi } from "@tapewatch/rate-governor";
import { createVenue } from "./createVenue";

/**
 * Everything that talks to the venue, built once per process and passed
 * down explicitly. `api` is already behind the governor; bind it to a
 * session's signal with `withSignal`.
 */
export interface MarketContext {
	venue: string;
	api: RateLimitedMarketApi;
	governor: RateGovernor;
	stream: PushStream;
	decode: FrameDecoder;
	hasCredentials: boolean;
}

export const createMarketContext = (config: TapewatchConfig): MarketContext => {
	const venue = createVenue(config);
	const governor = new RateGovernor({
		tokensPerSecond: config.terminal.rateLimit.tokensPerSecond,
		maxBurst: config.terminal.rateLimit.maxBurst,
		classifiers: venue.rateLimitClassifiers,
	});
	return {
		venue: venue.venue,
		api: new RateLimitedMarketApi(venue.api, governor),
		governor,
		stream: venue.stream,
		decode: venue.decode,
		hasCredentials: venue.api.hasCredentials(),
	};
};
