export { TokenBucket } from "./TokenBucket";
export type { TokenBucketOptions } from "./TokenBucket";
export {
	DEFAULT_BACKOFF_SCHEDULE_MS,
	RateGovernor,
	isRateLimitError,
} from "./RateGovernor";
export type {
	RateGovernorOptions,
	RateGovernorStats,
	RateLimitClassifier,
	RatePermit,
} from "./RateGovernor";
export { RateLimitedMarketApi } from "./RateLimitedMarketApi";
