export type {
	MarketApi,
	PushStream,
	SubscribeOptions,
	SubscriptionTopic,
} from "./MarketApi";
export type { FrameDecoder, PushEvent } from "./PushEvent";
