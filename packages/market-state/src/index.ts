export { MarketStateStore } from "./MarketStateStore";
export type {
	ChangeListener,
	MarketStateStoreOptions,
	MarketStateView,
} from "./MarketStateStore";
export { mergeCandle, mergeCandles } from "./candleFragment";
export type { CandleMergeResult } from "./candleFragment";
export { FeedHealth } from "./FeedHealth";
export type {
	FeedHealthOptions,
	FeedHealthSnapshot,
	FeedReadyState,
	FeedRecency,
} from "./FeedHealth";
export { WATCHLIST_SORT_FIELDS, Watchlist, dedupeInstruments } from "./Watchlist";
export type { WatchlistOptions, WatchlistSort, WatchlistSortField } from "./Watchlist";
