import {
	instrumentCode,
	marketPriority,
	type InstrumentId,
	type MarketSnapshot,
} from "@tapewatch/core";
import type { MarketStateView } from "./MarketStateStore";

export type WatchlistSortField = "default" | "code" | "price" | "change" | "volume";

export const WATCHLIST_SORT_FIELDS: readonly WatchlistSortField[] = [
	"default",
	"code",
	"price",
	"change",
	"volume",
];

export interface WatchlistSort {
	field: WatchlistSortField;
	reverse: boolean;
}

export interface WatchlistOptions {
	groupId?: string;
	instruments?: readonly InstrumentId[];
	sort?: WatchlistSort;
	hidden?: boolean;
}

export const dedupeInstruments = (
	instruments: readonly InstrumentId[]
): InstrumentId[] => Array.from(new Set(instruments));

const compareDefault = (
	a: InstrumentId,
	b: InstrumentId,
	snapshots: Map<InstrumentId, MarketSnapshot>
): number => {
	const aRegular = snapshots.get(a)?.quote?.tradeSession === "regular" ? 0 : 1;
	const bRegular = snapshots.get(b)?.quote?.tradeSession === "regular" ? 0 : 1;
	if (aRegular !== bRegular) {
		return aRegular - bRegular;
	}
	const byMarket = marketPriority(a) - marketPriority(b);
	if (byMarket !== 0) {
		return byMarket;
	}
	return instrumentCode(a).localeCompare(instrumentCode(b));
};

const metric = (
	snapshot: MarketSnapshot | undefined,
	field: "price" | "change" | "volume"
): number | undefined => {
	const quote = snapshot?.quote;
	if (!quote) {
		return undefined;
	}
	switch (field) {
		case "price":
			return quote.lastPrice;
		case "change":
			return quote.changePercent;
		case "volume":
			return quote.volume;
	}
};

/**
 * The user's instrument list for one group. Order is insertion order until
 * a sort other than "default" is chosen; sorting never reorders the stored
 * list.
 */
export class Watchlist {
	readonly groupId: string;
	private items: InstrumentId[];
	private sortSettings: WatchlistSort;
	private hiddenFlag: boolean;

	constructor(options: WatchlistOptions = {}) {
		this.groupId = options.groupId ?? "default";
		this.items = dedupeInstruments(options.instruments ?? []);
		this.sortSettings = options.sort ?? { field: "default", reverse: false };
		this.hiddenFlag = options.hidden ?? false;
	}

	get instruments(): readonly InstrumentId[] {
		return this.items;
	}

	get sort(): WatchlistSort {
		return { ...this.sortSettings };
	}

	get hidden(): boolean {
		return this.hiddenFlag;
	}

	load(instruments: readonly InstrumentId[]): void {
		this.items = dedupeInstruments(instruments);
	}

	/** Watchlist plus any held assets not already on it. */
	fullLoad(
		instruments: readonly InstrumentId[],
		holdings: readonly InstrumentId[]
	): void {
		this.items = dedupeInstruments([...instruments, ...holdings]);
	}

	add(instrument: InstrumentId): boolean {
		if (this.items.includes(instrument)) {
			return false;
		}
		this.items = [...this.items, instrument];
		return true;
	}

	remove(instrument: InstrumentId): boolean {
		const next = this.items.filter((item) => item !== instrument);
		const removed = next.length !== this.items.length;
		this.items = next;
		return removed;
	}

	setSort(sort: WatchlistSort): void {
		this.sortSettings = { ...sort };
	}

	toggleHidden(): boolean {
		this.hiddenFlag = !this.hiddenFlag;
		return this.hiddenFlag;
	}

	/**
	 * Display order. "default" puts instruments in their regular session
	 * first, then orders by market (US, HK, SH/SZ, SG, others) and code.
	 * Numeric fields sort high to low with instruments lacking data last.
	 */
	sorted(view: MarketStateView): InstrumentId[] {
		const snapshots = view.getMany(this.items);
		const { field, reverse } = this.sortSettings;
		const ordered = [...this.items];
		if (field === "default") {
			ordered.sort((a, b) => compareDefault(a, b, snapshots));
		} else if (field === "code") {
			ordered.sort((a, b) => instrumentCode(a).localeCompare(instrumentCode(b)));
		} else {
			ordered.sort((a, b) => {
				const av = metric(snapshots.get(a), field);
				const bv = metric(snapshots.get(b), field);
				if (av === undefined || bv === undefined) {
					return (av === undefined ? 1 : 0) - (bv === undefined ? 1 : 0);
				}
				return bv - av;
			});
		}
		return reverse ? ordered.reverse() : ordered;
	}
}
