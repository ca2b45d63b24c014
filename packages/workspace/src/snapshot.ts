import {
	isInstrumentId,
	isRecord,
	type InstrumentId,
} from "@tapewatch/core";
import {
	WATCHLIST_SORT_FIELDS,
	type WatchlistSort,
	type WatchlistSortField,
} from "@tapewatch/market-state";
import { DEFAULT_CHART_PERIOD, isChartPeriod, type ChartPeriod } from "./chartPeriod";

export const WORKSPACE_VERSION = 1;

export const VIEW_KINDS = ["watchlist", "watchlist_detail", "detail", "portfolio"] as const;

export type ViewKind = (typeof VIEW_KINDS)[number];

export interface WorkspaceSnapshot {
	version: typeof WORKSPACE_VERSION;
	savedAt: number;
	lastView: ViewKind;
	watchlistGroupId: string | null;
	watchlistSort: WatchlistSort;
	watchlistHidden: boolean;
	selectedInstrument: InstrumentId | null;
	detailInstrument: InstrumentId | null;
	chartPeriod: ChartPeriod;
	/** Candles scrolled back from the latest one */
	chartOffset: number;
	logPanelVisible: boolean;
}

export const defaultWorkspace = (): WorkspaceSnapshot => ({
	version: WORKSPACE_VERSION,
	savedAt: 0,
	lastView: "watchlist",
	watchlistGroupId: null,
	watchlistSort: { field: "default", reverse: false },
	watchlistHidden: false,
	selectedInstrument: null,
	detailInstrument: null,
	chartPeriod: DEFAULT_CHART_PERIOD,
	chartOffset: 0,
	logPanelVisible: false,
});

const isViewKind = (value: unknown): value is ViewKind =>
	typeof value === "string" && VIEW_KINDS.some((kind) => kind === value);

const isSortField = (value: unknown): value is WatchlistSortField =>
	typeof value === "string" && WATCHLIST_SORT_FIELDS.some((field) => field === value);

const isNullableString = (value: unknown): value is string | null =>
	value === null || typeof value === "string";

const isNullableInstrument = (value: unknown): value is InstrumentId | null =>
	value === null || isInstrumentId(value);

/** A detail view with nothing to show falls back to the watchlist. */
export const restoreView = (snapshot: WorkspaceSnapshot): ViewKind => {
	if (
		(snapshot.lastView === "detail" || snapshot.lastView === "watchlist_detail") &&
		snapshot.detailInstrument === null
	) {
		return "watchlist";
	}
	return snapshot.lastView;
};

export type WorkspaceParseResult =
	| { ok: true; snapshot: WorkspaceSnapshot }
	| { ok: false; reason: string };

export const parseWorkspace = (raw: unknown): WorkspaceParseResult => {
	if (!isRecord(raw)) {
		return { ok: false, reason: "workspace must be a JSON object" };
	}
	if (raw.version !== WORKSPACE_VERSION) {
		return { ok: false, reason: `unsupported workspace version: ${String(raw.version)}` };
	}
	const sort = raw.watchlistSort;
	const {
		savedAt,
		lastView,
		watchlistGroupId,
		watchlistHidden,
		selectedInstrument,
		detailInstrument,
		chartPeriod,
		chartOffset,
		logPanelVisible,
	} = raw;

	if (typeof savedAt !== "number" || !Number.isFinite(savedAt)) {
		return { ok: false, reason: "savedAt must be a timestamp" };
	}
	if (!isViewKind(lastView)) {
		return { ok: false, reason: "lastView is not a known view" };
	}
	if (!isNullableString(watchlistGroupId)) {
		return { ok: false, reason: "watchlistGroupId must be a string or null" };
	}
	if (!isRecord(sort) || !isSortField(sort.field) || typeof sort.reverse !== "boolean") {
		return { ok: false, reason: "watchlistSort is invalid" };
	}
	if (typeof watchlistHidden !== "boolean" || typeof logPanelVisible !== "boolean") {
		return { ok: false, reason: "watchlistHidden and logPanelVisible must be booleans" };
	}
	if (!isNullableInstrument(selectedInstrument) || !isNullableInstrument(detailInstrument)) {
		return { ok: false, reason: "selected/detail instrument is not a valid instrument id" };
	}
	if (!isChartPeriod(chartPeriod)) {
		return { ok: false, reason: "chartPeriod is not a known period" };
	}
	if (typeof chartOffset !== "number" || !Number.isInteger(chartOffset) || chartOffset < 0) {
		return { ok: false, reason: "chartOffset must be a non-negative integer" };
	}

	const snapshot: WorkspaceSnapshot = {
		version: WORKSPACE_VERSION,
		savedAt,
		lastView,
		watchlistGroupId,
		watchlistSort: { field: sort.field, reverse: sort.reverse },
		watchlistHidden,
		selectedInstrument,
		detailInstrument,
		chartPeriod,
		chartOffset,
		logPanelVisible,
	};
	return { ok: true, snapshot };
};
