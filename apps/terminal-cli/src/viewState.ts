import type { InstrumentId } from "@tapewatch/core";
import {
	WATCHLIST_SORT_FIELDS,
	type WatchlistSort,
} from "@tapewatch/market-state";
import {
	nextChartPeriod,
	prevChartPeriod,
	restoreView,
	type ChartPeriod,
	type ViewKind,
	type WorkspaceSnapshot,
} from "@tapewatch/workspace";

export interface ViewState {
	view: ViewKind;
	selected: InstrumentId | null;
	detail: InstrumentId | null;
	chartPeriod: ChartPeriod;
	chartOffset: number;
	logPanelVisible: boolean;
	watchlistHidden: boolean;
	sort: WatchlistSort;
	quitRequested: boolean;
}

export type Command =
	| { type: "move"; delta: number }
	| { type: "open_detail" }
	| { type: "back" }
	| { type: "show_portfolio" }
	| { type: "chart_period"; step: 1 | -1 }
	| { type: "scroll_chart"; delta: number }
	| { type: "toggle_log_panel" }
	| { type: "toggle_watchlist" }
	| { type: "cycle_sort" }
	| { type: "reverse_sort" }
	| { type: "quit" };

export interface KeyPress {
	name?: string;
	ctrl?: boolean;
	sequence?: string;
}

/** Terminal key → command; unbound keys map to null. */
export const keyToCommand = (key: KeyPress): Command | null => {
	if (key.ctrl && key.name === "c") {
		return { type: "quit" };
	}
	switch (key.sequence ?? key.name) {
		case "j":
			return { type: "move", delta: 1 };
		case "k":
			return { type: "move", delta: -1 };
		case "[":
			return { type: "chart_period", step: -1 };
		case "]":
			return { type: "chart_period", step: 1 };
		case ",":
			return { type: "scroll_chart", delta: 1 };
		case ".":
			return { type: "scroll_chart", delta: -1 };
		case "`":
			return { type: "toggle_log_panel" };
		case "h":
			return { type: "toggle_watchlist" };
		case "s":
			return { type: "cycle_sort" };
		case "r":
			return { type: "reverse_sort" };
		case "p":
			return { type: "show_portfolio" };
		case "q":
			return { type: "quit" };
	}
	switch (key.name) {
		case "down":
			return { type: "move", delta: 1 };
		case "up":
			return { type: "move", delta: -1 };
		case "return":
		case "enter":
			return { type: "open_detail" };
		case "escape":
			return { type: "back" };
		default:
			return null;
	}
};

export const fromWorkspace = (snapshot: WorkspaceSnapshot): ViewState => ({
	view: restoreView(snapshot),
	selected: snapshot.selectedInstrument,
	detail: snapshot.detailInstrument,
	chartPeriod: snapshot.chartPeriod,
	chartOffset: snapshot.chartOffset,
	logPanelVisible: snapshot.logPanelVisible,
	watchlistHidden: snapshot.watchlistHidden,
	sort: { ...snapshot.watchlistSort },
	quitRequested: false,
});

export const toWorkspace = (
	state: ViewState,
	base: WorkspaceSnapshot
): WorkspaceSnapshot => ({
	...base,
	lastView: state.view,
	selectedInstrument: state.selected,
	detailInstrument: state.detail,
	chartPeriod: state.chartPeriod,
	chartOffset: state.chartOffset,
	logPanelVisible: state.logPanelVisible,
	watchlistHidden: state.watchlistHidden,
	watchlistSort: { ...state.sort },
});

/**
 * Keeps the selection on an instrument that is actually listed: the first
 * one when the previous selection is gone.
 */
export const reconcileSelection = (
	state: ViewState,
	order: readonly InstrumentId[]
): ViewState => {
	if (state.selected !== null && order.includes(state.selected)) {
		return state;
	}
	return { ...state, selected: order[0] ?? null };
};

/**
 * Applies one command. `order` is the watchlist as currently displayed,
 * which is what j/k move through.
 */
export const applyCommand = (
	state: ViewState,
	command: Command,
	order: readonly InstrumentId[]
): ViewState => {
	switch (command.type) {
		case "move": {
			if (order.length === 0) {
				return { ...state, selected: null };
			}
			const current = state.selected === null ? -1 : order.indexOf(state.selected);
			const start = current === -1 ? (command.delta > 0 ? -1 : order.length) : current;
			const idx = Math.min(Math.max(start + command.delta, 0), order.length - 1);
			const selected = order[idx] ?? null;
			return {
				...state,
				selected,
				detail: state.view === "watchlist_detail" ? selected : state.detail,
			};
		}
		case "open_detail":
			if (state.selected === null) {
				return state;
			}
			return {
				...state,
				view: state.watchlistHidden ? "detail" : "watchlist_detail",
				detail: state.selected,
				chartOffset: state.detail === state.selected ? state.chartOffset : 0,
			};
		case "back":
			if (state.view === "watchlist") {
				return state;
			}
			return { ...state, view: "watchlist", watchlistHidden: false };
		case "show_portfolio":
			return { ...state, view: state.view === "portfolio" ? "watchlist" : "portfolio" };
		case "chart_period": {
			const chartPeriod =
				command.step > 0 ? nextChartPeriod(state.chartPeriod) : prevChartPeriod(state.chartPeriod);
			return chartPeriod === state.chartPeriod ? state : { ...state, chartPeriod, chartOffset: 0 };
		}
		case "scroll_chart":
			return { ...state, chartOffset: Math.max(state.chartOffset + command.delta, 0) };
		case "toggle_log_panel":
			return { ...state, logPanelVisible: !state.logPanelVisible };
		case "toggle_watchlist": {
			const watchlistHidden = !state.watchlistHidden;
			let view = state.view;
			if (watchlistHidden && view === "watchlist_detail") {
				view = "detail";
			} else if (!watchlistHidden && view === "detail") {
				view = "watchlist_detail";
			}
			return { ...state, watchlistHidden, view };
		}
		case "cycle_sort": {
			const idx = WATCHLIST_SORT_FIELDS.indexOf(state.sort.field);
			const field = WATCHLIST_SORT_FIELDS[(idx + 1) % WATCHLIST_SORT_FIELDS.length] ?? "default";
			return { ...state, sort: { field, reverse: false } };
		}
		case "reverse_sort":
			return { ...state, sort: { ...state.sort, reverse: !state.sort.reverse } };
		case "quit":
			return { ...state, quitRequested: true };
	}
};
