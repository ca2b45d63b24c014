import { describe, expect, it } from "vitest";
import { defaultWorkspace } from "@tapewatch/workspace";
import {
	applyCommand,
	fromWorkspace,
	keyToCommand,
	reconcileSelection,
	toWorkspace,
	type ViewState,
} from "./viewState";

const ORDER = ["BTC/USDT.BINANCE", "ETH/USDT.BINANCE", "SOL/USDT.BINANCE"];

const initial = (): ViewState => fromWorkspace(defaultWorkspace());

describe("keyToCommand", () => {
	it("maps the documented keys", () => {
		expect(keyToCommand({ name: "j", sequence: "j" })).toEqual({ type: "move", delta: 1 });
		expect(keyToCommand({ name: "return", sequence: "\r" })).toEqual({ type: "open_detail" });
		expect(keyToCommand({ name: "escape", sequence: "\u001b" })).toEqual({ type: "back" });
		expect(keyToCommand({ sequence: "]" })).toEqual({ type: "chart_period", step: 1 });
		expect(keyToCommand({ sequence: "`" })).toEqual({ type: "toggle_log_panel" });
		expect(keyToCommand({ name: "c", ctrl: true, sequence: "\u0003" })).toEqual({ type: "quit" });
		expect(keyToCommand({ name: "x", sequence: "x" })).toBeNull();
	});
});

describe("fromWorkspace", () => {
	it("opens the watchlist when the saved detail view has no instrument", () => {
		const state = fromWorkspace({
			...defaultWorkspace(),
			lastView: "detail",
			detailInstrument: null,
		});
		expect(state.view).toBe("watchlist");
	});
});

describe("applyCommand", () => {
	it("moves the selection within the displayed order and clamps at the ends", () => {
		let state = applyCommand(initial(), { type: "move", delta: 1 }, ORDER);
		expect(state.selected).toBe("BTC/USDT.BINANCE");
		state = applyCommand(state, { type: "move", delta: 1 }, ORDER);
		state = applyCommand(state, { type: "move", delta: 1 }, ORDER);
		state = applyCommand(state, { type: "move", delta: 1 }, ORDER);
		expect(state.selected).toBe("SOL/USDT.BINANCE");
		expect(applyCommand(initial(), { type: "move", delta: -1 }, ORDER).selected).toBe(
			"SOL/USDT.BINANCE"
		);
	});

	it("opens detail beside the watchlist and follows the selection there", () => {
		let state = reconcileSelection(initial(), ORDER);
		state = applyCommand(state, { type: "open_detail" }, ORDER);
		expect(state).toMatchObject({ view: "watchlist_detail", detail: "BTC/USDT.BINANCE" });

		state = applyCommand(state, { type: "move", delta: 1 }, ORDER);
		expect(state.detail).toBe("ETH/USDT.BINANCE");

		state = applyCommand(state, { type: "back" }, ORDER);
		expect(state.view).toBe("watchlist");
	});

	it("switches between full detail and split view when hiding the watchlist", () => {
		let state = applyCommand(reconcileSelection(initial(), ORDER), { type: "open_detail" }, ORDER);
		state = applyCommand(state, { type: "toggle_watchlist" }, ORDER);
		expect(state).toMatchObject({ view: "detail", watchlistHidden: true });
		state = applyCommand(state, { type: "toggle_watchlist" }, ORDER);
		expect(state).toMatchObject({ view: "watchlist_detail", watchlistHidden: false });
	});

	it("steps the chart period and resets the scroll offset", () => {
		let state = applyCommand(initial(), { type: "scroll_chart", delta: 5 }, ORDER);
		expect(state.chartOffset).toBe(5);
		state = applyCommand(state, { type: "chart_period", step: 1 }, ORDER);
		expect(state).toMatchObject({ chartPeriod: "week", chartOffset: 0 });
		state = applyCommand(state, { type: "scroll_chart", delta: -3 }, ORDER);
		expect(state.chartOffset).toBe(0);
	});

	it("cycles sort fields and toggles direction", () => {
		let state = applyCommand(initial(), { type: "cycle_sort" }, ORDER);
		expect(state.sort).toEqual({ field: "code", reverse: false });
		state = applyCommand(state, { type: "reverse_sort" }, ORDER);
		state = applyCommand(state, { type: "cycle_sort" }, ORDER);
		expect(state.sort).toEqual({ field: "price", reverse: false });
	});

	it("round-trips through the workspace snapshot", () => {
		const base = defaultWorkspace();
		let state = reconcileSelection(fromWorkspace(base), ORDER);
		state = applyCommand(state, { type: "open_detail" }, ORDER);
		state = applyCommand(state, { type: "toggle_log_panel" }, ORDER);

		const saved = toWorkspace(state, base);
		expect(saved).toMatchObject({
			lastView: "watchlist_detail",
			selectedInstrument: "BTC/USDT.BINANCE",
			detailInstrument: "BTC/USDT.BINANCE",
			logPanelVisible: true,
		});
		expect(fromWorkspace(saved)).toEqual(state);
	});
});
