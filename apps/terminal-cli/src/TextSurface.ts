import {
	instrumentCode,
	type BaseLogPayload,
	type InstrumentId,
	type PortfolioSnapshot,
} from "@tapewatch/core";
import type { AlertEvent } from "@tapewatch/alerts";
import type { FeedHealth, MarketStateView } from "@tapewatch/market-state";
import type { DirtyRegion, RenderSurface } from "@tapewatch/render";
import {
	depthLines,
	formatPercent,
	formatPrice,
	portfolioLines,
	quoteLines,
	sparkline,
	tradeLines,
	watchlistRow,
} from "./format";
import type { ViewState } from "./viewState";

/** Read-only handles the surface draws from. */
export interface TerminalView {
	store: MarketStateView;
	health: FeedHealth;
	state(): ViewState;
	/** Reference instruments shown on the status line */
	indexes(): readonly InstrumentId[];
	/** Watchlist in display order */
	order(): InstrumentId[];
	portfolio(): PortfolioSnapshot | null;
	recentAlerts(limit: number): AlertEvent[];
	recentLogs(limit: number): BaseLogPayload[];
}

export interface TextOutput {
	write(chunk: string): unknown;
	columns?: number;
}

const CLEAR_SCREEN = "\u001b[H\u001b[2J";

const KEY_HELP = "j/k move  enter detail  esc back  [ ] period  , . scroll  s sort  r reverse  h hide list  p portfolio  ` logs  q quit";

/**
 * Plain-text renderer. Each region's lines are cached and rebuilt only when
 * that region is redrawn; the screen is then recomposed from the cache.
 */
export class TextSurface implements RenderSurface<TerminalView> {
	private readonly sections = new Map<DirtyRegion, string[]>();

	constructor(private readonly output: TextOutput) {}

	draw(regions: ReadonlySet<DirtyRegion>, view: TerminalView): void {
		for (const region of regions) {
			this.sections.set(region, this.build(region, view));
		}
		this.output.write(`${CLEAR_SCREEN}${this.compose(view.state()).join("\n")}\n`);
	}

	/** Screen text as last composed, without the clear-screen prefix. */
	screen(state: ViewState): string {
		return this.compose(state).join("\n");
	}

	private section(region: DirtyRegion): string[] {
		return this.sections.get(region) ?? [];
	}

	private compose(state: ViewState): string[] {
		const lines: string[] = [...this.section("status"), ""];
		if (state.view === "portfolio") {
			lines.push(...this.section("portfolio"));
		} else {
			if (!state.watchlistHidden) {
				lines.push(...this.section("list"));
			}
			if (state.view !== "watchlist") {
				lines.push(
					"",
					...this.section("detail"),
					...this.section("quote"),
					"",
					...this.section("chart"),
					"",
					...this.section("depth"),
					"",
					...this.section("trades")
				);
			}
		}
		lines.push("", ...this.section("navigation"));
		return lines;
	}

	private build(region: DirtyRegion, view: TerminalView): string[] {
		const state = view.state();
		const detail = state.detail === null ? undefined : view.store.get(state.detail);
		const width = Math.max((this.output.columns ?? 80) - 2, 10);
		switch (region) {
			case "status": {
				const sort = `${state.sort.field}${state.sort.reverse ? " (rev)" : ""}`;
				const indexes = view.indexes().map((instrument) => {
					const quote = view.store.get(instrument)?.quote;
					return `${instrumentCode(instrument)} ${formatPrice(quote?.lastPrice)} ${formatPercent(quote?.changePercent)}`;
				});
				return [
					`tapewatch  ${view.health.snapshot().readyState}  ${view.health.recency().label}  sort ${sort}  period ${state.chartPeriod}`,
					indexes.join("   "),
				];
			}
			case "list":
				return view
					.order()
					.map((instrument) =>
						watchlistRow(instrument, view.store.get(instrument), instrument === state.selected)
					);
			case "detail":
				return state.detail === null ? [] : [`== ${instrumentCode(state.detail)} ==`];
			case "quote":
				return state.detail === null ? [] : quoteLines(detail);
			case "chart": {
				const candles = detail?.candles ?? [];
				const last = candles[candles.length - 1 - state.chartOffset];
				return [
					sparkline(candles, width, state.chartOffset) || "no candles",
					last ? `close ${formatPrice(last.close)}  offset ${state.chartOffset}` : "",
				];
			}
			case "depth":
				return depthLines(detail?.depth);
			case "trades":
				return tradeLines(detail?.trades ?? []);
			case "portfolio":
				return portfolioLines(view.portfolio());
			case "navigation": {
				const lines = view
					.recentAlerts(3)
					.map(
						(event) =>
							`ALERT ${instrumentCode(event.instrument)} ${event.kind} ${event.threshold} (${formatPrice(event.value)})`
					);
				if (state.logPanelVisible) {
					lines.push(
						...view
							.recentLogs(8)
							.map((entry) => `${entry.level.padEnd(5)} ${entry.module} ${entry.event}`)
					);
				}
				lines.push(KEY_HELP);
				return lines;
			}
		}
	}
}
