import readline from "node:readline";
import {
	createLogger,
	errorMessage,
	getRecentLogs,
	type ChangeNotification,
	type InstrumentId,
	type ModuleLogger,
	type PortfolioSnapshot,
	type SubscriptionTopic,
	type TapewatchConfig,
} from "@tapewatch/core";
import { AlertEngine, AlertLog, RuleStorage } from "@tapewatch/alerts";
import type { MarketContext } from "@tapewatch/app-di";
import { PushIngestionLoop } from "@tapewatch/ingestion";
import { FeedHealth, MarketStateStore, Watchlist } from "@tapewatch/market-state";
import { Dispatcher, RenderScheduler } from "@tapewatch/render";
import {
	WorkspaceStore,
	chartPeriodToTimeframe,
	periodForTimeframe,
} from "@tapewatch/workspace";
import type { DataFiles } from "./paths";
import { TextSurface, type TerminalView, type TextOutput } from "./TextSurface";
import {
	applyCommand,
	fromWorkspace,
	keyToCommand,
	reconcileSelection,
	toWorkspace,
	type Command,
	type KeyPress,
	type ViewState,
} from "./viewState";

/** Keyboard source; raw mode is switched on only for a TTY. */
export interface KeyInput extends NodeJS.ReadableStream {
	isTTY?: boolean;
	setRawMode?(mode: boolean): unknown;
}

export interface WatchIo {
	input: KeyInput;
	output: TextOutput;
}

export interface WatchOptions {
	config: TapewatchConfig;
	context: MarketContext;
	files: DataFiles;
	io: WatchIo;
	logger?: ModuleLogger;
}

type AppEvent =
	| { type: "key"; command: Command }
	| { type: "change"; change: ChangeNotification }
	| { type: "alert" }
	| { type: "status" }
	| { type: "stream_lost"; error: unknown }
	| { type: "tick" };

const DETAIL_TOPICS: readonly SubscriptionTopic[] = ["depth", "trades", "candle"];
const CANDLE_HISTORY = 240;
const STATUS_REFRESH_MS = 1_000;

interface DetailFocus {
	instrument: InstrumentId;
	timeframe: string;
}

/**
 * Interactive watch mode. Resolves with the exit code once the user quits
 * or the process is signalled, after the workspace and rules are saved.
 */
export const runWatch = async (options: WatchOptions): Promise<number> => {
	const { config, context, files, io } = options;
	const logger = options.logger ?? createLogger("watch");
	const { terminal } = config;
	const controller = new AbortController();
	const { signal } = controller;
	const api = context.api.withSignal(signal);
	const onSignal = (): void => controller.abort();
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);

	const store = new MarketStateStore();
	const health = new FeedHealth();
	const workspaceStore = new WorkspaceStore({
		filePath: files.workspace,
		saveTimeoutMs: terminal.workspace.saveTimeoutMs,
	});
	const workspace = workspaceStore.load().snapshot;
	const watchlist = new Watchlist({
		groupId: workspace.watchlistGroupId ?? "default",
		instruments: terminal.instruments,
		sort: workspace.watchlistSort,
		hidden: workspace.watchlistHidden,
	});
	const engine = new AlertEngine({
		store,
		storage: new RuleStorage(files.rules),
		history: new AlertLog(files.history),
		defaultCooldownSeconds: terminal.alerts.defaultCooldownSeconds,
	});
	engine.load();

	let state: ViewState = fromWorkspace(workspace);
	if (workspace.savedAt === 0) {
		state = { ...state, chartPeriod: periodForTimeframe(terminal.chartTimeframe) ?? state.chartPeriod };
	}
	let portfolio: PortfolioSnapshot | null = null;
	let focus: DetailFocus | null = null;
	const tasks = new Set<Promise<void>>();

	const track = (name: string, task: Promise<void>): void => {
		const tracked = task.catch((error: unknown) => {
			if (signal.aborted) {
				logger.debug("watch_task_abandoned", { task: name, message: errorMessage(error) });
				return;
			}
			health.recordRefreshFailure(error);
			logger.warn("watch_task_failed", { task: name, message: errorMessage(error) });
		});
		tasks.add(tracked);
		void tracked.finally(() => tasks.delete(tracked));
	};

	const surface = new TextSurface(io.output);
	const view: TerminalView = {
		store,
		health,
		state: () => state,
		indexes: () => terminal.indexes,
		order: () => watchlist.sorted(store),
		portfolio: () => portfolio,
		recentAlerts: (limit) => engine.recentEvents(limit),
		recentLogs: (limit) => getRecentLogs(limit),
	};
	const scheduler = new RenderScheduler<TerminalView>({
		surface,
		view,
		minIntervalMs: terminal.render.minIntervalMs,
		tickIntervalMs: terminal.render.tickIntervalMs,
	});

	const refocus = async (): Promise<void> => {
		const timeframe = chartPeriodToTimeframe(state.chartPeriod);
		const next: DetailFocus | null =
			state.view === "watchlist" || state.view === "portfolio" || state.detail === null
				? null
				: { instrument: state.detail, timeframe };
		if (focus?.instrument === next?.instrument && focus?.timeframe === next?.timeframe) {
			return;
		}
		const previous = focus;
		focus = next;
		if (previous) {
			await api.unsubscribe([previous.instrument], DETAIL_TOPICS, {
				candleTimeframe: previous.timeframe,
			});
		}
		if (!next) {
			return;
		}
		// Bars of the old interval still in flight are dropped from here on.
		store.replaceCandles(next.instrument, [], next.timeframe);
		await api.subscribe([next.instrument], DETAIL_TOPICS, {
			candleTimeframe: next.timeframe,
		});
		const [candles, depth, trades] = await Promise.all([
			api.fetchCandles(next.instrument, next.timeframe, CANDLE_HISTORY),
			api.fetchDepth(next.instrument),
			api.fetchTrades(next.instrument),
		]);
		if (focus?.instrument !== next.instrument || focus.timeframe !== next.timeframe) {
			return;
		}
		store.replaceCandles(next.instrument, candles, next.timeframe);
		store.updateDepth(next.instrument, depth);
		store.updateTrades(next.instrument, trades);
	};

	const dispatcher = new Dispatcher<AppEvent>({
		handler: async (event) => {
			switch (event.type) {
				case "key": {
					const before = state;
					state = applyCommand(state, event.command, watchlist.sorted(store));
					watchlist.setSort(state.sort);
					if (watchlist.hidden !== state.watchlistHidden) {
						watchlist.toggleHidden();
					}
					if (state.quitRequested) {
						controller.abort();
						return;
					}
					if (
						before.view !== state.view ||
						before.detail !== state.detail ||
						before.chartPeriod !== state.chartPeriod
					) {
						track("refocus", refocus());
					}
					scheduler.markInput();
					return;
				}
				case "change":
					scheduler.notify(event.change);
					return;
				case "alert":
					scheduler.mark(["navigation"]);
					return;
				case "status":
					scheduler.mark(["status"]);
					return;
				case "stream_lost":
					health.setState("lost", event.error);
					scheduler.mark(["status"]);
					return;
				case "tick":
					await scheduler.tick();
					return;
			}
		},
	});

	const unsubscribeStore = store.subscribe((change) => {
		engine.evaluate(change);
		dispatcher.post("data", { type: "change", change });
	});
	const unsubscribeAlerts = engine.onAlert(() => {
		dispatcher.post("data", { type: "alert" });
	});

	const allInstruments = Array.from(new Set([...terminal.instruments, ...terminal.indexes]));
	allInstruments.forEach((instrument) => store.track(instrument));

	try {
		const quotes = await api.fetchQuotes(allInstruments);
		for (const [instrument, quote] of quotes) {
			store.updateQuote(instrument, quote);
		}
	} catch (error) {
		health.recordRefreshFailure(error);
		logger.warn("quote_seed_failed", { message: errorMessage(error) });
	}
	if (context.hasCredentials) {
		try {
			portfolio = await api.fetchPortfolio();
			const held = portfolio.holdings.flatMap((holding) =>
				holding.instrument === undefined ? [] : [holding.instrument]
			);
			watchlist.fullLoad(terminal.instruments, held);
		} catch (error) {
			logger.warn("portfolio_fetch_failed", { message: errorMessage(error) });
		}
	}
	const watched = Array.from(new Set([...watchlist.instruments, ...terminal.indexes]));
	try {
		await api.subscribe(watched, ["quote"]);
	} catch (error) {
		health.recordRefreshFailure(error);
		logger.warn("quote_subscribe_failed", {
			instruments: watched.length,
			message: errorMessage(error),
		});
	}
	state = reconcileSelection(state, watchlist.sorted(store));
	track("refocus", refocus());

	const ingestionLoop = new PushIngestionLoop({
		stream: context.stream,
		decode: context.decode,
		store,
		health,
	});
	const ingestion = ingestionLoop.run(signal).catch((error: unknown) => {
		dispatcher.post("fatal", { type: "stream_lost", error });
		return ingestionLoop.stats();
	});

	const onKeypress = (_chunk: string | undefined, key: KeyPress | undefined): void => {
		const command = keyToCommand(key ?? {});
		if (command) {
			dispatcher.post("input", { type: "key", command });
		}
	};
	readline.emitKeypressEvents(io.input);
	if (io.input.isTTY) {
		io.input.setRawMode?.(true);
	}
	io.input.on("keypress", onKeypress);
	io.input.resume();

	const statusTimer = setInterval(() => {
		dispatcher.post("data", { type: "status" });
	}, STATUS_REFRESH_MS);

	logger.info("watch_started", {
		venue: context.venue,
		instruments: watched.length,
		view: state.view,
	});
	scheduler.markInput();
	await scheduler.start(signal, () => {
		dispatcher.post("tick", { type: "tick" });
	});

	clearInterval(statusTimer);
	process.off("SIGINT", onSignal);
	process.off("SIGTERM", onSignal);
	io.input.off("keypress", onKeypress);
	if (io.input.isTTY) {
		io.input.setRawMode?.(false);
	}
	io.input.pause();

	const ingestionStats = await ingestion;
	unsubscribeStore();
	unsubscribeAlerts();
	await dispatcher.idle();
	dispatcher.close();

	const saved = await workspaceStore.save(
		toWorkspace(state, { ...workspace, watchlistGroupId: watchlist.groupId })
	);
	try {
		engine.save();
	} catch (error) {
		logger.error("alert_rules_save_failed", { message: errorMessage(error) });
	}
	// Venue calls reject on abort, so this only waits for their catch handlers.
	await Promise.all(tasks);
	logger.info("watch_stopped", {
		workspaceSaved: saved,
		ingestion: ingestionStats,
		render: scheduler.stats(),
		rateLimit: context.governor.stats(),
	});
	return 0;
};
