import {
	StreamLostError,
	createLogger,
	errorMessage,
	type ChangeNotification,
	type FrameDecoder,
	type ModuleLogger,
	type PushEvent,
	type PushStream,
} from "@tapewatch/core";
import type { FeedHealth, MarketStateStore } from "@tapewatch/market-state";

export interface IngestionStats {
	frames: number;
	applied: number;
	dropped: number;
	decodeFailures: number;
}

export interface PushIngestionLoopOptions {
	stream: PushStream;
	decode: FrameDecoder;
	store: MarketStateStore;
	health?: FeedHealth;
	logger?: ModuleLogger;
}

const FRAME_PREVIEW_LENGTH = 200;

export const applyPushEvent = (
	store: MarketStateStore,
	event: PushEvent
): ChangeNotification | null => {
	switch (event.category) {
		case "quote":
			return store.updateQuote(event.instrument, event.payload);
		case "depth":
			return store.updateDepth(event.instrument, event.payload);
		case "trades":
			return store.updateTrades(event.instrument, event.payload);
		case "candle":
			return store.updateCandle(event.instrument, event.payload, event.timeframe);
	}
};

const abortPromise = (
	signal: AbortSignal
): { promise: Promise<"aborted">; dispose: () => void } => {
	let onAbort: (() => void) | null = null;
	const promise = new Promise<"aborted">((resolve) => {
		if (signal.aborted) {
			resolve("aborted");
			return;
		}
		onAbort = () => resolve("aborted");
		signal.addEventListener("abort", onAbort, { once: true });
	});
	return {
		promise,
		dispose: () => {
			if (onAbort) {
				signal.removeEventListener("abort", onAbort);
			}
		},
	};
};

/**
 * Single consumer of the venue push stream. Frames are decoded and applied
 * to the store one at a time in receipt order; a frame that fails to decode
 * is logged and skipped.
 *
 * `run` resolves when `signal` aborts and rejects with StreamLostError when
 * the stream ends or fails on its own. It never reconnects; that belongs to
 * the stream.
 */
export class PushIngestionLoop {
	private readonly stream: PushStream;
	private readonly decode: FrameDecoder;
	private readonly store: MarketStateStore;
	private readonly health?: FeedHealth;
	private readonly logger: ModuleLogger;
	private readonly counters: IngestionStats = {
		frames: 0,
		applied: 0,
		dropped: 0,
		decodeFailures: 0,
	};
	private running = false;

	constructor(options: PushIngestionLoopOptions) {
		this.stream = options.stream;
		this.decode = options.decode;
		this.store = options.store;
		this.health = options.health;
		this.logger = options.logger ?? createLogger("ingestion");
	}

	stats(): IngestionStats {
		return { ...this.counters };
	}

	async run(signal: AbortSignal): Promise<IngestionStats> {
		if (this.running) {
			throw new Error("PushIngestionLoop already running");
		}
		if (signal.aborted) {
			return this.stats();
		}
		this.running = true;
		this.health?.setState("connecting");
		const iterator = this.stream.frames(signal)[Symbol.asyncIterator]();
		const abort = abortPromise(signal);
		this.logger.info("ingestion_started");

		try {
			for (;;) {
				const next = await Promise.race([iterator.next(), abort.promise]);
				if (next === "aborted") {
					break;
				}
				if (next.done) {
					if (signal.aborted) {
						break;
					}
					throw new StreamLostError("Push stream ended unexpectedly");
				}
				this.handleFrame(next.value);
			}
		} catch (error) {
			if (signal.aborted) {
				this.logger.debug("ingestion_error_after_shutdown", {
					message: errorMessage(error),
				});
			} else {
				const lost =
					error instanceof StreamLostError
						? error
						: new StreamLostError(`Push stream failed: ${errorMessage(error)}`, {
								cause: error,
							});
				this.health?.setState("lost", lost);
				this.logger.error("push_stream_lost", {
					message: lost.message,
					...this.counters,
				});
				throw lost;
			}
		} finally {
			abort.dispose();
			this.running = false;
			iterator.return?.().catch((error: unknown) => {
				this.logger.debug("push_stream_close_failed", {
					message: errorMessage(error),
				});
			});
		}

		this.health?.setState("closed");
		this.logger.info("ingestion_stopped", { ...this.counters });
		return this.stats();
	}

	private handleFrame(frame: string): void {
		this.counters.frames += 1;
		let events: PushEvent[];
		try {
			events = this.decode(frame);
		} catch (error) {
			this.counters.decodeFailures += 1;
			this.logger.warn("push_frame_decode_failed", {
				message: errorMessage(error),
				frame: frame.slice(0, FRAME_PREVIEW_LENGTH),
			});
			return;
		}
		if (events.length === 0) {
			return;
		}
		for (const event of events) {
			if (applyPushEvent(this.store, event)) {
				this.counters.applied += 1;
			} else {
				this.counters.dropped += 1;
			}
		}
		this.health?.recordEvent();
	}
}
