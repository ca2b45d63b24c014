import WebSocket from "ws";
import {
	StreamLostError,
	createLogger,
	errorMessage,
	type ModuleLogger,
	type PushStream,
} from "@tapewatch/core";

export const BINANCE_STREAM_ENDPOINT = "wss://stream.binance.com:9443/stream";

export interface BinancePushStreamOptions {
	url?: string;
	/**
	 * Reconnects tolerated without a frame arriving in between before the
	 * stream is declared lost (default 5)
	 */
	maxReconnectAttempts?: number;
	reconnectDelayMs?: number;
	/** Frames buffered while the consumer is busy; the oldest are dropped beyond it */
	maxBufferedFrames?: number;
	logger?: ModuleLogger;
}

/**
 * Binance combined stream over one websocket. Subscriptions are sent as
 * SUBSCRIBE/UNSUBSCRIBE control messages and replayed after every reconnect.
 */
export class BinancePushStream implements PushStream {
	private readonly url: string;
	private readonly maxReconnectAttempts: number;
	private readonly reconnectDelayMs: number;
	private readonly maxBufferedFrames: number;
	private readonly logger: ModuleLogger;
	private readonly streams = new Set<string>();
	private ws: WebSocket | null = null;
	private running = false;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private reconnectAttempts = 0;
	private requestId = 0;
	private buffer: string[] = [];
	private droppedFrames = 0;
	private failure: StreamLostError | null = null;
	private wakeup: (() => void) | null = null;

	constructor(options: BinancePushStreamOptions = {}) {
		this.url = options.url ?? BINANCE_STREAM_ENDPOINT;
		this.maxReconnectAttempts = options.maxReconnectAttempts ?? 5;
		this.reconnectDelayMs = options.reconnectDelayMs ?? 1_000;
		this.maxBufferedFrames = options.maxBufferedFrames ?? 10_000;
		this.logger = options.logger ?? createLogger("binance-stream");
	}

	subscribe(streams: readonly string[]): void {
		const added = streams.filter((stream) => !this.streams.has(stream));
		for (const stream of added) {
			this.streams.add(stream);
		}
		this.sendControl("SUBSCRIBE", added);
	}

	unsubscribe(streams: readonly string[]): void {
		const removed = streams.filter((stream) => this.streams.delete(stream));
		this.sendControl("UNSUBSCRIBE", removed);
	}

	activeStreams(): string[] {
		return Array.from(this.streams);
	}

	async *frames(signal: AbortSignal): AsyncGenerator<string> {
		if (this.running) {
			throw new Error("Binance push stream is already being consumed");
		}
		this.running = true;
		this.failure = null;
		this.buffer = [];
		this.reconnectAttempts = 0;
		const onAbort = (): void => this.wake();
		signal.addEventListener("abort", onAbort, { once: true });
		this.connect();

		try {
			while (!signal.aborted) {
				const frame = this.buffer.shift();
				if (frame !== undefined) {
					yield frame;
					continue;
				}
				if (this.failure) {
					throw this.failure;
				}
				await new Promise<void>((resolve) => {
					this.wakeup = resolve;
				});
			}
		} finally {
			signal.removeEventListener("abort", onAbort);
			this.stop();
		}
	}

	private connect(): void {
		if (!this.running) {
			return;
		}

		this.ws = new WebSocket(this.url);

		this.ws.on("open", () => {
			this.logger.info("binance_stream_connected", {
				url: this.url,
				streams: this.streams.size,
			});
			this.sendControl("SUBSCRIBE", Array.from(this.streams));
		});

		this.ws.on("message", (payload) => {
			this.reconnectAttempts = 0;
			this.enqueue(payload.toString());
		});

		this.ws.on("close", () => {
			this.logger.warn("binance_stream_disconnected", {
				url: this.url,
				attempts: this.reconnectAttempts,
			});
			this.scheduleReconnect();
		});

		this.ws.on("error", (error) => {
			this.logger.error("binance_stream_error", {
				url: this.url,
				message: errorMessage(error),
			});
		});
	}

	private scheduleReconnect(): void {
		if (!this.running || this.reconnectTimer) {
			return;
		}
		if (this.reconnectAttempts >= this.maxReconnectAttempts) {
			this.failure = new StreamLostError(
				`Binance stream disconnected; ${this.maxReconnectAttempts} reconnect attempts failed`
			);
			this.cleanupWs();
			this.wake();
			return;
		}
		this.reconnectAttempts += 1;
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.cleanupWs();
			this.connect();
		}, this.reconnectDelayMs);
	}

	private sendControl(method: "SUBSCRIBE" | "UNSUBSCRIBE", params: readonly string[]): void {
		if (params.length === 0 || this.ws?.readyState !== WebSocket.OPEN) {
			return;
		}
		this.requestId += 1;
		this.ws.send(JSON.stringify({ method, params, id: this.requestId }));
	}

	private enqueue(frame: string): void {
		this.buffer.push(frame);
		if (this.buffer.length > this.maxBufferedFrames) {
			this.buffer.shift();
			this.droppedFrames += 1;
			if (this.droppedFrames % 1_000 === 1) {
				this.logger.warn("binance_stream_backlog", { dropped: this.droppedFrames });
			}
		}
		this.wake();
	}

	private wake(): void {
		const wakeup = this.wakeup;
		this.wakeup = null;
		wakeup?.();
	}

	private stop(): void {
		this.running = false;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		this.cleanupWs();
		this.buffer = [];
		this.wakeup = null;
	}

	private cleanupWs(): void {
		if (this.ws) {
			this.ws.removeAllListeners();
			// terminating a socket mid-handshake still emits "error"
			this.ws.on("error", (error) => {
				this.logger.debug("binance_stream_terminated", { message: errorMessage(error) });
			});
			this.ws.terminate();
			this.ws = null;
		}
	}
}
