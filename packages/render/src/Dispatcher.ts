import { createLogger, errorMessage, type ModuleLogger } from "@tapewatch/core";

export type DispatchLane = "input" | "fatal" | "data" | "tick";

/** Highest priority first. */
export const LANE_PRIORITY: readonly DispatchLane[] = ["input", "fatal", "data", "tick"];

export type DispatchHandler<TEvent> = (
	event: TEvent,
	lane: DispatchLane
) => void | Promise<void>;

export interface DispatcherOptions<TEvent> {
	handler: DispatchHandler<TEvent>;
	capacity?: Partial<Record<DispatchLane, number>>;
	/** Lanes that keep only their newest pending event (default: tick) */
	coalesce?: readonly DispatchLane[];
	logger?: ModuleLogger;
}

const DEFAULT_CAPACITY: Record<DispatchLane, number> = {
	input: 256,
	fatal: 16,
	data: 10_000,
	tick: 1,
};

/**
 * Merges the app's event sources into one consumer. Events are handled one
 * at a time; the next one is always taken from the highest-priority lane
 * that has anything pending (input > fatal > data > tick), FIFO within a
 * lane.
 */
export class Dispatcher<TEvent> {
	private readonly handler: DispatchHandler<TEvent>;
	private readonly capacity: Record<DispatchLane, number>;
	private readonly coalesce: ReadonlySet<DispatchLane>;
	private readonly logger: ModuleLogger;
	private readonly lanes: Record<DispatchLane, TEvent[]> = {
		input: [],
		fatal: [],
		data: [],
		tick: [],
	};
	private draining = false;
	private closed = false;
	private idleWaiters: Array<() => void> = [];
	private dropped = 0;

	constructor(options: DispatcherOptions<TEvent>) {
		this.handler = options.handler;
		this.capacity = { ...DEFAULT_CAPACITY, ...options.capacity };
		this.coalesce = new Set(options.coalesce ?? ["tick"]);
		this.logger = options.logger ?? createLogger("dispatcher");
	}

	/** Queues an event. Returns false when it was not accepted. */
	post(lane: DispatchLane, event: TEvent): boolean {
		if (this.closed) {
			return false;
		}
		const queue = this.lanes[lane];
		if (queue.length >= this.capacity[lane]) {
			if (this.coalesce.has(lane)) {
				queue.splice(0, queue.length - this.capacity[lane] + 1);
			} else {
				this.dropped += 1;
				this.logger.warn("dispatch_lane_full", {
					lane,
					capacity: this.capacity[lane],
					dropped: this.dropped,
				});
				return false;
			}
		}
		queue.push(event);
		this.schedule();
		return true;
	}

	pending(lane?: DispatchLane): number {
		if (lane) {
			return this.lanes[lane].length;
		}
		return LANE_PRIORITY.reduce((sum, name) => sum + this.lanes[name].length, 0);
	}

	/** Resolves once every queued event has been handled. */
	idle(): Promise<void> {
		if (!this.draining && this.pending() === 0) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	/** Rejects further posts; events already queued are still handled. */
	close(): void {
		this.closed = true;
	}

	private schedule(): void {
		if (this.draining) {
			return;
		}
		this.draining = true;
		queueMicrotask(() => {
			this.drain().catch((error: unknown) => {
				this.logger.error("dispatch_drain_failed", { message: errorMessage(error) });
			});
		});
	}

	private takeNext(): { lane: DispatchLane; event: TEvent } | null {
		for (const lane of LANE_PRIORITY) {
			const queue = this.lanes[lane];
			if (queue.length > 0) {
				const event = queue.shift();
				if (event !== undefined) {
					return { lane, event };
				}
			}
		}
		return null;
	}

	private async drain(): Promise<void> {
		try {
			for (let next = this.takeNext(); next; next = this.takeNext()) {
				try {
					await this.handler(next.event, next.lane);
				} catch (error) {
					this.logger.error("dispatch_handler_failed", {
						lane: next.lane,
						message: errorMessage(error),
					});
				}
			}
		} finally {
			this.draining = false;
			const waiters = this.idleWaiters;
			this.idleWaiters = [];
			for (const resolve of waiters) {
				resolve();
			}
		}
	}
}
