import { errorMessage, formatAge } from "@tapewatch/core";

export type FeedReadyState = "connecting" | "open" | "closed" | "lost";

export interface FeedRecency {
	stale: boolean;
	lastUpdatedAt: number | null;
	ageMs: number | null;
	label: string;
}

export interface FeedHealthSnapshot {
	readyState: FeedReadyState;
	lastEventAt: number | null;
	lastError: string | null;
	lastRefreshFailureAt: number | null;
}

export interface FeedHealthOptions {
	/** Age after which data is shown as stale even on an open feed (default 10s) */
	staleAfterMs?: number;
	now?: () => number;
}

/**
 * Liveness of the push feed, for the "last updated" indicator. Data stays
 * displayed after a loss; this only reports how old it is.
 */
export class FeedHealth {
	private readonly staleAfterMs: number;
	private readonly now: () => number;
	private readyState: FeedReadyState = "connecting";
	private lastEventAt: number | null = null;
	private lastError: string | null = null;
	private lastRefreshFailureAt: number | null = null;

	constructor(options: FeedHealthOptions = {}) {
		this.staleAfterMs = options.staleAfterMs ?? 10_000;
		this.now = options.now ?? (() => Date.now());
	}

	setState(state: FeedReadyState, error?: unknown): void {
		this.readyState = state;
		if (error !== undefined) {
			this.lastError = errorMessage(error);
		}
	}

	recordEvent(at = this.now()): void {
		this.lastEventAt = at;
		if (this.readyState === "connecting") {
			this.readyState = "open";
		}
	}

	/** A REST refresh failed after retries; last-good data is kept. */
	recordRefreshFailure(error: unknown, at = this.now()): void {
		this.lastError = errorMessage(error);
		this.lastRefreshFailureAt = at;
	}

	recency(at = this.now()): FeedRecency {
		if (this.lastEventAt === null) {
			const label =
				this.readyState === "lost" ? "disconnected, no data" : "waiting for data";
			return { stale: true, lastUpdatedAt: null, ageMs: null, label };
		}
		const ageMs = Math.max(at - this.lastEventAt, 0);
		const age = formatAge(ageMs);
		if (this.readyState === "lost" || this.readyState === "closed") {
			return {
				stale: true,
				lastUpdatedAt: this.lastEventAt,
				ageMs,
				label: `disconnected, updated ${age}`,
			};
		}
		const stale = ageMs > this.staleAfterMs;
		return {
			stale,
			lastUpdatedAt: this.lastEventAt,
			ageMs,
			label: stale ? `stale, updated ${age}` : `live, updated ${age}`,
		};
	}

	snapshot(): FeedHealthSnapshot {
		return {
			readyState: this.readyState,
			lastEventAt: this.lastEventAt,
			lastError: this.lastError,
			lastRefreshFailureAt: this.lastRefreshFailureAt,
		};
	}
}
