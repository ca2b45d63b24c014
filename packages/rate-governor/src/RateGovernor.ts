import {
	RateLimitExhaustedError,
	createLogger,
	errorMessage,
	isRecord,
	type ModuleLogger,
} from "@tapewatch/core";
import { TokenBucket } from "./TokenBucket";

export type RateLimitClassifier = (error: unknown) => boolean;

export interface RatePermit {
	grantedAt: number;
	waitedMs: number;
}

export interface RateGovernorStats {
	availableTokens: number;
	queued: number;
	granted: number;
	retried: number;
	exhausted: number;
}

export interface RateGovernorOptions {
	tokensPerSecond?: number;
	maxBurst?: number;
	/** Delay before each retry; its length is the retry budget */
	backoffScheduleMs?: readonly number[];
	/** Venue-specific checks, consulted in addition to the generic one */
	classifiers?: readonly RateLimitClassifier[];
	now?: () => number;
	sleep?: (ms: number) => Promise<void>;
	logger?: ModuleLogger;
}

export const DEFAULT_BACKOFF_SCHEDULE_MS: readonly number[] = [1_000, 2_000, 4_000];

const RATE_LIMIT_PATTERN = /429|rate limit|too many requests/i;

/**
 * Generic rate-limit detection: an HTTP 429 status on the error object, or a
 * message mentioning one.
 */
export const isRateLimitError: RateLimitClassifier = (error) => {
	if (isRecord(error) || error instanceof Error) {
		const status = Reflect.get(error, "status") ?? Reflect.get(error, "statusCode");
		if (status === 429 || status === "429") {
			return true;
		}
	}
	return RATE_LIMIT_PATTERN.test(errorMessage(error));
};

interface Waiter {
	enqueuedAt: number;
	resolve: (permit: RatePermit) => void;
	detach?: () => void;
}

const defaultSleep = (ms: number): Promise<void> =>
	new Promise((resolve) => setTimeout(resolve, ms));

/** Settles with `promise`, or rejects with the signal's reason if it aborts first. */
const untilAborted = <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
	if (!signal) {
		return promise;
	}
	if (signal.aborted) {
		return Promise.reject(signal.reason);
	}
	return new Promise<T>((resolve, reject) => {
		const onAbort = (): void => reject(signal.reason);
		signal.addEventListener("abort", onAbort, { once: true });
		promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			}
		);
	});
};

/**
 * Gatekeeper for every outbound venue call. Permits come from a token bucket;
 * callers that find it empty queue in arrival order and are woken by a
 * single timer that only exists while someone is waiting.
 */
export class RateGovernor {
	private readonly bucket: TokenBucket;
	private readonly backoff: readonly number[];
	private readonly classifiers: readonly RateLimitClassifier[];
	private readonly now: () => number;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly logger: ModuleLogger;
	private readonly waiters: Waiter[] = [];
	private timer: ReturnType<typeof setTimeout> | null = null;
	private granted = 0;
	private retried = 0;
	private exhausted = 0;

	constructor(options: RateGovernorOptions = {}) {
		this.now = options.now ?? (() => Date.now());
		this.bucket = new TokenBucket({
			tokensPerSecond: options.tokensPerSecond,
			maxBurst: options.maxBurst,
			now: this.now,
		});
		this.backoff = options.backoffScheduleMs ?? DEFAULT_BACKOFF_SCHEDULE_MS;
		this.classifiers = [isRateLimitError, ...(options.classifiers ?? [])];
		this.sleep = options.sleep ?? defaultSleep;
		this.logger = options.logger ?? createLogger("rate-governor");
	}

	get maxRetries(): number {
		return this.backoff.length;
	}

	/**
	 * Resolves once a token has been taken for the caller. Rejects with the
	 * signal's reason if it aborts first.
	 */
	acquire(signal?: AbortSignal): Promise<RatePermit> {
		if (signal?.aborted) {
			return Promise.reject(signal.reason);
		}
		const enqueuedAt = this.now();
		if (this.waiters.length === 0 && this.bucket.tryTake()) {
			this.granted += 1;
			return Promise.resolve({ grantedAt: enqueuedAt, waitedMs: 0 });
		}

		return new Promise<RatePermit>((resolve, reject) => {
			const waiter: Waiter = { enqueuedAt, resolve };
			if (signal) {
				const onAbort = (): void => {
					const idx = this.waiters.indexOf(waiter);
					if (idx !== -1) {
						this.waiters.splice(idx, 1);
					}
					reject(signal.reason);
				};
				signal.addEventListener("abort", onAbort, { once: true });
				waiter.detach = () => signal.removeEventListener("abort", onAbort);
			}
			this.waiters.push(waiter);
			this.pump();
		});
	}

	/**
	 * Acquire a permit and run `call`. Rate-limited failures are retried after
	 * each step of the backoff schedule (re-acquiring a permit each time);
	 * anything else propagates on the first occurrence. An abort rejects at
	 * once, even while `call` is still in flight; its late result is dropped.
	 */
	async execute<T>(
		name: string,
		call: () => Promise<T>,
		signal?: AbortSignal
	): Promise<T> {
		let attempt = 0;
		for (;;) {
			await this.acquire(signal);
			try {
				return await untilAborted(call(), signal);
			} catch (error) {
				if (signal?.aborted || !this.isRateLimited(error)) {
					throw error;
				}
				const delay = this.backoff[attempt];
				attempt += 1;
				if (delay === undefined) {
					this.exhausted += 1;
					this.logger.error("rate_limit_exhausted", {
						request: name,
						attempts: attempt,
						message: errorMessage(error),
					});
					throw new RateLimitExhaustedError(name, attempt, error);
				}
				this.retried += 1;
				this.logger.warn("rate_limited_retry", {
					request: name,
					attempt,
					delayMs: delay,
					message: errorMessage(error),
				});
				await untilAborted(this.sleep(delay), signal);
			}
		}
	}

	isRateLimited(error: unknown): boolean {
		return this.classifiers.some((classify) => classify(error));
	}

	stats(): RateGovernorStats {
		return {
			availableTokens: this.bucket.available(),
			queued: this.waiters.length,
			granted: this.granted,
			retried: this.retried,
			exhausted: this.exhausted,
		};
	}

	private pump(): void {
		while (this.waiters.length > 0 && this.bucket.tryTake()) {
			const waiter = this.waiters.shift();
			if (!waiter) {
				break;
			}
			waiter.detach?.();
			this.granted += 1;
			const grantedAt = this.now();
			waiter.resolve({ grantedAt, waitedMs: grantedAt - waiter.enqueuedAt });
		}
		if (this.waiters.length > 0 && this.timer === null) {
			const delay = Math.max(this.bucket.msUntilNextToken(), 1);
			this.timer = setTimeout(() => {
				this.timer = null;
				this.pump();
			}, delay);
		}
	}
}
