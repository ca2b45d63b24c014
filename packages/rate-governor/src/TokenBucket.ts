export interface TokenBucketOptions {
	/** Continuous refill rate (default 10) */
	tokensPerSecond?: number;
	/** Capacity; the bucket starts full (default 20) */
	maxBurst?: number;
	now?: () => number;
}

/**
 * Token bucket with lazy refill: tokens are recomputed from elapsed time on
 * every call, so an idle bucket costs nothing. The count stays in
 * [0, maxBurst].
 */
export class TokenBucket {
	readonly tokensPerSecond: number;
	readonly maxBurst: number;
	private readonly now: () => number;
	private tokens: number;
	private lastRefill: number;

	constructor(options: TokenBucketOptions = {}) {
		this.tokensPerSecond = options.tokensPerSecond ?? 10;
		this.maxBurst = options.maxBurst ?? 20;
		if (!(this.tokensPerSecond > 0) || !(this.maxBurst >= 1)) {
			throw new Error(
				`Invalid token bucket: rate=${this.tokensPerSecond} burst=${this.maxBurst}`
			);
		}
		this.now = options.now ?? (() => Date.now());
		this.tokens = this.maxBurst;
		this.lastRefill = this.now();
	}

	tryTake(): boolean {
		this.refill();
		if (this.tokens >= 1) {
			this.tokens -= 1;
			return true;
		}
		return false;
	}

	available(): number {
		this.refill();
		return this.tokens;
	}

	/** Milliseconds until one whole token is available; 0 when one already is. */
	msUntilNextToken(): number {
		this.refill();
		if (this.tokens >= 1) {
			return 0;
		}
		return Math.ceil(((1 - this.tokens) * 1_000) / this.tokensPerSecond);
	}

	private refill(): void {
		const current = this.now();
		const elapsed = current - this.lastRefill;
		if (elapsed <= 0) {
			return;
		}
		this.tokens = Math.min(
			this.maxBurst,
			this.tokens + (elapsed * this.tokensPerSecond) / 1_000
		);
		this.lastRefill = current;
	}
}
