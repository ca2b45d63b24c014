import { describe, expect, it } from "vitest";
import { TokenBucket } from "./TokenBucket";

describe("TokenBucket", () => {
	it("starts full and hands out exactly maxBurst tokens at once", () => {
		const bucket = new TokenBucket({ tokensPerSecond: 10, maxBurst: 20, now: () => 0 });
		const taken = Array.from({ length: 25 }, () => bucket.tryTake());
		expect(taken.filter(Boolean)).toHaveLength(20);
		expect(bucket.available()).toBe(0);
	});

	it("refills lazily from elapsed time", () => {
		let clock = 0;
		const bucket = new TokenBucket({ tokensPerSecond: 10, maxBurst: 20, now: () => clock });
		for (let i = 0; i < 20; i += 1) {
			bucket.tryTake();
		}
		expect(bucket.msUntilNextToken()).toBe(100);

		clock = 50;
		expect(bucket.available()).toBe(0.5);
		expect(bucket.tryTake()).toBe(false);
		expect(bucket.msUntilNextToken()).toBe(50);

		clock = 100;
		expect(bucket.tryTake()).toBe(true);
	});

	it("never exceeds the burst capacity", () => {
		let clock = 0;
		const bucket = new TokenBucket({ tokensPerSecond: 10, maxBurst: 20, now: () => clock });
		bucket.tryTake();
		clock = 60_000;
		expect(bucket.available()).toBe(20);
	});

	it("bounds grants in any one-second window by burst plus rate", () => {
		let clock = 0;
		const bucket = new TokenBucket({ tokensPerSecond: 10, maxBurst: 20, now: () => clock });
		const grants: number[] = [];
		for (clock = 0; clock <= 5_000; clock += 7) {
			if (bucket.tryTake()) {
				grants.push(clock);
			}
			const available = bucket.available();
			expect(available).toBeGreaterThanOrEqual(0);
			expect(available).toBeLessThanOrEqual(20);
		}
		for (const start of grants) {
			const inWindow = grants.filter((t) => t >= start && t < start + 1_000);
			expect(inWindow.length).toBeLessThanOrEqual(30);
		}
	});

	it("rejects a non-positive rate", () => {
		expect(() => new TokenBucket({ tokensPerSecond: 0 })).toThrowError(
			"Invalid token bucket: rate=0 burst=20"
		);
	});
});
