import { afterEach, describe, expect, it, vi } from "vitest";
import { RateLimitExhaustedError } from "@tapewatch/core";
import type { ModuleLogger } from "@tapewatch/core";
import { RateGovernor, isRateLimitError } from "./RateGovernor";

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

describe("isRateLimitError", () => {
	it("matches status codes and message patterns", () => {
		expect(isRateLimitError(Object.assign(new Error("nope"), { status: 429 }))).toBe(true);
		expect(isRateLimitError({ statusCode: 429 })).toBe(true);
		expect(isRateLimitError(new Error("Rate limit exceeded"))).toBe(true);
		expect(isRateLimitError(new Error("Too Many Requests"))).toBe(true);
		expect(isRateLimitError("HTTP 429")).toBe(true);
		expect(isRateLimitError(new Error("connection reset"))).toBe(false);
	});
});

describe("RateGovernor", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("lets a burst through and spreads the rest at the refill rate", async () => {
		vi.useFakeTimers();
		const governor = new RateGovernor({
			tokensPerSecond: 10,
			maxBurst: 20,
			now: () => Date.now(),
			logger: silentLogger(),
		});
		const start = Date.now();
		const completedAt: number[] = [];
		const calls = Array.from({ length: 30 }, (_, i) =>
			governor.execute(`call-${i}`, async () => {
				completedAt.push(Date.now() - start);
				return i;
			})
		);

		await vi.advanceTimersByTimeAsync(0);
		expect(completedAt).toHaveLength(20);

		await vi.advanceTimersByTimeAsync(500);
		expect(completedAt).toHaveLength(25);

		await vi.advanceTimersByTimeAsync(500);
		expect(completedAt).toHaveLength(30);
		expect(completedAt.slice(20)).toEqual([
			100, 200, 300, 400, 500, 600, 700, 800, 900, 1_000,
		]);
		await expect(Promise.all(calls)).resolves.toEqual(
			Array.from({ length: 30 }, (_, i) => i)
		);
		expect(governor.stats()).toMatchObject({ queued: 0, granted: 30 });
	});

	it("serves queued callers in arrival order", async () => {
		vi.useFakeTimers();
		const governor = new RateGovernor({
			tokensPerSecond: 10,
			maxBurst: 1,
			now: () => Date.now(),
			logger: silentLogger(),
		});
		const order: string[] = [];
		const waits = ["a", "b", "c"].map((name) =>
			governor.acquire().then(() => {
				order.push(name);
			})
		);
		await vi.advanceTimersByTimeAsync(200);
		await Promise.all(waits);
		expect(order).toEqual(["a", "b", "c"]);
	});

	it("drops an aborted waiter from the queue", async () => {
		vi.useFakeTimers();
		const governor = new RateGovernor({
			tokensPerSecond: 1,
			maxBurst: 1,
			now: () => Date.now(),
			logger: silentLogger(),
		});
		await governor.acquire();
		const controller = new AbortController();
		const pending = governor.acquire(controller.signal);
		expect(governor.stats().queued).toBe(1);

		controller.abort(new Error("shutting down"));
		await expect(pending).rejects.toThrowError("shutting down");
		expect(governor.stats().queued).toBe(0);
	});

	it("retries rate-limited calls on the backoff schedule", async () => {
		const sleep = vi.fn(async (_ms: number) => undefined);
		const governor = new RateGovernor({ sleep, logger: silentLogger() });
		const call = vi
			.fn(async () => "ok")
			.mockRejectedValueOnce(new Error("HTTP 429 Too Many Requests"))
			.mockRejectedValueOnce(Object.assign(new Error("throttled"), { status: 429 }));

		await expect(governor.execute("fetchQuotes", call)).resolves.toBe("ok");
		expect(call).toHaveBeenCalledTimes(3);
		expect(sleep.mock.calls).toEqual([[1_000], [2_000]]);
		expect(governor.stats().retried).toBe(2);
	});

	it("surfaces the last error once retries are exhausted", async () => {
		const sleep = vi.fn(async (_ms: number) => undefined);
		const logger = silentLogger();
		const governor = new RateGovernor({ sleep, logger });
		const upstream = new Error("rate limit exceeded");
		const call = vi.fn(async (): Promise<string> => {
			throw upstream;
		});

		const outcome = await governor.execute("fetchDepth", call).catch((error: unknown) => error);

		expect(outcome).toBeInstanceOf(RateLimitExhaustedError);
		if (!(outcome instanceof RateLimitExhaustedError)) {
			return;
		}
		expect(outcome.attempts).toBe(4);
		expect(outcome.request).toBe("fetchDepth");
		expect(outcome.cause).toBe(upstream);
		expect(outcome.code).toBe("RATE_LIMIT_EXHAUSTED");
		expect(call).toHaveBeenCalledTimes(4);
		expect(sleep.mock.calls).toEqual([[1_000], [2_000], [4_000]]);
		expect(governor.stats().exhausted).toBe(1);
		expect(logger.error).toHaveBeenCalledWith("rate_limit_exhausted", {
			request: "fetchDepth",
			attempts: 4,
			message: "rate limit exceeded",
		});
	});

	it("propagates other failures without retrying", async () => {
		const sleep = vi.fn(async (_ms: number) => undefined);
		const governor = new RateGovernor({ sleep, logger: silentLogger() });
		const failure = new Error("symbol not found");
		const call = vi.fn(async (): Promise<void> => {
			throw failure;
		});

		await expect(governor.execute("fetchQuotes", call)).rejects.toBe(failure);
		expect(call).toHaveBeenCalledTimes(1);
		expect(sleep).not.toHaveBeenCalled();
	});

	it("consults venue classifiers", async () => {
		class Throttled extends Error {}
		const sleep = vi.fn(async (_ms: number) => undefined);
		const governor = new RateGovernor({
			sleep,
			logger: silentLogger(),
			classifiers: [(error) => error instanceof Throttled],
		});
		const call = vi
			.fn(async () => 7)
			.mockRejectedValueOnce(new Throttled("slow down"));

		await expect(governor.execute("fetchTrades", call)).resolves.toBe(7);
		expect(sleep.mock.calls).toEqual([[1_000]]);
	});

	it("rejects on abort while the call is still in flight", async () => {
		const governor = new RateGovernor({ logger: silentLogger() });
		const controller = new AbortController();
		const call = vi.fn(() => new Promise<string>(() => undefined));

		const pending = governor.execute("fetchCandles", call, controller.signal);
		await vi.waitFor(() => expect(call).toHaveBeenCalledTimes(1));
		controller.abort(new Error("shutting down"));

		await expect(pending).rejects.toThrowError("shutting down");
	});

	it("stops backing off once aborted", async () => {
		const governor = new RateGovernor({
			sleep: () => new Promise<void>(() => undefined),
			logger: silentLogger(),
		});
		const controller = new AbortController();
		const call = vi.fn(async (): Promise<string> => {
			throw new Error("429");
		});

		const pending = governor.execute("fetchQuotes", call, controller.signal);
		await vi.waitFor(() => expect(governor.stats().retried).toBe(1));
		controller.abort(new Error("shutting down"));

		await expect(pending).rejects.toThrowError("shutting down");
		expect(call).toHaveBeenCalledTimes(1);
	});
});
