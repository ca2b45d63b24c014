import { describe, expect, it, vi } from "vitest";
import type { ModuleLogger } from "@tapewatch/core";
import { Dispatcher, type DispatchLane } from "./Dispatcher";

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

describe("Dispatcher", () => {
	it("handles the highest-priority lane first, FIFO within a lane", async () => {
		const handled: string[] = [];
		const dispatcher = new Dispatcher<string>({
			handler: (event, lane) => {
				handled.push(`${lane}:${event}`);
			},
			logger: silentLogger(),
		});

		dispatcher.post("tick", "t1");
		dispatcher.post("data", "d1");
		dispatcher.post("data", "d2");
		dispatcher.post("fatal", "f1");
		dispatcher.post("input", "k1");
		await dispatcher.idle();

		expect(handled).toEqual(["input:k1", "fatal:f1", "data:d1", "data:d2", "tick:t1"]);
	});

	it("lets input overtake queued data while a handler is busy", async () => {
		const handled: string[] = [];
		let release: () => void = () => undefined;
		const dispatcher = new Dispatcher<string>({
			handler: async (event) => {
				handled.push(event);
				if (event === "d1") {
					await new Promise<void>((resolve) => {
						release = resolve;
					});
				}
			},
			logger: silentLogger(),
		});

		dispatcher.post("data", "d1");
		await Promise.resolve();
		dispatcher.post("data", "d2");
		dispatcher.post("input", "k1");
		release();
		await dispatcher.idle();

		expect(handled).toEqual(["d1", "k1", "d2"]);
	});

	it("coalesces ticks to the newest one", async () => {
		const handled: number[] = [];
		const dispatcher = new Dispatcher<number>({
			handler: (event) => {
				handled.push(event);
			},
			logger: silentLogger(),
		});

		dispatcher.post("tick", 1);
		dispatcher.post("tick", 2);
		dispatcher.post("tick", 3);
		await dispatcher.idle();

		expect(handled).toEqual([3]);
	});

	it("refuses events past a lane's capacity", async () => {
		const logger = silentLogger();
		const dispatcher = new Dispatcher<number>({
			handler: () => undefined,
			capacity: { data: 2 },
			logger,
		});

		expect(dispatcher.post("data", 1)).toBe(true);
		expect(dispatcher.post("data", 2)).toBe(true);
		expect(dispatcher.post("data", 3)).toBe(false);
		expect(logger.warn).toHaveBeenCalledWith("dispatch_lane_full", {
			lane: "data",
			capacity: 2,
			dropped: 1,
		});
		await dispatcher.idle();
	});

	it("keeps going after a handler throws", async () => {
		const logger = silentLogger();
		const handled: Array<[number, DispatchLane]> = [];
		const dispatcher = new Dispatcher<number>({
			handler: (event, lane) => {
				if (event === 1) {
					throw new Error("bad event");
				}
				handled.push([event, lane]);
			},
			logger,
		});

		dispatcher.post("data", 1);
		dispatcher.post("data", 2);
		await dispatcher.idle();

		expect(handled).toEqual([[2, "data"]]);
		expect(logger.error).toHaveBeenCalledWith("dispatch_handler_failed", {
			lane: "data",
			message: "bad event",
		});
	});

	it("rejects posts after close", async () => {
		const dispatcher = new Dispatcher<number>({ handler: () => undefined, logger: silentLogger() });
		dispatcher.close();
		expect(dispatcher.post("input", 1)).toBe(false);
		expect(dispatcher.pending()).toBe(0);
		await expect(dispatcher.idle()).resolves.toBeUndefined();
	});
});
