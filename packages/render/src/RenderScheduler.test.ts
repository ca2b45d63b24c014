import { afterEach, describe, expect, it, vi } from "vitest";
import type { ChangeNotification, ModuleLogger } from "@tapewatch/core";
import type { DirtyRegion } from "./dirtyRegions";
import { RenderScheduler, type RenderSurface } from "./RenderScheduler";

interface View {
	label: string;
}

const silentLogger = (): ModuleLogger => ({
	log: vi.fn(),
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
});

class RecordingSurface implements RenderSurface<View> {
	readonly passes: DirtyRegion[][] = [];
	failNext = false;

	draw(regions: ReadonlySet<DirtyRegion>, _view: View): void {
		if (this.failNext) {
			this.failNext = false;
			throw new Error("terminal gone");
		}
		this.passes.push(Array.from(regions).sort());
	}
}

const change = (category: ChangeNotification["category"], instrument = "700.HK"): ChangeNotification => ({
	instrument,
	category,
	at: 0,
});

describe("RenderScheduler", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	const setup = () => {
		let clock = 0;
		const surface = new RecordingSurface();
		const logger = silentLogger();
		const scheduler = new RenderScheduler<View>({
			surface,
			view: { label: "market" },
			minIntervalMs: 16,
			now: () => clock,
			logger,
		});
		return {
			surface,
			scheduler,
			logger,
			advance: (ms: number) => {
				clock += ms;
			},
		};
	};

	it("collapses a burst of changes into one redraw of their union", async () => {
		const { surface, scheduler } = setup();
		for (let i = 0; i < 50; i += 1) {
			scheduler.notify(change("quote", `${i}.HK`));
		}
		scheduler.notify(change("depth"));
		expect(scheduler.state).toBe("dirty");

		await expect(scheduler.tick()).resolves.toBe(true);

		expect(surface.passes).toEqual([["depth", "detail", "list", "quote", "status"]]);
		expect(scheduler.state).toBe("idle");
	});

	it("does not redraw when nothing changed", async () => {
		const { surface, scheduler } = setup();
		await expect(scheduler.tick()).resolves.toBe(false);
		await scheduler.tick();
		expect(surface.passes).toEqual([]);
		expect(scheduler.stats()).toEqual({ renders: 0, skipped: 2, skipRatio: 1 });
	});

	it("waits out the minimum interval between redraws", async () => {
		const { surface, scheduler, advance } = setup();
		scheduler.notify(change("candle"));
		await scheduler.tick();

		advance(10);
		scheduler.notify(change("trades"));
		await expect(scheduler.tick()).resolves.toBe(false);
		expect(scheduler.state).toBe("dirty");

		advance(6);
		await expect(scheduler.tick()).resolves.toBe(true);
		expect(surface.passes).toEqual([["chart"], ["detail", "trades"]]);
	});

	it("marks every region on input", async () => {
		const { surface, scheduler } = setup();
		scheduler.markInput();
		await scheduler.tick();
		expect(surface.passes[0]).toHaveLength(9);
	});

	it("keeps regions dirty when a redraw fails", async () => {
		const { surface, scheduler, logger, advance } = setup();
		surface.failNext = true;
		scheduler.notify(change("depth"));

		await scheduler.tick();
		expect(scheduler.state).toBe("dirty");
		expect(logger.error).toHaveBeenCalledWith("render_failed", {
			regions: ["depth", "detail"],
			message: "terminal gone",
		});

		advance(16);
		await scheduler.tick();
		expect(surface.passes).toEqual([["depth", "detail"]]);
	});

	it("keeps changes that arrive mid-redraw for the next pass", async () => {
		let release: () => void = () => undefined;
		const passes: DirtyRegion[][] = [];
		let clock = 0;
		const scheduler = new RenderScheduler<View>({
			surface: {
				draw: (regions) => {
					passes.push(Array.from(regions).sort());
					if (passes.length === 1) {
						return new Promise<void>((resolve) => {
							release = resolve;
						});
					}
				},
			},
			view: { label: "market" },
			now: () => clock,
			logger: silentLogger(),
		});
		scheduler.notify(change("candle"));
		const first = scheduler.tick();
		expect(scheduler.state).toBe("rendering");

		scheduler.notify(change("depth"));
		await expect(scheduler.tick()).resolves.toBe(false);
		release();
		await first;
		expect(scheduler.state).toBe("dirty");

		clock = 100;
		await scheduler.tick();
		expect(passes).toEqual([["chart"], ["depth", "detail"]]);
	});

	it("ticks periodically until aborted", async () => {
		vi.useFakeTimers();
		const surface = new RecordingSurface();
		const scheduler = new RenderScheduler<View>({
			surface,
			view: { label: "market" },
			tickIntervalMs: 33,
			now: () => Date.now(),
			logger: silentLogger(),
		});
		const controller = new AbortController();
		const running = scheduler.start(controller.signal);

		scheduler.notify(change("quote"));
		await vi.advanceTimersByTimeAsync(33);
		expect(surface.passes).toHaveLength(1);

		controller.abort();
		await running;
		scheduler.notify(change("quote"));
		await vi.advanceTimersByTimeAsync(100);
		expect(surface.passes).toHaveLength(1);
	});
});
