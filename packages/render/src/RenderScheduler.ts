import {
	createLogger,
	errorMessage,
	type ChangeNotification,
	type ModuleLogger,
} from "@tapewatch/core";
import { DirtyRegionSet, regionsForChange, type DirtyRegion } from "./dirtyRegions";

export type RenderState = "idle" | "dirty" | "rendering";

/**
 * Drawing layer. Receives exactly the regions to redraw plus read access to
 * whatever it displays; it never mutates either.
 */
export interface RenderSurface<TView> {
	draw(regions: ReadonlySet<DirtyRegion>, view: TView): void | Promise<void>;
}

export interface RenderStats {
	renders: number;
	skipped: number;
	/** Share of ticks that drew nothing, 0..1 */
	skipRatio: number;
}

export interface RenderSchedulerOptions<TView> {
	surface: RenderSurface<TView>;
	view: TView;
	/** Minimum time between two redraws (default 16ms) */
	minIntervalMs?: number;
	/** Period of the tick started by `start` (default 33ms) */
	tickIntervalMs?: number;
	now?: () => number;
	logger?: ModuleLogger;
}

/**
 * Coalesces change notifications and input into dirty regions and redraws
 * at most once per minimum interval. However many changes land between two
 * ticks, they produce one redraw covering their union.
 */
export class RenderScheduler<TView> {
	private readonly surface: RenderSurface<TView>;
	private readonly view: TView;
	private readonly minIntervalMs: number;
	private readonly tickIntervalMs: number;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;
	private readonly dirty = new DirtyRegionSet();
	private stateValue: RenderState = "idle";
	private lastRenderAt: number | null = null;
	private renders = 0;
	private skipped = 0;

	constructor(options: RenderSchedulerOptions<TView>) {
		this.surface = options.surface;
		this.view = options.view;
		this.minIntervalMs = options.minIntervalMs ?? 16;
		this.tickIntervalMs = options.tickIntervalMs ?? 33;
		this.now = options.now ?? (() => Date.now());
		this.logger = options.logger ?? createLogger("render");
	}

	get state(): RenderState {
		return this.stateValue;
	}

	notify(change: ChangeNotification): void {
		this.mark(regionsForChange(change.category));
	}

	/** Input can change anything on screen, so every region is marked. */
	markInput(): void {
		this.dirty.markAll();
		this.toDirty();
	}

	mark(regions: Iterable<DirtyRegion>): void {
		this.dirty.union(regions);
		this.toDirty();
	}

	/**
	 * One scheduling step: redraws if anything is dirty and the minimum
	 * interval has passed since the previous redraw. Resolves true when a
	 * redraw happened.
	 */
	async tick(): Promise<boolean> {
		if (this.stateValue === "rendering") {
			return false;
		}
		if (this.dirty.isEmpty()) {
			this.skipped += 1;
			this.stateValue = "idle";
			return false;
		}
		const at = this.now();
		if (this.lastRenderAt !== null && at - this.lastRenderAt < this.minIntervalMs) {
			return false;
		}

		const regions = this.dirty.take();
		this.stateValue = "rendering";
		this.lastRenderAt = at;
		try {
			await this.surface.draw(regions, this.view);
			this.renders += 1;
		} catch (error) {
			this.dirty.union(regions);
			this.logger.error("render_failed", {
				regions: Array.from(regions),
				message: errorMessage(error),
			});
		} finally {
			this.stateValue = this.dirty.isEmpty() ? "idle" : "dirty";
		}
		return true;
	}

	/**
	 * Runs the periodic tick until `signal` aborts. `trigger` replaces the
	 * direct call to `tick`, e.g. to route ticks through a dispatcher.
	 */
	start(signal: AbortSignal, trigger?: () => void): Promise<void> {
		return new Promise((resolve) => {
			if (signal.aborted) {
				resolve();
				return;
			}
			const fire = trigger ?? (() => this.runTick());
			const timer = setInterval(fire, this.tickIntervalMs);
			signal.addEventListener(
				"abort",
				() => {
					clearInterval(timer);
					this.logger.info("render_stats", { ...this.stats() });
					resolve();
				},
				{ once: true }
			);
		});
	}

	stats(): RenderStats {
		const total = this.renders + this.skipped;
		return {
			renders: this.renders,
			skipped: this.skipped,
			skipRatio: total === 0 ? 0 : this.skipped / total,
		};
	}

	private runTick(): void {
		this.tick().catch((error: unknown) => {
			this.logger.error("render_tick_failed", { message: errorMessage(error) });
		});
	}

	private toDirty(): void {
		if (this.stateValue === "idle") {
			this.stateValue = "dirty";
		}
	}
}
