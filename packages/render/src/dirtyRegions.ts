import type { MarketCategory } from "@tapewatch/core";

export const DIRTY_REGIONS = [
	"list",
	"detail",
	"portfolio",
	"quote",
	"depth",
	"chart",
	"trades",
	"navigation",
	"status",
] as const;

export type DirtyRegion = (typeof DIRTY_REGIONS)[number];

const CHANGE_REGIONS: Record<MarketCategory, readonly DirtyRegion[]> = {
	quote: ["quote", "list", "detail", "status"],
	depth: ["depth", "detail"],
	trades: ["trades", "detail"],
	candle: ["chart"],
};

/** Regions that display data of the given category, directly or aggregated. */
export const regionsForChange = (category: MarketCategory): readonly DirtyRegion[] =>
	CHANGE_REGIONS[category];

/**
 * Set of regions awaiting a redraw. Regions are only ever added; `take`
 * hands the whole set over and leaves it empty in one step.
 */
export class DirtyRegionSet {
	private regions = new Set<DirtyRegion>();

	union(regions: Iterable<DirtyRegion>): void {
		for (const region of regions) {
			this.regions.add(region);
		}
	}

	markAll(): void {
		this.union(DIRTY_REGIONS);
	}

	take(): ReadonlySet<DirtyRegion> {
		const taken = this.regions;
		this.regions = new Set();
		return taken;
	}

	has(region: DirtyRegion): boolean {
		return this.regions.has(region);
	}

	isEmpty(): boolean {
		return this.regions.size === 0;
	}

	get size(): number {
		return this.regions.size;
	}
}
