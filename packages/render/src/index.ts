export { DIRTY_REGIONS, DirtyRegionSet, regionsForChange } from "./dirtyRegions";
export type { DirtyRegion } from "./dirtyRegions";
export { RenderScheduler } from "./RenderScheduler";
export type {
	RenderSchedulerOptions,
	RenderState,
	RenderStats,
	RenderSurface,
} from "./RenderScheduler";
export { Dispatcher, LANE_PRIORITY } from "./Dispatcher";
export type { DispatchHandler, DispatchLane, DispatcherOptions } from "./Dispatcher";
