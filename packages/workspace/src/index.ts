export {
	CHART_PERIODS,
	DEFAULT_CHART_PERIOD,
	chartPeriodToTimeframe,
	isChartPeriod,
	nextChartPeriod,
	periodForTimeframe,
	prevChartPeriod,
} from "./chartPeriod";
export type { ChartPeriod } from "./chartPeriod";
export {
	VIEW_KINDS,
	WORKSPACE_VERSION,
	defaultWorkspace,
	parseWorkspace,
	restoreView,
} from "./snapshot";
export type { ViewKind, WorkspaceParseResult, WorkspaceSnapshot } from "./snapshot";
export { WorkspaceStore } from "./WorkspaceStore";
export type { WorkspaceLoadResult, WorkspaceStoreOptions } from "./WorkspaceStore";
