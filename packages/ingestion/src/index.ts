export { PushIngestionLoop, applyPushEvent } from "./PushIngestionLoop";
export type { IngestionStats, PushIngestionLoopOptions } from "./PushIngestionLoop";
