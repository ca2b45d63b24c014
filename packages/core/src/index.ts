/**
 * Core package centralizes shared contracts, configuration and logging.
 * Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./instrument";
export * from "./config";
export * from "./time";
export * from "./exchange";
export * from "./utils/guards";
export * from "./utils/logger";
export * from "./utils/jsonFile";
