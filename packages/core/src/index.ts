/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the monorepo should depend on these primitives.
 */
export * from "./types";
export * from "./events";
export * from "./errors";
export * from "./eventQueue";
export * from "./config";
export type { DataSource } from "./data/DataSource";
export {
	createLogger,
	getLogLevel,
	isLogLevel,
	setLogLevel,
	type LogLevel,
	type ModuleLogger,
} from "./utils/logger";
