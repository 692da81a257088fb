// @rss-courier/shared — config, errors, logging, and the pipeline stages
export * from "./types.js";
export * from "./errors.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./feeds/index.js";
export * from "./storage/index.js";
export * from "./anthropic/index.js";
export * from "./discord/index.js";
