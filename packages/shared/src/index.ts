// @feedsieve/shared: shared types, storage, and configuration
export * from "./types.js";
export * from "./errors.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./storage.js";
export * from "./memory-store.js";
export * from "./neo4j/index.js";
