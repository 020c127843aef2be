export * from "./config.js";
export * from "./types.js";
export * from "./utils/logger.js";
