export * from "./types.js";
export * from "./native/layout.js";
export * from "./native/library.js";
export * from "./reader.js";
export * from "./poller.js";
export * from "./config.js";
export * from "./utils/errors.js";
export * from "./utils/logger.js";
