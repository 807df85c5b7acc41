export * from "./codecs.js";
export * from "./config.js";
export * from "./errors.js";
export * from "./names.js";
export * from "./types.js";
export { createLogger } from "./logger.js";
