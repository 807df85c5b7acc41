export * from "./common/index.js";
export * from "./parser/index.js";
export * from "./builder/index.js";
export * from "./text/index.js";
