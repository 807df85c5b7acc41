export * from "./byte-source.js";
export * from "./header-reader.js";
export * from "./tag-decoder.js";
