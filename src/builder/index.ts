export * from "./tag-encoder.js";
