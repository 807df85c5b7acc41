export * from "./tag-formatter.js";
