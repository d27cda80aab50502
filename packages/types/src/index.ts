export * from "./api.js";
export * from "./chunk.js";
export * from "./config.js";
export * from "./document.js";
export * from "./pipeline.js";
export * from "./query.js";
