export * from "./errors.js";
export * from "./logger.js";
export * from "./schemas.js";
export * from "./similarity.js";
export * from "./taxonomy.js";
