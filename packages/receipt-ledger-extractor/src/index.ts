export * from "./processor/classification-prompt.js";
export * from "./processor/response-parser.js";
export * from "./processor/total-amount.js";
export * from "./processor/types.js";
