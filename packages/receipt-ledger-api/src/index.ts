export * from "./app.js";
export * from "./config/env.js";
export * from "./domain/aggregation-engine.js";
export * from "./domain/receipt-ingestion.js";
export * from "./storage/in-memory-receipt-store.js";
export * from "./storage/ledger-tables.js";
export * from "./types/receipt-store.js";
