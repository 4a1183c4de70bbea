export * from "./app.js";
export * from "./config/env.js";
export * from "./domain/concurrency.js";
export * from "./domain/csv-export.js";
export * from "./domain/receipt-ingest.js";
export * from "./domain/receipt-summary.js";
export * from "./domain/transaction-report.js";
export * from "./logger.js";
export * from "./routes/http-utils.js";
export * from "./sinks/row-sink.js";
export * from "./storage/in-memory-transaction-store.js";
export * from "./types/transaction-store.js";
