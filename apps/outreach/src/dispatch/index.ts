export * from "./types.js";
export { Dispatcher, failureReasonFor } from "./dispatcher.js";
export { buildBatchSummary, formatBatchSummary } from "./summary.js";
