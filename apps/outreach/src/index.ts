/**
 * Public surface of the outreach package.
 */

export * from "./domain/index.js";
export * from "./errors.js";
export * from "./dispatch/index.js";
export * from "./providers/index.js";
export * from "./rate-limiting/index.js";
export * from "./recipients/index.js";
export { toOutreachSettings, type OutreachSettings } from "./config.js";
export { runPreflight, type PreflightCheck, type PreflightResult } from "./preflight.js";
export { runOutreach, type OutreachRunOptions, type OutreachReport } from "./outreach.js";
export { log, logger, withRun, setLogLevel } from "./logger.js";
