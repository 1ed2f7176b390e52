/**
 * Domain layer - pure business logic.
 *
 * This module contains pure functions and classes that:
 * - Have no side effects
 * - Don't depend on the network or the file system
 * - Are fully unit-testable
 */

// Utility functions
export * from "./utils/backoff.js";
export * from "./utils/retry.js";
export * from "./utils/time.js";
export * from "./utils/mutex.js";
export * from "./utils/template.js";

// Recipient validation
export * from "./recipients.js";

// Payload builders
export * from "./payload-builders/index.js";
