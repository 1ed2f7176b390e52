/**
 * Test environment setup
 * Sets environment variables BEFORE any imports happen
 * This file runs via vitest's setupFiles, which executes before test collection
 */

process.env.NODE_ENV = "test";

// Suppress logs during tests
process.env.LOG_LEVEL = process.env.LOG_LEVEL || "silent";
