/**
 * Vitest setup file - runs before each test file.
 * Silences logging unless TEST_VERBOSE=1.
 */

if (process.env.TEST_VERBOSE !== "1") {
  process.env.LOG_LEVEL = "silent";
}

const { logger } = await import("./core/logging/logger");

if (process.env.TEST_VERBOSE !== "1") {
  logger.level = "silent";
}

export {};
