import { applyLoggingEnv, type Config, loadConfig } from "./config/schema";

async function main(): Promise<number> {
  let config: Config;
  try {
    config = await loadConfig();
  } catch (error) {
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    return 1;
  }

  // The logging stack reads its settings from the environment on first import
  applyLoggingEnv(config.logging);
  const { createLogger } = await import("./core/logging/logger");
  const { runCLI } = await import("./io/cli");
  const { createDefaultRegistry } = await import("./steps");

  const logger = createLogger("main");
  try {
    logger.debug({ event: "config_loaded", engine: config.engine });

    const registry = createDefaultRegistry();
    return await runCLI({ registry, config });
  } catch (error) {
    logger.fatal({
      event: "fatal_error",
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    return 1;
  }
}

process.exitCode = await main();
