#!/usr/bin/env node
import { loadConfigFromEnvironment, type Config } from "./config.js";
import { ConfigMissingError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { run } from "./runner.js";

/**
 * Validate configuration, printing every problem found
 */
function loadConfigOrExit(): Config {
  try {
    return loadConfigFromEnvironment();
  } catch (error) {
    const logger = createLogger();
    if (error instanceof ConfigMissingError) {
      logger.error("Configuration validation failed");
      error.issues.forEach((issue) => logger.error(`  - ${issue}`));
    } else {
      logger.error("Failed to load configuration", { error: errorMessage(error) });
    }
    process.exit(1);
  }
}

/**
 * Entry point
 */
async function main(): Promise<void> {
  const config = loadConfigOrExit();
  const logger = createLogger({ minLevel: config.logLevel, json: config.logFormat === "json" });
  const startTime = Date.now();

  const report = await run(config, { logger });

  const duration = ((Date.now() - startTime) / 1000).toFixed(1);
  if (report && report.failed > 0) {
    logger.warn(`Finished in ${duration}s with ${report.failed} skipped links`);
  } else {
    logger.info(`Finished in ${duration}s`);
  }
}

main().then(
  () => process.exit(0),
  (error: unknown) => {
    console.error("Bookmark archiver failed:", error);
    process.exit(1);
  }
);
