#!/usr/bin/env node
import { createNotificationBridge } from "./bridge.js";
import { loadConfig } from "./config.js";
import type { BridgeConfig } from "./config.js";
import { createLogger } from "./logger.js";

function loadConfigOrExit(): BridgeConfig {
  try {
    return loadConfig();
  } catch (error: unknown) {
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

const config = loadConfigOrExit();

const logger = createLogger("notification-bridge", { level: config.logLevel });
const bridge = createNotificationBridge(config, { logger });

try {
  await bridge.start();
} catch (error: unknown) {
  logger.error("Failed to start notification bridge:", error);
  process.exit(1);
}

let shutdownPromise: Promise<void> | null = null;

const shutdown = (signal: NodeJS.Signals): Promise<void> => {
  if (shutdownPromise) {
    return shutdownPromise;
  }

  const forcedExitTimer = setTimeout(() => {
    logger.error(`Force exiting after timeout during ${signal} shutdown.`);
    process.exit(1);
  }, 5000);
  forcedExitTimer.unref();

  shutdownPromise = (async () => {
    try {
      await bridge.stop();
    } catch (error: unknown) {
      logger.error("Failed during graceful shutdown:", error);
    } finally {
      clearTimeout(forcedExitTimer);
      process.exit(0);
    }
  })();

  return shutdownPromise;
};

process.once("SIGINT", () => {
  void shutdown("SIGINT");
});

process.once("SIGTERM", () => {
  void shutdown("SIGTERM");
});
