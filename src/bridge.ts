import type { BridgeConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createForwarder } from "./forwarder.js";
import type { NotificationForwarder } from "./forwarder.js";
import { getListener } from "./listeners/index.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { createStatusServer } from "./server.js";
import type { StatusServer } from "./server.js";
import type { NotificationListener, NotificationPayload } from "./types.js";

/** Options for the {@link createNotificationBridge} factory function. */
export interface BridgeOptions {
  /** Defaults to the listener for the running platform. */
  listener?: NotificationListener;
  /** Defaults to a forwarder built from the config. */
  forwarder?: NotificationForwarder;
  /** HTTP client for the default forwarder. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
  logger?: Logger;
}

export interface NotificationBridge {
  /** Start the listener, then the status server. */
  start(): Promise<void>;
  /** Stop the status server, then the listener. Safe to call repeatedly. */
  stop(): Promise<void>;
  readonly isRunning: boolean;
  readonly targetUrl: string;
  readonly bucket: string;
  /** Port the status server is bound to, or `null` when stopped. */
  readonly port: number | null;
}

/**
 * Wire a platform listener to a forwarder and expose both through the status
 * server.
 *
 * Errors from the forwarder are logged and never reach the listener.
 *
 * @param config - Settings loaded at startup.
 * @param options - Collaborator overrides, mainly for tests.
 */
export function createNotificationBridge(
  config: BridgeConfig,
  options: BridgeOptions = {},
): NotificationBridge {
  const logger = options.logger ?? silentLogger;
  const forwarder =
    options.forwarder ??
    createForwarder({
      baseUrl: config.centralContextUrl,
      bucket: config.bucketName,
      fetch: options.fetch,
      timeoutMs: config.requestTimeoutMs,
      logger,
    });
  const listener = options.listener ?? getListener(process.platform, { logger });

  const status = {
    get isRunning(): boolean {
      return listener.isRunning;
    },
    targetUrl: forwarder.targetUrl,
    bucket: forwarder.bucket,
  };

  const server: StatusServer = createStatusServer(status, {
    host: config.host,
    port: config.port,
    logger,
  });

  async function onNotification(payload: NotificationPayload): Promise<void> {
    try {
      await forwarder.forward(payload);
    } catch (error: unknown) {
      logger.error(`Forwarding failed for [${payload.appName}]: ${describeError(error)}`);
    }
  }

  return {
    get isRunning(): boolean {
      return listener.isRunning;
    },
    get port(): number | null {
      return server.port;
    },
    targetUrl: forwarder.targetUrl,
    bucket: forwarder.bucket,

    async start(): Promise<void> {
      await listener.start(onNotification);
      try {
        await server.listen();
      } catch (error: unknown) {
        await listener.stop();
        throw error;
      }
      logger.info(`Forwarding notifications to ${forwarder.targetUrl} (bucket "${forwarder.bucket}")`);
    },

    async stop(): Promise<void> {
      await server.close();
      await listener.stop();
    },
  };
}
